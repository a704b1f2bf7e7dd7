/**
 * Error taxonomy for the recording-to-minutes pipeline
 *
 * - Session misuse (rejected immediately, never retried):
 *   AlreadyRecording, NotRecording, AlreadyStopping
 * - Pipeline aborts before any network call:
 *   NoAudioCaptured, FileTooLarge
 * - Boundary call failures (transcription / minutes providers):
 *   PayloadTooLarge, QuotaExceeded, AuthError, TransientNetworkError
 */

export type PipelineStage = 'session' | 'mix' | 'preprocess' | 'compress' | 'transcription' | 'minutes';

export type PipelineErrorKind =
  | 'AlreadyRecording'
  | 'NotRecording'
  | 'AlreadyStopping'
  | 'NoAudioCaptured'
  | 'FileTooLarge'
  | 'PreprocessingFailed'
  | 'PayloadTooLarge'
  | 'QuotaExceeded'
  | 'AuthError'
  | 'TransientNetworkError'
  | 'ProviderError'
  | 'InternalError';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  readonly stage: PipelineStage;

  constructor(message: string, stage: PipelineStage, options?: { cause?: unknown }) {
    super(message, options);
    this.stage = stage;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

// ==================== Session state misuse ====================

export class AlreadyRecordingError extends PipelineError {
  readonly kind = 'AlreadyRecording';

  constructor(channelId: string) {
    super(`Channel ${channelId} already has an active recording session`, 'session');
    this.name = 'AlreadyRecordingError';
  }
}

export class NotRecordingError extends PipelineError {
  readonly kind = 'NotRecording';

  constructor(channelId: string, state: string) {
    super(`Channel ${channelId} is not recording (state: ${state})`, 'session');
    this.name = 'NotRecordingError';
  }
}

export class AlreadyStoppingError extends PipelineError {
  readonly kind = 'AlreadyStopping';

  constructor(channelId: string) {
    super(`Recording on channel ${channelId} is already being stopped`, 'session');
    this.name = 'AlreadyStoppingError';
  }
}

// ==================== Pre-network pipeline aborts ====================

export class NoAudioCapturedError extends PipelineError {
  readonly kind = 'NoAudioCaptured';

  constructor() {
    super('No audio was captured from any speaker', 'mix');
    this.name = 'NoAudioCapturedError';
  }
}

export class FileTooLargeError extends PipelineError {
  readonly kind = 'FileTooLarge';
  readonly smallestSizeBytes: number;
  readonly maxBytes: number;

  constructor(smallestSizeBytes: number, maxBytes: number) {
    super(
      `Audio is still ${formatMegabytes(smallestSizeBytes)} after the most aggressive preset (limit ${formatMegabytes(maxBytes)})`,
      'compress'
    );
    this.name = 'FileTooLargeError';
    this.smallestSizeBytes = smallestSizeBytes;
    this.maxBytes = maxBytes;
  }
}

export class PreprocessingFailedError extends PipelineError {
  readonly kind = 'PreprocessingFailed';

  constructor(message: string, cause?: unknown) {
    super(message, 'preprocess', { cause });
    this.name = 'PreprocessingFailedError';
  }
}

// ==================== Boundary call failures ====================

export type BoundaryStage = 'transcription' | 'minutes';

export class PayloadTooLargeError extends PipelineError {
  readonly kind = 'PayloadTooLarge';

  constructor(message: string, stage: BoundaryStage = 'transcription', cause?: unknown) {
    super(message, stage, { cause });
    this.name = 'PayloadTooLargeError';
  }
}

export class QuotaExceededError extends PipelineError {
  readonly kind = 'QuotaExceeded';

  constructor(message: string, stage: BoundaryStage, cause?: unknown) {
    super(message, stage, { cause });
    this.name = 'QuotaExceededError';
  }
}

export class AuthError extends PipelineError {
  readonly kind = 'AuthError';

  constructor(message: string, stage: BoundaryStage, cause?: unknown) {
    super(message, stage, { cause });
    this.name = 'AuthError';
  }
}

export class TransientNetworkError extends PipelineError {
  readonly kind = 'TransientNetworkError';

  constructor(message: string, stage: BoundaryStage, cause?: unknown) {
    super(message, stage, { cause });
    this.name = 'TransientNetworkError';
  }
}

/** Non-retryable provider failure that fits none of the other boundary kinds */
export class ProviderError extends PipelineError {
  readonly kind = 'ProviderError';

  constructor(message: string, stage: BoundaryStage, cause?: unknown) {
    super(message, stage, { cause });
    this.name = 'ProviderError';
  }
}

export class InternalError extends PipelineError {
  readonly kind = 'InternalError';

  constructor(message: string, stage: PipelineStage, cause?: unknown) {
    super(message, stage, { cause });
    this.name = 'InternalError';
  }
}

export function isSessionMisuseError(
  error: unknown
): error is AlreadyRecordingError | NotRecordingError | AlreadyStoppingError {
  return (
    error instanceof AlreadyRecordingError ||
    error instanceof NotRecordingError ||
    error instanceof AlreadyStoppingError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
}
