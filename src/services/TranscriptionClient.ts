import type { ITranscriptionProvider, TranscriptionOptions } from '../providers/ai/ITranscriptionProvider';
import type { AudioArtifact } from '../models/AudioFrame';
import type { Transcript } from '../models/ProcessingResult';
import { PayloadTooLargeError, ProviderError, TransientNetworkError } from '../errors/PipelineError';
import { MAX_RETRIES } from '../config/constants';
import { withRetry, withTimeout } from '../utils/retry';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'TranscriptionClient' });

export interface TranscriptionClientOptions {
  maxBytes: number;
  timeoutMs: number;
  retryBackoffMs: number;
}

export type TranscribeRequestOptions = Omit<TranscriptionOptions, 'signal'>;

/**
 * Boundary around the speech-to-text backend
 *
 * - Refuses payloads above the upload limit (compression must have run first)
 * - One bounded retry with backoff for transient failures, including timeouts
 * - AuthError, QuotaExceeded and PayloadTooLarge surface immediately
 */
export class TranscriptionClient {
  private readonly provider: ITranscriptionProvider;
  private readonly options: TranscriptionClientOptions;

  constructor(provider: ITranscriptionProvider, options: TranscriptionClientOptions) {
    this.provider = provider;
    this.options = options;
  }

  async transcribe(audio: AudioArtifact, options: TranscribeRequestOptions): Promise<Transcript> {
    if (audio.sizeBytes > this.options.maxBytes) {
      // The compressor guarantees the limit; reaching this is a pipeline bug
      logger.error({ sizeBytes: audio.sizeBytes, maxBytes: this.options.maxBytes }, 'Oversized payload reached transcription');
      throw new PayloadTooLargeError(
        `Audio payload is ${audio.sizeBytes} bytes, limit is ${this.options.maxBytes} bytes`
      );
    }

    const transcript = await withRetry(
      () =>
        withTimeout(
          (signal) => this.provider.transcribe(audio, { ...options, signal }),
          this.options.timeoutMs,
          'transcription'
        ),
      {
        retries: MAX_RETRIES,
        backoffMs: this.options.retryBackoffMs,
        shouldRetry: (error) => error instanceof TransientNetworkError,
        label: 'transcription'
      }
    );

    if (transcript.text.length === 0) {
      throw new ProviderError('Transcription returned no text', 'transcription');
    }

    logger.info({
      provider: this.provider.name,
      characters: transcript.text.length,
      segments: transcript.segments?.length
    }, 'Transcription complete');

    return transcript;
  }
}
