/**
 * Processing Result Model
 *
 * Produced exactly once per recording session.
 */

import {
  errorMessage,
  isPipelineError,
  type PipelineErrorKind,
  type PipelineStage
} from '../errors/PipelineError';

export interface StageError {
  stage: PipelineStage;
  kind: PipelineErrorKind;
  message: string;
  severity: 'warning' | 'error';
}

export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
}

export interface TranscriptWord {
  word: string;
  start: number;
  end: number;
}

export interface Transcript {
  text: string;
  language?: string;
  durationSeconds?: number;
  segments?: TranscriptSegment[];
  words?: TranscriptWord[];
}

/**
 * - full: transcript and minutes
 * - transcript-only: minutes stage failed after a successful transcription
 * - nothing: no transcript was produced
 */
export type ProcessingOutcome = 'full' | 'transcript-only' | 'nothing';

export interface ProcessingResult {
  sessionId: string;
  channelId: string;
  transcriptText?: string;
  transcript?: Transcript;
  minutesText?: string;
  errors: StageError[];
  recordingPath?: string;
  durationMs?: number;
  completedAt: Date;
}

export function getOutcome(result: Pick<ProcessingResult, 'transcriptText' | 'minutesText'>): ProcessingOutcome {
  if (result.transcriptText === undefined) {
    return 'nothing';
  }
  return result.minutesText === undefined ? 'transcript-only' : 'full';
}

/**
 * Convert a thrown value into a result entry; unclassified errors become InternalError
 */
export function toStageError(
  error: unknown,
  fallbackStage: PipelineStage,
  severity: StageError['severity'] = 'error'
): StageError {
  if (isPipelineError(error)) {
    return { stage: error.stage, kind: error.kind, message: error.message, severity };
  }
  return { stage: fallbackStage, kind: 'InternalError', message: errorMessage(error), severity };
}
