/**
 * Provider Configuration
 *
 * Immutable snapshot of everything a pipeline run needs from configuration.
 * Built once per process from the validated environment.
 */

import type { Env } from './env';
import { DEFAULT_COMPRESSION_LADDER, type CompressionPreset } from './constants';

export type TranscriptionProviderName = 'openai';
export type MinutesProviderName = 'openai' | 'ollama';
export type PreprocessingLevel = 'light' | 'medium' | 'heavy';
export type TranscriptionResponseFormat = 'text' | 'verbose_json';

export interface PipelineThresholds {
  maxBytes: number;
  preprocessingEnabled: boolean;
  preprocessingLevel: PreprocessingLevel;
  compressionLadder: readonly CompressionPreset[];
  transcriptionTemperature: number;
  transcriptionLanguage: string;
  responseFormat: TranscriptionResponseFormat;
  wordTimestamps: boolean;
  contextHint: string;
  minutesTemperature: number;
  minutesMaxTokens: number;
  transcriptionTimeoutMs: number;
  minutesTimeoutMs: number;
  retryBackoffMs: number;
}

export interface ProviderConfig {
  readonly transcriptionProvider: TranscriptionProviderName;
  readonly minutesProvider: MinutesProviderName;
  readonly meetingTitle: string;
  readonly outputDir: string;
  readonly retentionDays: number;
  readonly captureSampleRate: number;
  readonly thresholds: Readonly<PipelineThresholds>;
}

export function buildProviderConfig(env: Env): ProviderConfig {
  // Word-level timestamps are only returned with the structured response format
  const responseFormat: TranscriptionResponseFormat = env.WORD_TIMESTAMPS
    ? 'verbose_json'
    : env.TRANSCRIPTION_RESPONSE_FORMAT;

  const thresholds: PipelineThresholds = {
    maxBytes: env.MAX_TRANSCRIPTION_BYTES,
    preprocessingEnabled: env.PREPROCESSING_ENABLED,
    preprocessingLevel: env.PREPROCESSING_LEVEL,
    compressionLadder: Object.freeze([...DEFAULT_COMPRESSION_LADDER]),
    transcriptionTemperature: env.TRANSCRIPTION_TEMPERATURE,
    transcriptionLanguage: env.TRANSCRIPTION_LANGUAGE,
    responseFormat,
    wordTimestamps: env.WORD_TIMESTAMPS,
    contextHint: env.CONTEXT_HINT,
    minutesTemperature: env.MINUTES_TEMPERATURE,
    minutesMaxTokens: env.MINUTES_MAX_TOKENS,
    transcriptionTimeoutMs: env.TRANSCRIPTION_TIMEOUT_MS,
    minutesTimeoutMs: env.MINUTES_TIMEOUT_MS,
    retryBackoffMs: env.RETRY_BACKOFF_MS
  };

  const config: ProviderConfig = {
    transcriptionProvider: 'openai',
    minutesProvider: env.MINUTES_PROVIDER,
    meetingTitle: env.MEETING_TITLE,
    outputDir: env.RECORDING_OUTPUT_DIR,
    retentionDays: env.MAX_RECORDING_AGE_DAYS,
    captureSampleRate: env.CAPTURE_SAMPLE_RATE,
    thresholds: Object.freeze(thresholds)
  };

  return Object.freeze(config);
}
