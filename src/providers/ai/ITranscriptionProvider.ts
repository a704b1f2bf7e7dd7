/**
 * Transcription Provider Interface
 *
 * Speech-to-text backend. Exactly one audio-capable backend is configured per
 * process, independent of the minutes provider.
 */

import type { AudioArtifact } from '../../models/AudioFrame';
import type { Transcript } from '../../models/ProcessingResult';
import type { TranscriptionResponseFormat } from '../../config/providerConfig';

export interface TranscriptionOptions {
  language: string;

  /**
   * 0 biases decoding towards deterministic output
   */
  temperature: number;

  /**
   * text: plain transcript; verbose_json: transcript with segment timestamps
   */
  responseFormat: TranscriptionResponseFormat;

  /**
   * Request word-level timestamps (verbose_json only)
   */
  wordTimestamps: boolean;

  /**
   * Vocabulary hint biasing recognition towards the expected domain
   */
  contextHint?: string;

  signal?: AbortSignal;
}

export interface ITranscriptionProvider {
  /**
   * Provider name for logging/debugging
   */
  readonly name: string;

  /**
   * Whether credentials/endpoint look usable
   */
  isConfigured(): boolean;

  /**
   * Transcribe an audio file
   * @throws PipelineError classified as AuthError, QuotaExceeded, PayloadTooLarge,
   *   TransientNetworkError or ProviderError
   */
  transcribe(audio: AudioArtifact, options: TranscriptionOptions): Promise<Transcript>;
}
