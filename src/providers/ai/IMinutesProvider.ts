/**
 * Minutes Provider Interface
 *
 * Text-generation backend that turns a transcript into meeting minutes.
 * Implementations are interchangeable; the pipeline never inspects which one it got.
 */

import type { MinutesProviderName } from '../../config/providerConfig';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface MinutesContext {
  meetingTitle: string;
  startedAt: Date;
  /**
   * Speaker ids in first-heard order
   */
  participants: string[];
  channelName?: string;
  /**
   * Domain vocabulary shared with the transcription stage
   */
  vocabulary?: string;
}

export interface MinutesOptions {
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

export interface IMinutesProvider {
  readonly name: MinutesProviderName;

  isConfigured(): boolean;

  /**
   * Generate minutes from transcript text
   * @throws PipelineError classified as AuthError, QuotaExceeded,
   *   TransientNetworkError or ProviderError
   */
  generateMinutes(transcript: string, context: MinutesContext, options: MinutesOptions): Promise<string>;
}
