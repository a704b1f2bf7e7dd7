/**
 * Ollama Minutes Provider
 *
 * Uses Ollama API for local LLM chat completions.
 * @see https://github.com/ollama/ollama
 *
 * API: POST /api/chat
 */

import type { IMinutesProvider, MinutesContext, MinutesOptions } from '../IMinutesProvider';
import { buildMinutesMessages } from '../minutesPrompt';
import { ProviderError } from '../../../errors/PipelineError';
import { classifyHttpStatus, classifyUnknownError } from '../../providerErrors';
import { createLogger } from '../../../utils/logger';

const logger = createLogger({ service: 'OllamaMinutesProvider' });

interface OllamaChatResponse {
  message?: { content?: string };
}

export class OllamaMinutesProvider implements IMinutesProvider {
  readonly name = 'ollama';
  private baseUrl: string;
  private model: string;

  constructor(
    baseUrl: string = 'http://localhost:11434',
    model: string = 'llama3.1'
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.model = model;
  }

  isConfigured(): boolean {
    return URL.canParse(this.baseUrl);
  }

  async generateMinutes(transcript: string, context: MinutesContext, options: MinutesOptions): Promise<string> {
    let data: OllamaChatResponse;
    try {
      const response = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          messages: buildMinutesMessages(transcript, context),
          stream: false,
          options: {
            temperature: options.temperature,
            num_predict: options.maxTokens
          }
        }),
        signal: options.signal
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw classifyHttpStatus(
          response.status,
          `Ollama API error: ${response.status} ${response.statusText} - ${errorText}`,
          'minutes'
        );
      }

      data = (await response.json()) as OllamaChatResponse;
    } catch (error) {
      logger.error({ error, model: this.model }, 'Ollama minutes generation failed');
      throw classifyUnknownError(error, 'minutes');
    }

    const minutes = data.message?.content?.trim();
    if (!minutes) {
      throw new ProviderError(`Ollama ${this.model} returned empty minutes`, 'minutes');
    }
    return minutes;
  }
}
