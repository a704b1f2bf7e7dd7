import { OpenAI } from 'openai';
import type { IMinutesProvider, MinutesContext, MinutesOptions } from '../IMinutesProvider';
import { buildMinutesMessages } from '../minutesPrompt';
import { ProviderError } from '../../../errors/PipelineError';
import { classifyOpenAIError } from '../../providerErrors';
import { createLogger } from '../../../utils/logger';

const logger = createLogger({ service: 'OpenAIMinutesProvider' });

/**
 * OpenAI GPT Minutes Provider
 */
export class OpenAIMinutesProvider implements IMinutesProvider {
  readonly name = 'openai';
  private openai: OpenAI;
  private apiKey: string;
  private model: string;

  constructor(apiKey: string, model: string = 'gpt-4o-mini') {
    // Retries are owned by MinutesPipeline
    this.openai = new OpenAI({ apiKey, maxRetries: 0 });
    this.apiKey = apiKey;
    this.model = model;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 10;
  }

  async generateMinutes(transcript: string, context: MinutesContext, options: MinutesOptions): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create(
        {
          model: this.model,
          messages: buildMinutesMessages(transcript, context),
          temperature: options.temperature,
          max_tokens: options.maxTokens
        },
        { signal: options.signal }
      );
      content = response.choices[0]?.message?.content;
    } catch (error) {
      logger.error({ error, model: this.model }, 'OpenAI minutes generation failed');
      throw classifyOpenAIError(error, 'minutes');
    }

    const minutes = content?.trim();
    if (!minutes) {
      throw new ProviderError(`OpenAI ${this.model} returned empty minutes`, 'minutes');
    }
    return minutes;
  }
}
