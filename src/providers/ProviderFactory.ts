/**
 * Provider Factory
 *
 * Creates the transcription and minutes providers from configuration.
 * Providers are selected once at startup and passed explicitly to the pipeline.
 */

import type { Env } from '../config/env';
import type { ProviderConfig } from '../config/providerConfig';
import type { ITranscriptionProvider } from './ai/ITranscriptionProvider';
import type { IMinutesProvider } from './ai/IMinutesProvider';
import { OpenAITranscriptionProvider } from './ai/stt/OpenAITranscriptionProvider';
import { OpenAIMinutesProvider } from './ai/llm/OpenAIMinutesProvider';
import { OllamaMinutesProvider } from './ai/llm/OllamaMinutesProvider';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'ProviderFactory' });

export interface PipelineProviders {
  transcription: ITranscriptionProvider;
  minutes: IMinutesProvider;
}

/**
 * Transcription is hard-wired to OpenAI Whisper regardless of the minutes provider
 */
export function createTranscriptionProvider(config: ProviderConfig, env: Env): ITranscriptionProvider {
  switch (config.transcriptionProvider) {
    case 'openai':
      return new OpenAITranscriptionProvider(env.OPENAI_API_KEY, env.OPENAI_TRANSCRIPTION_MODEL);
  }
}

export function createMinutesProvider(config: ProviderConfig, env: Env): IMinutesProvider {
  switch (config.minutesProvider) {
    case 'openai':
      return new OpenAIMinutesProvider(env.OPENAI_API_KEY, env.OPENAI_MINUTES_MODEL);
    case 'ollama':
      return new OllamaMinutesProvider(env.OLLAMA_URL, env.OLLAMA_MODEL);
  }
}

export function createPipelineProviders(config: ProviderConfig, env: Env): PipelineProviders {
  const providers: PipelineProviders = {
    transcription: createTranscriptionProvider(config, env),
    minutes: createMinutesProvider(config, env)
  };

  logger.info({
    transcription: providers.transcription.name,
    minutes: providers.minutes.name
  }, 'Providers created');

  for (const provider of [providers.transcription, providers.minutes]) {
    if (!provider.isConfigured()) {
      logger.error({ provider: provider.name }, 'Provider is not configured correctly');
    }
  }

  return providers;
}
