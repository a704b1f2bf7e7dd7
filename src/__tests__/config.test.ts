import { describe, it, expect } from 'vitest';
import { ConfigValidationError, loadEnv } from '../config/env';
import { buildProviderConfig } from '../config/providerConfig';
import { DEFAULT_COMPRESSION_LADDER, MAX_TRANSCRIPTION_BYTES } from '../config/constants';

const base = { OPENAI_API_KEY: 'test-secret' };

describe('loadEnv', () => {
  it('applies defaults', () => {
    const env = loadEnv(base);

    expect(env.TRANSCRIPTION_PROVIDER).toBe('openai');
    expect(env.MINUTES_PROVIDER).toBe('openai');
    expect(env.MAX_TRANSCRIPTION_BYTES).toBe(MAX_TRANSCRIPTION_BYTES);
    expect(env.PREPROCESSING_ENABLED).toBe(true);
    expect(env.WORD_TIMESTAMPS).toBe(false);
    expect(env.MAX_RECORDING_AGE_DAYS).toBe(7);
  });

  it('requires the OpenAI key used for transcription', () => {
    expect(() => loadEnv({ MINUTES_PROVIDER: 'ollama' })).toThrow(ConfigValidationError);
  });

  it('rejects a transcription backend other than openai', () => {
    let caught: unknown;
    try {
      loadEnv({ ...base, TRANSCRIPTION_PROVIDER: 'ollama' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    expect(caught).toMatchObject({
      issues: ['TRANSCRIPTION_PROVIDER: Only the openai provider supports audio transcription; TRANSCRIPTION_PROVIDER must be "openai"']
    });
  });

  it('parses boolean flags literally', () => {
    const env = loadEnv({ ...base, PREPROCESSING_ENABLED: 'false', WORD_TIMESTAMPS: '1' });

    expect(env.PREPROCESSING_ENABLED).toBe(false);
    expect(env.WORD_TIMESTAMPS).toBe(true);
    expect(() => loadEnv({ ...base, WORD_TIMESTAMPS: 'yes' })).toThrow(ConfigValidationError);
  });

  it('coerces numeric settings', () => {
    const env = loadEnv({ ...base, MAX_TRANSCRIPTION_BYTES: '1048576', MINUTES_TEMPERATURE: '0.7' });

    expect(env.MAX_TRANSCRIPTION_BYTES).toBe(1048576);
    expect(env.MINUTES_TEMPERATURE).toBe(0.7);
  });
});

describe('buildProviderConfig', () => {
  it('builds a frozen snapshot from the environment', () => {
    const config = buildProviderConfig(
      loadEnv({ ...base, MINUTES_PROVIDER: 'ollama', PREPROCESSING_LEVEL: 'heavy', RECORDING_OUTPUT_DIR: 'out' })
    );

    expect(config.transcriptionProvider).toBe('openai');
    expect(config.minutesProvider).toBe('ollama');
    expect(config.outputDir).toBe('out');
    expect(config.thresholds.preprocessingLevel).toBe('heavy');
    expect(config.thresholds.compressionLadder).toEqual(DEFAULT_COMPRESSION_LADDER);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.thresholds)).toBe(true);
  });

  it('switches to the structured format when word timestamps are requested', () => {
    const config = buildProviderConfig(loadEnv({ ...base, WORD_TIMESTAMPS: 'true', TRANSCRIPTION_RESPONSE_FORMAT: 'text' }));

    expect(config.thresholds.responseFormat).toBe('verbose_json');
    expect(config.thresholds.wordTimestamps).toBe(true);
  });
});
