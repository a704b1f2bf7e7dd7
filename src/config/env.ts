/**
 * Environment Configuration
 *
 * Validates and provides type-safe access to environment variables
 */

import { z } from 'zod';
import { DEFAULT_CONTEXT_HINT, MAX_TRANSCRIPTION_BYTES } from './constants';

// z.coerce.boolean() treats "false" as true, so flags are parsed explicitly
const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
  // ===== Transcription (fixed backend: OpenAI Whisper) =====
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required (transcription always uses OpenAI Whisper)'),
  TRANSCRIPTION_PROVIDER: z
    .string()
    .default('openai')
    .refine((value) => value === 'openai', {
      message: 'Only the openai provider supports audio transcription; TRANSCRIPTION_PROVIDER must be "openai"'
    }),
  OPENAI_TRANSCRIPTION_MODEL: z.string().default('whisper-1'),
  TRANSCRIPTION_LANGUAGE: z.string().min(2).default('en'),
  TRANSCRIPTION_TEMPERATURE: z.coerce.number().min(0).max(1).default(0),
  TRANSCRIPTION_RESPONSE_FORMAT: z.enum(['text', 'verbose_json']).default('text'),
  WORD_TIMESTAMPS: booleanFlag(false),
  CONTEXT_HINT: z.string().default(DEFAULT_CONTEXT_HINT),
  MAX_TRANSCRIPTION_BYTES: z.coerce.number().int().positive().default(MAX_TRANSCRIPTION_BYTES),
  TRANSCRIPTION_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),

  // ===== Minutes generation =====
  MINUTES_PROVIDER: z.enum(['openai', 'ollama']).default('openai'),
  OPENAI_MINUTES_MODEL: z.string().default('gpt-4o-mini'),
  OLLAMA_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().default('llama3.1'),
  MINUTES_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  MINUTES_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
  MINUTES_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  MEETING_TITLE: z.string().default('Voice meeting'),

  // ===== Retries =====
  RETRY_BACKOFF_MS: z.coerce.number().int().nonnegative().default(2000),

  // ===== Recording & audio processing =====
  RECORDING_OUTPUT_DIR: z.string().default('recordings'),
  MAX_RECORDING_AGE_DAYS: z.coerce.number().int().nonnegative().default(7),
  RETENTION_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(6 * 60 * 60 * 1000),
  CAPTURE_SAMPLE_RATE: z.coerce.number().int().positive().default(48000),
  PREPROCESSING_ENABLED: booleanFlag(true),
  PREPROCESSING_LEVEL: z.enum(['light', 'medium', 'heavy']).default('medium'),
  FFMPEG_PATH: z.string().default('ffmpeg'),
  FFMPEG_TIMEOUT_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),

  // ===== Server Configuration =====
  PORT: z.coerce.number().int().positive().default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

export type Env = z.infer<typeof envSchema>;

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Environment validation failed:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * Parse and validate environment variables
 * @throws ConfigValidationError listing every invalid key
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return parsed.data;
}
