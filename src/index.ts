// Loaded first so LOG_LEVEL reaches the logger
import 'dotenv/config';
import { ConfigValidationError, loadEnv, type Env } from './config/env';
import { buildProviderConfig } from './config/providerConfig';
import { createPipelineProviders } from './providers/ProviderFactory';
import { FfmpegTranscoder } from './audio/FfmpegTranscoder';
import { AudioMixer } from './audio/AudioMixer';
import { AudioPreprocessor } from './audio/AudioPreprocessor';
import { SizeAdaptiveCompressor } from './audio/SizeAdaptiveCompressor';
import { TranscriptionClient } from './services/TranscriptionClient';
import { MinutesPipeline } from './services/MinutesPipeline';
import { RecordingPipeline } from './services/RecordingPipeline';
import { SessionRegistry } from './services/SessionRegistry';
import { RetentionService } from './services/RetentionService';
import { createApp } from './app';
import { logger } from './utils/logger';

function readEnv(): Env {
  try {
    return loadEnv();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error('❌ Invalid environment variables:');
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

const env = readEnv();
const config = buildProviderConfig(env);
const { thresholds } = config;

// Initialize providers and pipeline stages
const providers = createPipelineProviders(config, env);
const transcoder = new FfmpegTranscoder(env.FFMPEG_PATH, env.FFMPEG_TIMEOUT_MS);

const transcriptionClient = new TranscriptionClient(providers.transcription, {
  maxBytes: thresholds.maxBytes,
  timeoutMs: thresholds.transcriptionTimeoutMs,
  retryBackoffMs: thresholds.retryBackoffMs
});

const minutesPipeline = new MinutesPipeline(transcriptionClient, providers.minutes, {
  transcription: {
    language: thresholds.transcriptionLanguage,
    temperature: thresholds.transcriptionTemperature,
    responseFormat: thresholds.responseFormat,
    wordTimestamps: thresholds.wordTimestamps,
    contextHint: thresholds.contextHint
  },
  minutesTemperature: thresholds.minutesTemperature,
  minutesMaxTokens: thresholds.minutesMaxTokens,
  minutesTimeoutMs: thresholds.minutesTimeoutMs,
  retryBackoffMs: thresholds.retryBackoffMs
});

const recordingPipeline = new RecordingPipeline(
  new AudioMixer(config.captureSampleRate),
  new AudioPreprocessor(transcoder, {
    enabled: thresholds.preprocessingEnabled,
    level: thresholds.preprocessingLevel
  }),
  new SizeAdaptiveCompressor(transcoder, thresholds.compressionLadder),
  minutesPipeline,
  {
    outputDir: config.outputDir,
    maxBytes: thresholds.maxBytes,
    meetingTitle: config.meetingTitle,
    contextHint: thresholds.contextHint
  }
);

const registry = new SessionRegistry(recordingPipeline, { outputDir: config.outputDir });

const retention = new RetentionService(
  {
    outputDir: config.outputDir,
    retentionDays: config.retentionDays,
    sweepIntervalMs: env.RETENTION_SWEEP_INTERVAL_MS
  },
  registry
);

const app = createApp({ registry, providers });

const server = app.listen(env.PORT, () => {
  logger.info({
    port: env.PORT,
    env: env.NODE_ENV,
    transcription: providers.transcription.name,
    minutes: providers.minutes.name,
    outputDir: config.outputDir
  }, 'Voice minutes server started');
  retention.start();
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info({ signal, activeRecordings: registry.activeChannels() }, 'Shutting down');
  retention.stop();
  server.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
