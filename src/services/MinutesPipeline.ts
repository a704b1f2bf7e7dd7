import type { IMinutesProvider, MinutesContext } from '../providers/ai/IMinutesProvider';
import type { AudioArtifact } from '../models/AudioFrame';
import { toStageError, type StageError, type Transcript } from '../models/ProcessingResult';
import type { TranscriptionClient, TranscribeRequestOptions } from './TranscriptionClient';
import { TransientNetworkError } from '../errors/PipelineError';
import { MAX_RETRIES } from '../config/constants';
import { withRetry, withTimeout } from '../utils/retry';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'MinutesPipeline' });

export interface MinutesPipelineOptions {
  transcription: TranscribeRequestOptions;
  minutesTemperature: number;
  minutesMaxTokens: number;
  minutesTimeoutMs: number;
  retryBackoffMs: number;
}

export interface MinutesPipelineResult {
  transcript?: Transcript;
  minutesText?: string;
  errors: StageError[];
}

/**
 * Two-stage generation: transcript, then minutes from the transcript.
 *
 * Stages run strictly in order. A minutes failure keeps the transcript and adds
 * one minutes-stage error entry (partial success).
 */
export class MinutesPipeline {
  private readonly transcriptionClient: TranscriptionClient;
  private readonly minutesProvider: IMinutesProvider;
  private readonly options: MinutesPipelineOptions;

  constructor(
    transcriptionClient: TranscriptionClient,
    minutesProvider: IMinutesProvider,
    options: MinutesPipelineOptions
  ) {
    this.transcriptionClient = transcriptionClient;
    this.minutesProvider = minutesProvider;
    this.options = options;
  }

  async run(audio: AudioArtifact, context: MinutesContext): Promise<MinutesPipelineResult> {
    let transcript: Transcript;
    try {
      transcript = await this.transcriptionClient.transcribe(audio, this.options.transcription);
    } catch (error) {
      const entry = toStageError(error, 'transcription');
      logger.error({ kind: entry.kind, message: entry.message }, 'Transcription stage failed');
      return { errors: [entry] };
    }

    try {
      const minutesText = await this.generateMinutes(transcript.text, context);
      return { transcript, minutesText, errors: [] };
    } catch (error) {
      const entry = toStageError(error, 'minutes');
      logger.warn({
        kind: entry.kind,
        message: entry.message,
        provider: this.minutesProvider.name
      }, 'Minutes stage failed, keeping transcript');
      return { transcript, errors: [entry] };
    }
  }

  private async generateMinutes(transcriptText: string, context: MinutesContext): Promise<string> {
    const minutes = await withRetry(
      () =>
        withTimeout(
          (signal) =>
            this.minutesProvider.generateMinutes(transcriptText, context, {
              temperature: this.options.minutesTemperature,
              maxTokens: this.options.minutesMaxTokens,
              signal
            }),
          this.options.minutesTimeoutMs,
          'minutes'
        ),
      {
        retries: MAX_RETRIES,
        backoffMs: this.options.retryBackoffMs,
        shouldRetry: (error) => error instanceof TransientNetworkError,
        label: 'minutes'
      }
    );

    logger.info({ provider: this.minutesProvider.name, characters: minutes.length }, 'Minutes generated');
    return minutes;
  }
}
