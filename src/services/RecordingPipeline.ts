import path from 'path';
import type { AudioBuffer } from '../audio/AudioBuffer';
import type { AudioMixer } from '../audio/AudioMixer';
import type { AudioPreprocessor } from '../audio/AudioPreprocessor';
import type { SizeAdaptiveCompressor } from '../audio/SizeAdaptiveCompressor';
import type { MinutesPipeline } from './MinutesPipeline';
import type { SessionContext } from '../models/RecordingSession';
import type { AudioArtifact, MixedRecording } from '../models/AudioFrame';
import { toStageError, type ProcessingResult, type StageError } from '../models/ProcessingResult';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'RecordingPipeline' });

export interface PipelineInput {
  sessionId: string;
  startedAt: Date;
  context: SessionContext;
  /** Frozen buffers in first-heard order */
  buffers: readonly AudioBuffer[];
  /** Called with every file the run writes, before any later stage reads it */
  onArtifact?: (artifactPath: string) => void;
}

export interface IRecordingPipeline {
  process(input: PipelineInput): Promise<ProcessingResult>;
}

export interface RecordingPipelineOptions {
  outputDir: string;
  maxBytes: number;
  meetingTitle: string;
  contextHint?: string;
}

/**
 * Stop-time pipeline for one session:
 * mix/encode → preprocess → compress → transcribe → minutes
 *
 * Never rejects: every failure is reported in ProcessingResult.errors.
 * Mixing and compression failures abort before any network call.
 */
export class RecordingPipeline implements IRecordingPipeline {
  private readonly mixer: AudioMixer;
  private readonly preprocessor: AudioPreprocessor;
  private readonly compressor: SizeAdaptiveCompressor;
  private readonly minutesPipeline: MinutesPipeline;
  private readonly options: RecordingPipelineOptions;

  constructor(
    mixer: AudioMixer,
    preprocessor: AudioPreprocessor,
    compressor: SizeAdaptiveCompressor,
    minutesPipeline: MinutesPipeline,
    options: RecordingPipelineOptions
  ) {
    this.mixer = mixer;
    this.preprocessor = preprocessor;
    this.compressor = compressor;
    this.minutesPipeline = minutesPipeline;
    this.options = options;
  }

  async process(input: PipelineInput): Promise<ProcessingResult> {
    const { sessionId, context } = input;
    const errors: StageError[] = [];
    const finish = (extra: Partial<ProcessingResult> = {}): ProcessingResult => ({
      sessionId,
      channelId: context.channelId,
      errors,
      completedAt: new Date(),
      ...extra
    });

    logger.info({ sessionId, speakers: input.buffers.length }, 'Processing recording');

    // 1. Mix + encode
    let recording: MixedRecording;
    try {
      const outputPath = path.join(this.options.outputDir, `recording_${sanitize(sessionId)}.wav`);
      input.onArtifact?.(outputPath);
      recording = await this.mixer.mixToFile(input.buffers, outputPath);
    } catch (error) {
      errors.push(toStageError(error, 'mix'));
      logger.error({ sessionId, error }, 'Mixing failed, aborting pipeline');
      return finish();
    }

    const recordingInfo = { recordingPath: recording.path, durationMs: recording.durationMs };

    // 2. Preprocess (non-fatal)
    const preprocessed = await this.preprocessor.process(recording);
    input.onArtifact?.(preprocessed.artifact.path);
    if (preprocessed.warning) {
      errors.push(toStageError(preprocessed.warning, 'preprocess', 'warning'));
    }

    // 3. Fit the upload limit
    let upload: AudioArtifact;
    try {
      const compressed = await this.compressor.fit(preprocessed.artifact, this.options.maxBytes);
      upload = compressed.artifact;
      input.onArtifact?.(upload.path);
    } catch (error) {
      errors.push(toStageError(error, 'compress'));
      logger.error({ sessionId, error }, 'Compression failed, aborting pipeline');
      return finish(recordingInfo);
    }

    // 4 + 5. Transcript → minutes
    const generated = await this.minutesPipeline.run(upload, {
      meetingTitle: this.options.meetingTitle,
      startedAt: input.startedAt,
      participants: input.buffers.filter((buffer) => !buffer.isEmpty).map((buffer) => buffer.speakerId),
      channelName: context.channelName,
      vocabulary: this.options.contextHint
    });
    errors.push(...generated.errors);

    const result = finish({
      ...recordingInfo,
      transcript: generated.transcript,
      transcriptText: generated.transcript?.text,
      minutesText: generated.minutesText
    });

    logger.info({
      sessionId,
      transcriptChars: result.transcriptText?.length ?? 0,
      minutesChars: result.minutesText?.length ?? 0,
      errors: errors.length
    }, 'Recording processed');

    return result;
  }
}

function sanitize(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]/g, '_');
}
