import path from 'path';
import { AudioBuffer } from '../audio/AudioBuffer';
import type { PcmFrame } from '../models/AudioFrame';
import { SessionState, type SessionContext, type SessionStatus } from '../models/RecordingSession';
import { toStageError, type ProcessingResult } from '../models/ProcessingResult';
import {
  AlreadyRecordingError,
  AlreadyStoppingError,
  NotRecordingError
} from '../errors/PipelineError';
import type { IRecordingPipeline } from './RecordingPipeline';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'RecordingSession' });

/**
 * One voice-channel capture.
 *
 * Idle → Recording → Stopping → Finalized | Failed
 *
 * State transitions happen synchronously before any await, so two callers
 * racing on stop() can never both get past the Recording check.
 */
export class RecordingSession {
  readonly sessionId: string;
  readonly context: SessionContext;
  readonly startedAt: Date;

  private readonly pipeline: IRecordingPipeline;
  private readonly buffers: Map<string, AudioBuffer> = new Map();
  private readonly artifacts: Set<string> = new Set();
  private state: SessionState = SessionState.IDLE;
  private result?: ProcessingResult;

  constructor(sessionId: string, context: SessionContext, pipeline: IRecordingPipeline, startedAt: Date = new Date()) {
    this.sessionId = sessionId;
    this.context = context;
    this.pipeline = pipeline;
    this.startedAt = startedAt;
  }

  get currentState(): SessionState {
    return this.state;
  }

  /** Recording or Stopping: the session still holds its channel */
  get isActive(): boolean {
    return this.state === SessionState.RECORDING || this.state === SessionState.STOPPING;
  }

  get processingResult(): ProcessingResult | undefined {
    return this.result;
  }

  start(): void {
    if (this.state !== SessionState.IDLE) {
      throw new AlreadyRecordingError(this.context.channelId);
    }

    this.buffers.clear();
    this.state = SessionState.RECORDING;
    logger.info({ sessionId: this.sessionId, channelId: this.context.channelId }, 'Recording started');
  }

  /**
   * @throws NotRecordingError outside Recording; the frame is not buffered
   */
  ingest(speakerId: string, frame: PcmFrame): void {
    if (this.state !== SessionState.RECORDING) {
      throw new NotRecordingError(this.context.channelId, this.state);
    }

    let buffer = this.buffers.get(speakerId);
    if (!buffer) {
      buffer = new AudioBuffer(speakerId);
      this.buffers.set(speakerId, buffer);
      logger.debug({ sessionId: this.sessionId, speakerId }, 'New speaker');
    }
    buffer.append(frame);
  }

  async stop(): Promise<ProcessingResult> {
    if (this.state === SessionState.STOPPING) {
      throw new AlreadyStoppingError(this.context.channelId);
    }
    if (this.state !== SessionState.RECORDING) {
      throw new NotRecordingError(this.context.channelId, this.state);
    }

    this.state = SessionState.STOPPING;
    const buffers = Array.from(this.buffers.values());
    for (const buffer of buffers) {
      buffer.freeze();
    }

    logger.info({
      sessionId: this.sessionId,
      speakers: buffers.length,
      bytes: buffers.reduce((sum, buffer) => sum + buffer.byteLength, 0)
    }, 'Recording stopped, processing');

    let result: ProcessingResult;
    try {
      result = await this.pipeline.process({
        sessionId: this.sessionId,
        startedAt: this.startedAt,
        context: this.context,
        buffers,
        onArtifact: (artifactPath) => this.artifacts.add(path.resolve(artifactPath))
      });
    } catch (error) {
      logger.error({ sessionId: this.sessionId, error }, 'Pipeline rejected unexpectedly');
      result = {
        sessionId: this.sessionId,
        channelId: this.context.channelId,
        errors: [toStageError(error, 'session')],
        completedAt: new Date()
      };
    }

    this.result = result;
    this.state = result.minutesText !== undefined ? SessionState.FINALIZED : SessionState.FAILED;
    logger.info({ sessionId: this.sessionId, state: this.state, errors: result.errors.length }, 'Session settled');
    return result;
  }

  /** True while the session is active and a pipeline stage wrote this file */
  ownsArtifact(artifactPath: string): boolean {
    return this.isActive && this.artifacts.has(path.resolve(artifactPath));
  }

  getStatus(): SessionStatus {
    return {
      sessionId: this.sessionId,
      channelId: this.context.channelId,
      state: this.state,
      startedAt: this.startedAt,
      speakers: Array.from(this.buffers.values(), (buffer) => ({
        speakerId: buffer.speakerId,
        frames: buffer.frameCount,
        bytes: buffer.byteLength
      }))
    };
  }
}
