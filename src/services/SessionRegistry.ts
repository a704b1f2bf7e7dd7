import { mkdir } from 'fs/promises';
import type { PcmFrame } from '../models/AudioFrame';
import type { SessionContext, SessionStatus } from '../models/RecordingSession';
import type { ProcessingResult } from '../models/ProcessingResult';
import { AlreadyRecordingError, NotRecordingError } from '../errors/PipelineError';
import type { IRecordingPipeline } from './RecordingPipeline';
import { RecordingSession } from './RecordingSession';
import { generateSessionId } from '../utils/correlationId';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'SessionRegistry' });

export interface SessionRegistryOptions {
  outputDir: string;
  now?: () => Date;
}

/**
 * Channel → session registry.
 *
 * start(), the stop transition and the final removal run under a per-channel
 * lock; different channels never wait on each other. Frame ingestion takes no
 * lock.
 */
export class SessionRegistry {
  private readonly sessions: Map<string, RecordingSession> = new Map();
  private readonly locks: Map<string, Promise<void>> = new Map();
  private readonly pipeline: IRecordingPipeline;
  private readonly outputDir: string;
  private readonly now: () => Date;

  constructor(pipeline: IRecordingPipeline, options: SessionRegistryOptions) {
    this.pipeline = pipeline;
    this.outputDir = options.outputDir;
    this.now = options.now ?? (() => new Date());
  }

  async start(context: SessionContext): Promise<SessionStatus> {
    return this.withChannelLock(context.channelId, async () => {
      const existing = this.sessions.get(context.channelId);
      if (existing?.isActive) {
        throw new AlreadyRecordingError(context.channelId);
      }

      await mkdir(this.outputDir, { recursive: true });

      const startedAt = this.now();
      const session = new RecordingSession(
        generateSessionId(context.channelId, startedAt),
        context,
        this.pipeline,
        startedAt
      );
      session.start();
      this.sessions.set(context.channelId, session);

      return session.getStatus();
    });
  }

  /**
   * Returns false when the channel is not recording; late frames are dropped
   */
  ingest(channelId: string, speakerId: string, frame: PcmFrame): boolean {
    const session = this.sessions.get(channelId);
    if (!session) {
      logger.debug({ channelId, speakerId }, 'Dropping frame for channel without session');
      return false;
    }

    try {
      session.ingest(speakerId, frame);
      return true;
    } catch (error) {
      if (error instanceof NotRecordingError) {
        logger.debug({ channelId, speakerId, state: session.currentState }, 'Dropping late frame');
        return false;
      }
      throw error;
    }
  }

  /**
   * Stop and process the channel's session. The lookup and the
   * Recording → Stopping transition happen under the channel lock, so a stop
   * queued behind a pending start stops that session. Processing runs outside
   * the lock. A second call while the first is processing rejects with
   * AlreadyStoppingError.
   */
  async stop(channelId: string): Promise<ProcessingResult> {
    const { session, processing } = await this.withChannelLock(channelId, async () => {
      const current = this.sessions.get(channelId);
      if (!current) {
        throw new NotRecordingError(channelId, 'idle');
      }
      // Wrapped so the lock does not wait for the pipeline
      return { session: current, processing: current.stop() };
    });

    const result = await processing;

    await this.withChannelLock(channelId, async () => {
      if (this.sessions.get(channelId) === session) {
        this.sessions.delete(channelId);
      }
    });

    return result;
  }

  getStatus(channelId: string): SessionStatus | undefined {
    return this.sessions.get(channelId)?.getStatus();
  }

  activeChannels(): string[] {
    return Array.from(this.sessions.entries())
      .filter(([, session]) => session.isActive)
      .map(([channelId]) => channelId);
  }

  isArtifactInUse(artifactPath: string): boolean {
    for (const session of this.sessions.values()) {
      if (session.ownsArtifact(artifactPath)) {
        return true;
      }
    }
    return false;
  }

  /** An uncontended lock runs the operation without yielding first */
  private async withChannelLock<T>(channelId: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(channelId);
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous ? previous.then(() => current) : current;
    this.locks.set(channelId, tail);

    if (previous) {
      await previous;
    }
    try {
      return await operation();
    } finally {
      release();
      if (this.locks.get(channelId) === tail) {
        this.locks.delete(channelId);
      }
    }
  }
}
