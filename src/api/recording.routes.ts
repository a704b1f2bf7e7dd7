import { Router, type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import type { SessionRegistry } from '../services/SessionRegistry';
import type { PipelineProviders } from '../providers/ProviderFactory';
import { formatForPresentation } from '../services/ResultFormatter';
import { getOutcome, type ProcessingResult } from '../models/ProcessingResult';
import type { SessionStatus } from '../models/RecordingSession';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'RecordingRoutes' });

const startBodySchema = z.object({
  channelName: z.string().min(1).optional(),
  guildId: z.string().min(1).optional(),
  initiatedBy: z.string().min(1).optional()
});

const frameBodySchema = z.object({
  speakerId: z.string().min(1),
  timestamp: z.number().int().nonnegative(),
  // base64 16-bit PCM
  pcm: z.string().min(1)
});

const channelParamsSchema = z.object({
  channelId: z.string().min(1).max(128)
});

export interface RecordingRouterDeps {
  registry: SessionRegistry;
  providers: PipelineProviders;
}

/**
 * Command surface for the voice client:
 *
 * - POST /channels/:channelId/start   begin recording
 * - POST /channels/:channelId/frames  deliver one speaker frame
 * - POST /channels/:channelId/stop    stop, reply with minutes
 * - POST /channels/:channelId/both    stop, reply with transcript and minutes
 * - GET  /channels/:channelId/status
 * - GET  /status                      providers and active channels
 */
export function createRecordingRouter(deps: RecordingRouterDeps): Router {
  const { registry, providers } = deps;
  const router = Router();

  router.post('/channels/:channelId/start', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { channelId } = channelParamsSchema.parse(req.params);
      const body = startBodySchema.parse(req.body ?? {});
      const status = await registry.start({ channelId, ...body });
      res.status(201).json(serializeStatus(status));
    } catch (error) {
      next(error);
    }
  });

  router.post('/channels/:channelId/frames', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { channelId } = channelParamsSchema.parse(req.params);
      const body = frameBodySchema.parse(req.body);
      const data = Buffer.from(body.pcm, 'base64');
      if (data.length === 0 || data.length % 2 !== 0) {
        res.status(400).json({ error: 'ValidationError', message: 'pcm must hold whole 16-bit samples' });
        return;
      }

      const accepted = registry.ingest(channelId, body.speakerId, { timestamp: body.timestamp, data });
      res.status(accepted ? 202 : 200).json({ accepted });
    } catch (error) {
      next(error);
    }
  });

  const stopHandler = (includeTranscript: boolean) =>
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { channelId } = channelParamsSchema.parse(req.params);
        const result = await registry.stop(channelId);
        logger.info({ channelId, outcome: getOutcome(result) }, 'Recording processed');
        res.json({
          ...serializeResult(result),
          messages: formatForPresentation(result, { includeTranscript })
        });
      } catch (error) {
        next(error);
      }
    };

  router.post('/channels/:channelId/stop', stopHandler(false));
  router.post('/channels/:channelId/both', stopHandler(true));

  router.get('/channels/:channelId/status', (req: Request, res: Response) => {
    const status = registry.getStatus(req.params.channelId);
    if (!status) {
      res.status(404).json({ error: `No session for channel ${req.params.channelId}` });
      return;
    }
    res.json(serializeStatus(status));
  });

  router.get('/status', (_req: Request, res: Response) => {
    res.json({
      transcription: {
        provider: providers.transcription.name,
        configured: providers.transcription.isConfigured()
      },
      minutes: {
        provider: providers.minutes.name,
        configured: providers.minutes.isConfigured()
      },
      activeChannels: registry.activeChannels()
    });
  });

  return router;
}

function serializeStatus(status: SessionStatus) {
  return {
    ...status,
    startedAt: status.startedAt?.toISOString()
  };
}

function serializeResult(result: ProcessingResult) {
  return {
    sessionId: result.sessionId,
    channelId: result.channelId,
    outcome: getOutcome(result),
    transcriptText: result.transcriptText,
    segments: result.transcript?.segments,
    minutesText: result.minutesText,
    errors: result.errors,
    recordingPath: result.recordingPath,
    durationMs: result.durationMs,
    completedAt: result.completedAt.toISOString()
  };
}
