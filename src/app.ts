import express, { type Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import pinoHttp from 'pino-http';
import { logger } from './utils/logger';
import { generateCorrelationId } from './utils/correlationId';
import { createRecordingRouter, type RecordingRouterDeps } from './api/recording.routes';
import { errorHandler } from './middleware/errorHandler';

export function createApp(deps: RecordingRouterDeps): Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  // Frames arrive as base64 PCM
  app.use(express.json({ limit: '5mb' }));
  app.use(pinoHttp({
    logger,
    genReqId: () => generateCorrelationId(),
    autoLogging: false
  }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      activeRecordings: deps.registry.activeChannels().length
    });
  });

  app.use('/api', createRecordingRouter(deps));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
