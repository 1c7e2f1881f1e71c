/**
 * Express app: CORS, health check and the multipart transcription endpoint.
 * Dependencies are passed in so tests can swap the whisper.cpp service.
 */

import express, { Express } from 'express';
import cors from 'cors';
import type { HealthInfo, Transcriber } from '../services/whisper/types';
import { createHealthRoutes } from './routes/health.routes';
import { createTranscribeRoutes } from './routes/transcribe.routes';
import { errorHandler, notFound } from './middleware/errorHandler';

export interface AppDeps {
  health: HealthInfo;
  transcriber: Transcriber;
  maxFileSizeBytes: number;
  uploadDir?: string;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(cors({ origin: true, credentials: true }));

  app.use('/healthz', createHealthRoutes(deps.health));
  app.use(
    '/transcribe',
    createTranscribeRoutes(deps.transcriber, {
      maxFileSizeBytes: deps.maxFileSizeBytes,
      uploadDir: deps.uploadDir,
    })
  );

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
