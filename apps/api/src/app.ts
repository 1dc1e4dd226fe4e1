import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { ClockPort, TrackSampleRepositoryPort } from '@trackfold/domain';
import {
  getPool,
  InMemoryTrackSampleRepository,
  PgTrackSampleRepository,
  SystemClock,
} from '@trackfold/adapters';

import type { AppConfig } from './config/app-config.js';
import { loadConfig } from './config/app-config.js';
import { compressionRouter } from './controllers/compression.controller.js';
import { sessionsRouter } from './controllers/sessions.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import { TrackCompressionService } from './services/compression/track-compression.service.js';

export interface AppDeps {
  config: AppConfig;
  repository: TrackSampleRepositoryPort;
  clock: ClockPort;
}

/** Wires the configured sample store. */
export function createDeps(config: AppConfig = loadConfig()): AppDeps {
  const clock = new SystemClock();
  const repository =
    config.trackStore === 'memory'
      ? new InMemoryTrackSampleRepository(clock)
      : new PgTrackSampleRepository(getPool(config.database));
  return { config, repository, clock };
}

export function buildApp(deps: AppDeps = createDeps()): ReturnType<typeof express> {
  const app = express();
  const compression = new TrackCompressionService(
    deps.repository,
    deps.clock,
    deps.config.compression,
  );

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: deps.config.corsOrigin }));
  app.use(morgan('combined'));
  app.use(express.json({ limit: deps.config.jsonBodyLimit }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/compression', compressionRouter);
  app.use('/api/sessions', sessionsRouter(compression));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      store: deps.config.trackStore,
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
