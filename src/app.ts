import express from 'express';
import type { Express } from 'express';

import type { OptimizationPipeline } from './pipeline/optimize';
import { PIPELINE_SETTING, UPLOAD_LIMIT_SETTING, errorHandler } from './routes/http';
import optimizationsRouter from './routes/optimizations';
import optimizeRouter from './routes/optimize';

type AppOptions = {
  maxUploadBytes: number;
};

const ENDPOINTS = [
  'POST /optimize',
  'POST /optimize-json',
  'GET /api/optimizations',
  'GET /api/optimizations/:id',
  'DELETE /api/optimizations/:id',
];

export const createApp = (pipeline: OptimizationPipeline, { maxUploadBytes }: AppOptions): Express => {
  const app = express();
  app.set(PIPELINE_SETTING, pipeline);
  app.set(UPLOAD_LIMIT_SETTING, maxUploadBytes);
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req, res) => {
    res.json({ service: 'resume-optimizer', endpoints: ENDPOINTS });
  });

  app.use(optimizeRouter);
  app.use('/api/optimizations', optimizationsRouter);
  app.use(errorHandler);

  return app;
};
