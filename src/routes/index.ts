import type { Driver } from 'neo4j-driver';
import type express from 'express';

import { createFramesRouter } from './frames.js';
import { createSamplesRouter } from './samples.js';

export function registerRoutes(app: express.Express, driver: Driver | null): void {
  app.get('/api/v1/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/v1/frames', createFramesRouter(driver));
  app.use('/api/v1/samples', createSamplesRouter(driver));
}
