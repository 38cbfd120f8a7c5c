import 'express-async-errors';
import cors from 'cors';
import express from 'express';
import type { Driver } from 'neo4j-driver';

import type { AppConfig } from './config.js';
import { ConfigurationError, NotFoundError } from './errors.js';
import { registerRoutes } from './routes/index.js';
import { logger } from './utils/logger.js';

const handleErrors: express.ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof ConfigurationError) {
    res.status(400).json({ message: err.message, missing: err.missing });
    return;
  }
  if (err instanceof NotFoundError) {
    res.status(404).json({ message: err.message });
    return;
  }
  logger.error({ err, method: req.method, path: req.path }, 'Request failed');
  res.status(500).json({ message: 'Internal server error' });
};

export function createApp(config: Pick<AppConfig, 'jsonLimit'>, driver: Driver | null): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: config.jsonLimit }));

  registerRoutes(app, driver);
  app.use(handleErrors);

  return app;
}
