import express from 'express';
import type { Driver } from 'neo4j-driver';

import { NotFoundError } from '../errors.js';
import { FrameService } from '../services/frameService.js';

/** Read-only access to stored populations. Units are only sent for a single frame. */
export function createFramesRouter(driver: Driver | null): express.Router {
  const frameService = new FrameService(driver);

  return express
    .Router()
    .get('/', async (_req, res) => {
      res.json(await frameService.listFrames());
    })
    .get('/:frameId', async (req, res) => {
      const { frameId } = req.params;
      const frame = await frameService.getFrame(frameId);
      if (!frame) {
        throw new NotFoundError(`Sampling frame ${frameId} not found`);
      }
      res.json(frame);
    });
}
