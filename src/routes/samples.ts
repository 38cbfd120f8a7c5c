import express from 'express';
import type { Driver } from 'neo4j-driver';
import { z } from 'zod';

import { formatSelectionCsv } from '../io/csv.js';
import { SampleService } from '../services/sampleService.js';

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const createSampleSchema = z
  .object({
    frameId: z.string().min(1).optional(),
    units: z.array(z.record(cellSchema)).optional(),
    columns: z.array(z.string().min(1)).optional(),
    idAttr: z.string().min(1).optional(),
    stratAttrs: z.array(z.string().min(1)).optional(),
    targetN: z.number().int().nonnegative(),
    seed: z.union([z.number().int(), z.string().min(1), z.null()]).default(null),
    minPerStratum: z.number().int().nonnegative().default(1)
  })
  .refine((body) => body.frameId !== undefined || body.units !== undefined, {
    message: 'Either frameId or units must be provided',
    path: ['frameId']
  });

export function createSamplesRouter(driver: Driver | null): express.Router {
  const router = express.Router();
  const sampleService = new SampleService(driver);

  router.post('/', async (req, res) => {
    const parseResult = createSampleSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid payload', issues: parseResult.error.issues });
      return;
    }
    const run = await sampleService.createSample(parseResult.data);
    res.status(201).json(run);
  });

  router.get('/:sampleId', (req, res) => {
    res.json(sampleService.getSample(req.params.sampleId));
  });

  router.get('/:sampleId/summary', (req, res) => {
    res.json(sampleService.getSummary(req.params.sampleId));
  });

  router.get('/:sampleId/export/selection.csv', (req, res) => {
    const run = sampleService.getSample(req.params.sampleId);
    res.setHeader('Content-Type', 'text/csv');
    res.setHeader('Content-Disposition', `attachment; filename="${run.id}-selection.csv"`);
    res.send(formatSelectionCsv(run.selection, run.columns));
  });

  return router;
}
