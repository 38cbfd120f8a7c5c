import { readFileSync } from 'node:fs';

import neo4j, { type Driver } from 'neo4j-driver';
import { z } from 'zod';

import type { CellValue, FrameListing, SamplingFrame, UnitRecord } from '../models/types.js';
import { logger } from '../utils/logger.js';

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const seedFileSchema = z.object({
  frameId: z.string().min(1),
  name: z.string(),
  description: z.string(),
  idAttr: z.string().min(1),
  stratAttrs: z.array(z.string().min(1)),
  units: z.array(z.record(cellSchema))
});

const listingSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  idAttr: z.string().min(1),
  stratAttrs: z.array(z.string())
});

const unitPropertiesSchema = z.array(z.record(z.unknown()));

const SEED_FRAME_URL = new URL('../../data/demo_store_frame.json', import.meta.url);

let seedFrame: SamplingFrame | null = null;

export function loadSeedFrame(): SamplingFrame {
  if (!seedFrame) {
    const seed = seedFileSchema.parse(JSON.parse(readFileSync(SEED_FRAME_URL, 'utf8')));
    seedFrame = {
      id: seed.frameId,
      name: seed.name,
      description: seed.description,
      idAttr: seed.idAttr,
      stratAttrs: seed.stratAttrs,
      units: seed.units
    };
  }
  return seedFrame;
}

function toListing({ id, name, description, idAttr, stratAttrs }: SamplingFrame): FrameListing {
  return { id, name, description, idAttr, stratAttrs };
}

/** Unit properties as stored in Neo4j, with driver integers turned into numbers. */
export function fromNeo4jValue(value: unknown): CellValue {
  if (neo4j.isInt(value)) {
    return value.toNumber();
  }
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

function toUnit(properties: Record<string, unknown>): UnitRecord {
  const unit: UnitRecord = {};
  for (const [key, value] of Object.entries(properties)) {
    unit[key] = fromNeo4jValue(value);
  }
  return unit;
}

export class FrameService {
  constructor(private readonly driver: Driver | null) {}

  async listFrames(): Promise<FrameListing[]> {
    const fallback = [toListing(loadSeedFrame())];
    if (!this.driver) {
      return fallback;
    }
    const session = this.driver.session();
    try {
      const result = await session.run(
        `MATCH (f:SamplingFrame)
         RETURN f.id AS id, f.name AS name, f.description AS description,
                f.idAttr AS idAttr, f.stratAttrs AS stratAttrs
         ORDER BY f.name`
      );
      if (result.records.length === 0) {
        return fallback;
      }
      return result.records.map((record) => listingSchema.parse(record.toObject()));
    } catch (error) {
      logger.warn({ error }, 'Falling back to seed frame list');
      return fallback;
    } finally {
      await session.close();
    }
  }

  async getFrame(id: string): Promise<SamplingFrame | null> {
    const seed = loadSeedFrame();
    if (id === seed.id) {
      return seed;
    }
    if (!this.driver) {
      return null;
    }
    const session = this.driver.session();
    try {
      const result = await session.run(
        `MATCH (f:SamplingFrame { id: $id })
         OPTIONAL MATCH (f)-[:HAS_UNIT]->(u:Unit)
         WITH f, collect(properties(u)) AS units
         RETURN f.id AS id, f.name AS name, f.description AS description,
                f.idAttr AS idAttr, f.stratAttrs AS stratAttrs, units`,
        { id }
      );
      const [record] = result.records;
      if (!record) {
        return null;
      }
      const listing = listingSchema.parse(record.toObject());
      const units = unitPropertiesSchema.parse(record.get('units')).map(toUnit);
      return { ...listing, units } satisfies SamplingFrame;
    } catch (error) {
      logger.warn({ error, frameId: id }, 'Failed to load sampling frame');
      return null;
    } finally {
      await session.close();
    }
  }
}
