import { randomUUID } from 'node:crypto';

import type { Driver } from 'neo4j-driver';

import { DEFAULT_SAMPLING_OPTIONS } from '../config.js';
import { ConfigurationError, NotFoundError } from '../errors.js';
import type { AttributeSummary, SampleRun, SampleSeed, UnitRecord } from '../models/types.js';
import { logger } from '../utils/logger.js';
import { FrameService } from './frameService.js';
import { summarizeSelection } from './sampleSummary.js';
import { planStratifiedSample } from './stratifiedSampler.js';

export type CreateSampleRequest = {
  frameId?: string;
  units?: UnitRecord[];
  columns?: string[];
  idAttr?: string;
  stratAttrs?: string[];
  targetN: number;
  seed: SampleSeed;
  minPerStratum: number;
};

type ResolvedPopulation = {
  frameId: string | null;
  units: UnitRecord[];
  columns: string[] | undefined;
  idAttr: string;
  stratAttrs: string[];
};

function columnsOf(units: readonly UnitRecord[]): string[] {
  return [...new Set(units.flatMap((unit) => Object.keys(unit)))];
}

export class SampleService {
  private readonly runs = new Map<string, SampleRun>();
  private readonly frameService: FrameService;

  constructor(driver: Driver | null) {
    this.frameService = new FrameService(driver);
  }

  private async resolvePopulation(request: CreateSampleRequest): Promise<ResolvedPopulation> {
    if (request.units) {
      return {
        frameId: null,
        units: request.units,
        columns: request.columns,
        idAttr: request.idAttr ?? DEFAULT_SAMPLING_OPTIONS.idAttr,
        stratAttrs: request.stratAttrs ?? [...DEFAULT_SAMPLING_OPTIONS.stratAttrs]
      };
    }
    if (!request.frameId) {
      throw new ConfigurationError('Either frameId or units must be provided', []);
    }
    const frame = await this.frameService.getFrame(request.frameId);
    if (!frame) {
      throw new NotFoundError(`Sampling frame ${request.frameId} not found`);
    }
    return {
      frameId: frame.id,
      units: frame.units,
      columns: request.columns,
      idAttr: request.idAttr ?? frame.idAttr,
      stratAttrs: request.stratAttrs ?? frame.stratAttrs
    };
  }

  async createSample(request: CreateSampleRequest): Promise<SampleRun> {
    const population = await this.resolvePopulation(request);
    const options = {
      idAttr: population.idAttr,
      stratAttrs: population.stratAttrs,
      targetN: request.targetN,
      seed: request.seed,
      minPerStratum: request.minPerStratum
    };

    const { selection, diagnostics } = planStratifiedSample(population.units, {
      ...options,
      columns: population.columns
    });

    if (diagnostics.duplicateIds.length > 0) {
      logger.warn(
        { idAttr: options.idAttr, duplicateIds: diagnostics.duplicateIds.slice(0, 20) },
        'Population contains duplicate identifiers; they are sampled as separate units'
      );
    }
    if (diagnostics.toppedUp > 0) {
      logger.info(
        { toppedUp: diagnostics.toppedUp, effectiveTotal: diagnostics.effectiveTotal },
        'Stratum draws fell short; topped up from the remaining pool'
      );
    }

    const run: SampleRun = {
      id: randomUUID(),
      frameId: population.frameId,
      options,
      columns: population.columns ?? columnsOf(population.units),
      selection,
      diagnostics,
      createdAt: new Date().toISOString()
    };
    this.runs.set(run.id, run);
    logger.info(
      { sampleId: run.id, frameId: run.frameId, size: selection.length, strata: diagnostics.strata.length },
      'Sample drawn'
    );
    return run;
  }

  getSample(sampleId: string): SampleRun {
    const run = this.runs.get(sampleId);
    if (!run) {
      throw new NotFoundError('Sample not found');
    }
    return run;
  }

  getSummary(sampleId: string): AttributeSummary[] {
    const run = this.getSample(sampleId);
    return summarizeSelection(run.selection, run.options.stratAttrs);
  }
}
