import { ConfigurationError } from '../errors.js';
import type {
  CellValue,
  SamplingOptions,
  SamplingResult,
  StratumKey,
  StratumPlan,
  UnitRecord
} from '../models/types.js';
import { allocateQuotas } from './quotaAllocator.js';
import { createRandomSource, drawWithoutReplacement, nextSubSeed } from './random.js';
import { buildStratumKey, compareStratumKeys, isMissing, normalizeAttribute, stratumKeyId } from './stratumKey.js';

type Stratum = {
  id: string;
  key: StratumKey;
  units: UnitRecord[];
};

function collectColumns(units: readonly UnitRecord[]): Set<string> {
  const columns = new Set<string>();
  for (const unit of units) {
    for (const column of Object.keys(unit)) {
      columns.add(column);
    }
  }
  return columns;
}

function assertColumns(columns: ReadonlySet<string>, options: SamplingOptions): void {
  if (!columns.has(options.idAttr)) {
    throw new ConfigurationError(`Missing required ID column: ${options.idAttr}`, [options.idAttr]);
  }
  const missing = options.stratAttrs.filter((attribute) => !columns.has(attribute));
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing stratification columns: ${missing.join(', ')}`, missing);
  }
}

function assertValidOptions(units: readonly UnitRecord[], options: SamplingOptions): void {
  // An empty population without a header has no columns to check against.
  if (options.columns) {
    assertColumns(new Set(options.columns), options);
  } else if (units.length > 0) {
    assertColumns(collectColumns(units), options);
  }

  if (!Number.isInteger(options.targetN)) {
    throw new ConfigurationError(`targetN must be an integer, got ${options.targetN}`, []);
  }
  const minPerStratum = options.minPerStratum ?? 1;
  if (!Number.isInteger(minPerStratum) || minPerStratum < 0) {
    throw new ConfigurationError(`minPerStratum must be a non-negative integer, got ${minPerStratum}`, []);
  }
}

/** Copy of `unit` with its stratification values replaced by their normalized form. */
function withNormalizedStrata(unit: UnitRecord, stratAttrs: readonly string[]): UnitRecord {
  const copy: UnitRecord = { ...unit };
  for (const attribute of stratAttrs) {
    copy[attribute] = normalizeAttribute(unit[attribute]);
  }
  return copy;
}

function idText(value: CellValue): string {
  return String(value);
}

function findDuplicateIds(units: readonly UnitRecord[], idAttr: string): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const unit of units) {
    const id = idText(unit[idAttr]);
    if (seen.has(id)) {
      duplicates.add(id);
    }
    seen.add(id);
  }
  return [...duplicates];
}

function groupByStratum(units: readonly UnitRecord[], stratAttrs: readonly string[]): Stratum[] {
  const strata = new Map<string, Stratum>();
  for (const unit of units) {
    const key = buildStratumKey(unit, stratAttrs);
    const id = stratumKeyId(key);
    const stratum = strata.get(id);
    if (stratum) {
      stratum.units.push(unit);
    } else {
      strata.set(id, { id, key, units: [unit] });
    }
  }
  return [...strata.values()].sort((a, b) => compareStratumKeys(a.key, b.key));
}

/**
 * Stratified draw without replacement, with diagnostics.
 *
 * Units without an identifier are dropped, the rest are grouped by their
 * normalized stratum key and quotas come from {@link allocateQuotas}. Strata
 * are visited in key order, each drawing from its own sub-seed taken from a
 * single run-wide stream; if the strata leave the sample short, the gap is
 * filled from every unit not yet selected (identifiers compared as text).
 *
 * Selected records are copies whose stratification attributes hold the
 * normalized values; the input records are not modified.
 *
 * Units sharing an identifier are not merged. They are reported in
 * `diagnostics.duplicateIds` and may both be selected.
 */
export function planStratifiedSample(units: readonly UnitRecord[], options: SamplingOptions): SamplingResult {
  assertValidOptions(units, options);
  const { idAttr, stratAttrs, targetN, seed } = options;
  const minPerStratum = options.minPerStratum ?? 1;

  const population = units
    .filter((unit) => !isMissing(unit[idAttr]))
    .map((unit) => withNormalizedStrata(unit, stratAttrs));
  const strata = groupByStratum(population, stratAttrs);
  const capacities = new Map(strata.map((stratum): [string, number] => [stratum.id, stratum.units.length]));
  const effectiveTotal = Math.min(Math.max(targetN, 0), population.length);
  const quotas = allocateQuotas(effectiveTotal, capacities, minPerStratum);

  const source = createRandomSource(seed);
  const selection: UnitRecord[] = [];
  const plans: StratumPlan[] = [];

  for (const stratum of strata) {
    const quota = quotas.get(stratum.id) ?? 0;
    let drawn = 0;
    if (quota > 0) {
      const picked = drawWithoutReplacement(
        stratum.units,
        Math.min(quota, stratum.units.length),
        nextSubSeed(source)
      );
      for (const unit of picked) {
        selection.push(unit);
      }
      drawn = picked.length;
    }
    plans.push({ key: stratum.key, capacity: stratum.units.length, quota, drawn });
  }

  let toppedUp = 0;
  if (selection.length < effectiveTotal) {
    const need = effectiveTotal - selection.length;
    const selectedIds = new Set(selection.map((unit) => idText(unit[idAttr])));
    const remaining = population.filter((unit) => !selectedIds.has(idText(unit[idAttr])));
    if (remaining.length > 0) {
      const additional = drawWithoutReplacement(remaining, Math.min(need, remaining.length), nextSubSeed(source));
      for (const unit of additional) {
        selection.push(unit);
      }
      toppedUp = additional.length;
    }
  }

  return {
    selection,
    diagnostics: {
      populationSize: population.length,
      droppedMissingId: units.length - population.length,
      duplicateIds: findDuplicateIds(population, idAttr),
      effectiveTotal,
      strata: plans,
      toppedUp
    }
  } satisfies SamplingResult;
}

export function stratifiedSample(units: readonly UnitRecord[], options: SamplingOptions): UnitRecord[] {
  return planStratifiedSample(units, options).selection;
}
