import type { CellValue, StratumKey, UnitRecord } from '../models/types.js';

export const UNKNOWN_STRATUM_VALUE = 'UNKNOWN';

export function isMissing(value: CellValue): boolean {
  if (value === null || value === undefined || value === '') {
    return true;
  }
  return typeof value === 'number' && Number.isNaN(value);
}

export function normalizeAttribute(value: CellValue): string {
  if (isMissing(value)) {
    return UNKNOWN_STRATUM_VALUE;
  }
  const text = String(value).trim().toUpperCase();
  return text === '' ? UNKNOWN_STRATUM_VALUE : text;
}

export function buildStratumKey(unit: UnitRecord, attributes: readonly string[]): StratumKey {
  return attributes.map((attribute) => normalizeAttribute(unit[attribute]));
}

export function stratumKeyId(key: StratumKey): string {
  return JSON.stringify(key);
}

export function compareStratumKeys(a: StratumKey, b: StratumKey): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  return a.length - b.length;
}
