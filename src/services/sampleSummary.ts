import type { AttributeSummary, UnitRecord } from '../models/types.js';
import { normalizeAttribute } from './stratumKey.js';

export const EMPTY_SUMMARY_MESSAGE = 'No rows selected; nothing to summarise.';

export function summarizeSelection(selection: readonly UnitRecord[], attributes: readonly string[]): AttributeSummary[] {
  if (selection.length === 0) {
    return [];
  }
  const present = new Set(selection.flatMap((unit) => Object.keys(unit)));
  const total = selection.length;

  return attributes
    .filter((attribute) => present.has(attribute))
    .map((attribute) => {
      const counts = new Map<string, number>();
      for (const unit of selection) {
        const value = normalizeAttribute(unit[attribute]);
        counts.set(value, (counts.get(value) ?? 0) + 1);
      }
      const entries = [...counts.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([value, count]) => ({ value, count, percent: (count / total) * 100 }));
      return { attribute, entries };
    });
}

export function formatSummary(summaries: readonly AttributeSummary[], selectionSize: number): string[] {
  if (selectionSize === 0) {
    return [EMPTY_SUMMARY_MESSAGE];
  }
  const lines: string[] = [];
  for (const summary of summaries) {
    lines.push('', `By ${summary.attribute}:`);
    for (const entry of summary.entries) {
      lines.push(`  ${entry.value}: ${entry.count} (${entry.percent.toFixed(1)}%)`);
    }
  }
  return lines;
}
