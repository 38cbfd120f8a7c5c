import { readFile, writeFile } from 'node:fs/promises';

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';

import type { UnitRecord } from '../models/types.js';

export type UnitTable = {
  columns: string[];
  units: UnitRecord[];
};

const rowsSchema = z.array(z.array(z.string()));

export function parseUnitsCsv(text: string): UnitTable {
  const rows = rowsSchema.parse(
    parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true
    })
  );
  const [header, ...body] = rows;
  if (!header) {
    return { columns: [], units: [] };
  }
  const columns = header.map((column) => column.trim());
  const units = body.map((row) => {
    const unit: UnitRecord = {};
    columns.forEach((column, index) => {
      const cell = row[index];
      unit[column] = cell === undefined || cell === '' ? null : cell;
    });
    return unit;
  });
  return { columns, units };
}

export function formatSelectionCsv(selection: readonly UnitRecord[], columns: readonly string[]): string {
  return stringify(
    selection.map((unit) => columns.map((column) => unit[column] ?? null)),
    {
      header: true,
      columns: [...columns],
      cast: { boolean: (value) => String(value) }
    }
  );
}

export async function readUnitsCsv(path: string): Promise<UnitTable> {
  return parseUnitsCsv(await readFile(path, 'utf8'));
}

export async function writeSelectionCsv(
  path: string,
  selection: readonly UnitRecord[],
  columns: readonly string[]
): Promise<void> {
  await writeFile(path, formatSelectionCsv(selection, columns), 'utf8');
}
