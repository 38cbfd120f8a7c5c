import { describe, expect, it } from 'vitest';

import { formatSelectionCsv, parseUnitsCsv } from '../io/csv.js';

describe('parseUnitsCsv', () => {
  it('reads the header as columns and empty cells as missing', () => {
    const table = parseUnitsCsv('Store_ID,Country,Region\nS1, uk ,North\nS2,,"North, East"\nS3\n');
    expect(table.columns).toEqual(['Store_ID', 'Country', 'Region']);
    expect(table.units).toEqual([
      { Store_ID: 'S1', Country: ' uk ', Region: 'North' },
      { Store_ID: 'S2', Country: null, Region: 'North, East' },
      { Store_ID: 'S3', Country: null, Region: null }
    ]);
  });

  it('strips a byte order mark from the header', () => {
    expect(parseUnitsCsv('\uFEFFStore_ID\nS1\n').columns).toEqual(['Store_ID']);
  });

  it('returns an empty table for empty input', () => {
    expect(parseUnitsCsv('')).toEqual({ columns: [], units: [] });
  });
});

describe('formatSelectionCsv', () => {
  it('writes the given columns in order with a header', () => {
    const csv = formatSelectionCsv(
      [
        { Store_ID: 'S1', Country: 'UK', Region: 'North, East', Extra: 1 },
        { Store_ID: 'S2', Country: null, Region: 'South' }
      ],
      ['Store_ID', 'Country', 'Region']
    );
    expect(csv).toBe('Store_ID,Country,Region\nS1,UK,"North, East"\nS2,,South\n');
  });

  it('writes booleans and numbers as text', () => {
    expect(formatSelectionCsv([{ id: 7, open: true }], ['id', 'open'])).toBe('id,open\n7,true\n');
  });
});
