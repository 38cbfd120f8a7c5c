import { describe, expect, it } from 'vitest';

import { EMPTY_SUMMARY_MESSAGE, formatSummary, summarizeSelection } from '../services/sampleSummary.js';

describe('summarizeSelection', () => {
  const selection = [
    { Store_ID: 'S1', Country: 'UK' },
    { Store_ID: 'S2', Country: 'uk ' },
    { Store_ID: 'S3', Country: 'IE' },
    { Store_ID: 'S4', Country: null }
  ];

  it('counts normalized values per attribute, sorted by value', () => {
    expect(summarizeSelection(selection, ['Country', 'Region'])).toEqual([
      {
        attribute: 'Country',
        entries: [
          { value: 'IE', count: 1, percent: 25 },
          { value: 'UK', count: 2, percent: 50 },
          { value: 'UNKNOWN', count: 1, percent: 25 }
        ]
      }
    ]);
  });

  it('renders one line per value with a one-decimal percentage', () => {
    const thirds = [{ Format: 'Metro' }, { Format: 'Metro' }, { Format: 'Express' }];
    expect(formatSummary(summarizeSelection(thirds, ['Format']), thirds.length)).toEqual([
      '',
      'By Format:',
      '  EXPRESS: 1 (33.3%)',
      '  METRO: 2 (66.7%)'
    ]);
  });

  it('reports an empty selection', () => {
    expect(summarizeSelection([], ['Country'])).toEqual([]);
    expect(formatSummary([], 0)).toEqual([EMPTY_SUMMARY_MESSAGE]);
  });
});
