import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { expandListFlag, runCli, USAGE } from '../cli.js';

const INPUT = [
  'Store_ID,Country,Region',
  'S1,UK,North',
  'S2,UK,North',
  'S3,uk,South',
  'S4,UK,South',
  'S5,IE,Leinster',
  'S6,IE,Leinster',
  'S7,IE,Munster',
  'S8,IE,Munster',
  ',UK,North'
].join('\n');

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, output: { out: (line: string) => out.push(line), err: (line: string) => err.push(line) } };
}

describe('expandListFlag', () => {
  it('splits space separated stratification columns into repeated flags', () => {
    expect(expandListFlag(['in.csv', 'out.csv', '--strat-cols', 'Country', 'Region', '--seed', '3'])).toEqual([
      'in.csv',
      'out.csv',
      '--strat-cols',
      'Country',
      '--strat-cols',
      'Region',
      '--seed',
      '3'
    ]);
  });

  it('leaves other arguments alone', () => {
    expect(expandListFlag(['in.csv', 'out.csv', '--target-n', '5'])).toEqual(['in.csv', 'out.csv', '--target-n', '5']);
  });
});

describe('runCli', () => {
  let dir: string;
  let inputPath: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stratified-sample-'));
    inputPath = join(dir, 'stores.csv');
    outputPath = join(dir, 'sample.csv');
    await writeFile(inputPath, INPUT, 'utf8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('samples a CSV file and prints the distribution', async () => {
    const { out, output } = capture();
    const code = await runCli(
      [inputPath, outputPath, '--target-n', '4', '--strat-cols', 'Country', '--seed', '1'],
      output
    );

    expect(code).toBe(0);
    expect(out).toEqual([
      `Loaded 9 rows from ${inputPath}`,
      '',
      `Saved 4 rows to ${outputPath}`,
      '',
      'By Country:',
      '  IE: 2 (50.0%)',
      '  UK: 2 (50.0%)'
    ]);

    const lines = (await readFile(outputPath, 'utf8')).trimEnd().split('\n');
    expect(lines[0]).toBe('Store_ID,Country,Region');
    expect(lines).toHaveLength(5);
  });

  it('writes the normalized stratification values to the output file', async () => {
    const { output } = capture();
    expect(await runCli([inputPath, outputPath, '--target-n', '8', '--strat-cols', 'Country'], output)).toBe(0);

    const rows = (await readFile(outputPath, 'utf8')).trimEnd().split('\n').slice(1).sort();
    expect(rows).toEqual([
      'S1,UK,North',
      'S2,UK,North',
      'S3,UK,South',
      'S4,UK,South',
      'S5,IE,Leinster',
      'S6,IE,Leinster',
      'S7,IE,Munster',
      'S8,IE,Munster'
    ]);
  });

  it('accepts stratification columns space separated, comma separated or repeated', async () => {
    const first = capture();
    await runCli([inputPath, outputPath, '--target-n', '4', '--strat-cols', 'Country,Region'], first.output);
    const commaCsv = await readFile(outputPath, 'utf8');

    await runCli(
      [inputPath, outputPath, '--target-n', '4', '--strat-cols', 'Country', '--strat-cols', 'Region'],
      capture().output
    );
    expect(await readFile(outputPath, 'utf8')).toBe(commaCsv);

    const spaced = capture();
    expect(
      await runCli([inputPath, outputPath, '--strat-cols', 'Country', 'Region', '--target-n', '4'], spaced.output)
    ).toBe(0);
    expect(await readFile(outputPath, 'utf8')).toBe(commaCsv);
    expect(first.out.filter((line) => line.startsWith('By '))).toEqual(['By Country:', 'By Region:']);
    expect(spaced.out.filter((line) => line.startsWith('By '))).toEqual(['By Country:', 'By Region:']);
  });

  it('requires --target-n', async () => {
    const { err, output } = capture();
    expect(await runCli([inputPath, outputPath], output)).toBe(1);
    expect(err).toEqual(['--target-n is required', USAGE]);
  });

  it('rejects a non-integer seed', async () => {
    const { err, output } = capture();
    expect(await runCli([inputPath, outputPath, '--target-n', '3', '--seed', 'abc'], output)).toBe(1);
    expect(err[0]).toBe('--seed must be an integer, got "abc"');
  });

  it('reports missing columns', async () => {
    const { err, output } = capture();
    expect(await runCli([inputPath, outputPath, '--target-n', '3'], output)).toBe(1);
    expect(err).toEqual(['Missing stratification columns: Store_Format, Store_Type, Category']);
  });

  it('prints usage on --help', async () => {
    const { out, output } = capture();
    expect(await runCli(['--help'], output)).toBe(0);
    expect(out).toEqual([USAGE]);
  });
});
