import { parseArgs } from 'node:util';

import { DEFAULT_SAMPLING_OPTIONS } from './config.js';
import { ConfigurationError } from './errors.js';
import { readUnitsCsv, writeSelectionCsv } from './io/csv.js';
import type { UnitRecord } from './models/types.js';
import { formatSummary, summarizeSelection } from './services/sampleSummary.js';
import { stratifiedSample } from './services/stratifiedSampler.js';

export const USAGE = `Usage: stratified-sample <input_csv> <output_csv> --target-n <n> [options]

Stratified sampler: CSV in, stratified CSV sample out.

Options:
  --target-n <n>          Total sample size you want (required)
  --id-col <name>         Unique ID column (default: "${DEFAULT_SAMPLING_OPTIONS.idAttr}")
  --strat-cols <a b ...>  Stratification columns: space separated up to the
                          next option, comma separated, or repeated
                          (default: ${DEFAULT_SAMPLING_OPTIONS.stratAttrs.join(' ')})
  --seed <n>              Random seed (default: ${DEFAULT_SAMPLING_OPTIONS.seed})
  --min-per-stratum <n>   Minimum units per stratum (default: ${DEFAULT_SAMPLING_OPTIONS.minPerStratum})
  -h, --help              Show this message`;

export type CliOutput = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const defaultOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

class UsageError extends Error {}

function parseInteger(flag: string, value: string | undefined, fallback?: number): number {
  if (value === undefined) {
    if (fallback === undefined) {
      throw new UsageError(`--${flag} is required`);
    }
    return fallback;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new UsageError(`--${flag} must be an integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

const LIST_FLAG = '--strat-cols';

/**
 * `parseArgs` takes one value per option, so `--strat-cols a b c` is rewritten
 * to `--strat-cols a --strat-cols b --strat-cols c`. Values run until the next
 * argument that starts with `-`.
 */
export function expandListFlag(argv: readonly string[]): string[] {
  const expanded: string[] = [];
  let inList = false;
  let listLength = 0;
  for (const arg of argv) {
    if (arg === LIST_FLAG) {
      inList = true;
      listLength = 0;
      expanded.push(arg);
      continue;
    }
    if (arg.startsWith('-')) {
      inList = false;
    } else if (inList && listLength > 0) {
      expanded.push(LIST_FLAG);
    }
    if (inList) {
      listLength += 1;
    }
    expanded.push(arg);
  }
  return expanded;
}

function parseCli(argv: string[]) {
  const { values, positionals } = parseArgs({
    args: expandListFlag(argv.filter((arg) => arg !== '--')),
    options: {
      'target-n': { type: 'string' },
      'id-col': { type: 'string' },
      'strat-cols': { type: 'string', multiple: true },
      seed: { type: 'string' },
      'min-per-stratum': { type: 'string' },
      help: { type: 'boolean', short: 'h' }
    },
    allowPositionals: true
  });

  if (values.help) {
    return null;
  }
  const [inputPath, outputPath, ...extra] = positionals;
  if (!inputPath || !outputPath || extra.length > 0) {
    throw new UsageError('Expected exactly two positional arguments: <input_csv> <output_csv>');
  }

  const stratAttrs = (values['strat-cols'] ?? [])
    .flatMap((value) => value.split(','))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  return {
    inputPath,
    outputPath,
    idAttr: values['id-col'] ?? DEFAULT_SAMPLING_OPTIONS.idAttr,
    stratAttrs: stratAttrs.length > 0 ? stratAttrs : [...DEFAULT_SAMPLING_OPTIONS.stratAttrs],
    targetN: parseInteger('target-n', values['target-n']),
    seed: parseInteger('seed', values.seed, DEFAULT_SAMPLING_OPTIONS.seed),
    minPerStratum: parseInteger('min-per-stratum', values['min-per-stratum'], DEFAULT_SAMPLING_OPTIONS.minPerStratum)
  };
}

/** Runs the command line and resolves to the process exit code. */
export async function runCli(argv: string[], output: CliOutput = defaultOutput): Promise<number> {
  let args: ReturnType<typeof parseCli>;
  try {
    args = parseCli(argv);
  } catch (error) {
    if (error instanceof UsageError || error instanceof TypeError) {
      output.err(error.message);
      output.err(USAGE);
      return 1;
    }
    throw error;
  }
  if (!args) {
    output.out(USAGE);
    return 0;
  }

  const table = await readUnitsCsv(args.inputPath);
  output.out(`Loaded ${table.units.length} rows from ${args.inputPath}`);

  let selection: UnitRecord[];
  try {
    selection = stratifiedSample(table.units, {
      idAttr: args.idAttr,
      stratAttrs: args.stratAttrs,
      targetN: args.targetN,
      seed: args.seed,
      minPerStratum: args.minPerStratum,
      columns: table.columns
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      output.err(error.message);
      return 1;
    }
    throw error;
  }

  await writeSelectionCsv(args.outputPath, selection, table.columns);
  output.out('');
  output.out(`Saved ${selection.length} rows to ${args.outputPath}`);

  for (const line of formatSummary(summarizeSelection(selection, args.stratAttrs), selection.length)) {
    output.out(line);
  }
  return 0;
}
