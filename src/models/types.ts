export type CellValue = string | number | boolean | null | undefined;

export type UnitRecord = Record<string, CellValue>;

export type StratumKey = readonly string[];

export type SampleSeed = number | string | null;

export type SamplingOptions = {
  idAttr: string;
  stratAttrs: string[];
  targetN: number;
  seed: SampleSeed;
  minPerStratum?: number;
  /** Known column names. Defaults to every key present on the units. */
  columns?: string[];
};

export type StratumPlan = {
  key: StratumKey;
  capacity: number;
  quota: number;
  drawn: number;
};

export type SamplingDiagnostics = {
  populationSize: number;
  droppedMissingId: number;
  duplicateIds: string[];
  effectiveTotal: number;
  strata: StratumPlan[];
  toppedUp: number;
};

export type SamplingResult = {
  selection: UnitRecord[];
  diagnostics: SamplingDiagnostics;
};

export type SamplingFrame = {
  id: string;
  name: string;
  description: string;
  idAttr: string;
  stratAttrs: string[];
  units: UnitRecord[];
};

export type FrameListing = Pick<SamplingFrame, 'id' | 'name' | 'description' | 'idAttr' | 'stratAttrs'>;

export type SummaryEntry = {
  value: string;
  count: number;
  percent: number;
};

export type AttributeSummary = {
  attribute: string;
  entries: SummaryEntry[];
};

export type SampleRun = {
  id: string;
  frameId: string | null;
  options: Required<Omit<SamplingOptions, 'columns'>>;
  columns: string[];
  selection: UnitRecord[];
  diagnostics: SamplingDiagnostics;
  createdAt: string;
};
