import { z } from 'zod';

export type Neo4jConfig = {
  uri: string;
  username: string;
  password: string;
};

export interface AppConfig {
  port: number;
  logLevel: string;
  /** Body size limit for `express.json`, e.g. `5mb`. Inline populations can be large. */
  jsonLimit: string;
  /** `null` runs the frame store in seed-only mode. */
  neo4j: Neo4jConfig | null;
}

export const DEFAULT_SAMPLING_OPTIONS = {
  idAttr: 'Store_ID',
  stratAttrs: ['Country', 'Region', 'Store_Format', 'Store_Type', 'Category'],
  seed: 42,
  minPerStratum: 1
} as const;

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  JSON_LIMIT: z.string().min(1).default('5mb'),
  NEO4J_URI: z.string().optional(),
  NEO4J_USERNAME: z.string().optional(),
  NEO4J_PASSWORD: z.string().optional()
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const { PORT, LOG_LEVEL, JSON_LIMIT, NEO4J_URI, NEO4J_USERNAME, NEO4J_PASSWORD } = parsed.data;

  return {
    port: PORT,
    logLevel: LOG_LEVEL,
    jsonLimit: JSON_LIMIT,
    neo4j:
      NEO4J_URI && NEO4J_USERNAME && NEO4J_PASSWORD
        ? { uri: NEO4J_URI, username: NEO4J_USERNAME, password: NEO4J_PASSWORD }
        : null
  };
}
