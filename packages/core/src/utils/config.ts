import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
dotenv.config();
const ConfigSchema = z.object({
  validation: z.object({
    requireDescriptions: z.boolean().default(false),
    failOnWarnings: z.boolean().default(false),
  }),
  output: z.object({
    format: z.enum(['table', 'json', 'yaml']).default('table'),
  }),
  debug: z.object({
    enabled: z.boolean().default(false),
    verbose: z.boolean().default(false),
  }),
  app: z.object({
    name: z.string().default('c4graph'),
    version: z.string().default('0.1.0'),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;

const ENV_MAP: Record<string, string> = {
  C4GRAPH_REQUIRE_DESCRIPTIONS: 'validation.requireDescriptions',
  C4GRAPH_FAIL_ON_WARNINGS: 'validation.failOnWarnings',
  C4GRAPH_OUTPUT_FORMAT: 'output.format',
  DEBUG_MODE: 'debug.enabled',
  VERBOSE: 'debug.verbose',
};

type Coercer = (raw: string) => unknown;

const toBoolean: Coercer = (raw) => raw.toLowerCase() === 'true';
const identity: Coercer = (raw) => raw;

const COERCE_MAP: Record<string, Coercer> = {
  'validation.requireDescriptions': toBoolean,
  'validation.failOnWarnings': toBoolean,
  'debug.enabled': toBoolean,
  'debug.verbose': toBoolean,
};

function setNestedValue(obj: Record<string, unknown>, dotPath: string, value: unknown): void {
  const segments = dotPath.split('.');
  let current: Record<string, unknown> = obj;
  for (let i = 0; i < segments.length - 1; i++) {
    const seg = segments[i];
    if (!seg) continue;
    const next = current[seg];
    if (typeof next === 'object' && next !== null && !Array.isArray(next)) {
      current = next as Record<string, unknown>;
    } else {
      const created: Record<string, unknown> = {};
      current[seg] = created;
      current = created;
    }
  }
  const lastKey = segments.at(-1);
  if (lastKey) {
    current[lastKey] = value;
  }
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {
    validation: {},
    output: {},
    debug: {},
    app: {},
  };

  for (const [envVar, dotPath] of Object.entries(ENV_MAP)) {
    const raw = env[envVar];
    if (raw === undefined) continue;
    const coerce = COERCE_MAP[dotPath] ?? identity;
    setNestedValue(config, dotPath, coerce(raw));
  }

  return config;
}

export function createConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return ConfigSchema.parse(loadConfigFromEnv(env));
  } catch (error) {
    if (error instanceof z.ZodError) {
      const summary = error.issues
        .map((issue, idx) => `${String(idx + 1)}. ${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Config validation failed: ${summary}`, 'validation');
    }
    throw error;
  }
}

export const CONFIG = createConfig();
