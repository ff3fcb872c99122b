// Application settings backed by an optional JSON file
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ThrustbenchError } from './errors.js';
import { LOG_LEVELS } from './Logger.js';

export const CONFIG_FILE_NAME = 'thrustbench.config.json';
export const CONFIG_ENV_VAR = 'THRUSTBENCH_CONFIG';

export const AppConfigSchema = z.object({
  simulation: z
    .object({
      defaultPreset: z.string().min(1).default('default'),
      maxBurnTime: z.number().positive().nullable().default(null),
    })
    .default({}),
  output: z
    .object({
      precision: z.number().int().min(0).max(10).default(2),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export const DEFAULT_CONFIG: AppConfig = AppConfigSchema.parse({});

export interface LoadConfigOptions {
  /** Explicit path, e.g. from --config. Must exist when given. */
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve and read the config file. Lookup order: explicit path, then the
 * THRUSTBENCH_CONFIG variable, then thrustbench.config.json in the working
 * directory. No file at the default location means defaults.
 */
export function loadAppConfig(options: LoadConfigOptions = {}): AppConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const explicit = options.path ?? env[CONFIG_ENV_VAR];

  if (explicit === undefined || explicit === '') {
    const fallback = resolve(cwd, CONFIG_FILE_NAME);
    return existsSync(fallback) ? readConfigFile(fallback) : DEFAULT_CONFIG;
  }

  const path = resolve(cwd, explicit);
  if (!existsSync(path)) {
    throw new ThrustbenchError('InvalidConfig', `Config file not found: ${path}`);
  }
  return readConfigFile(path);
}

function readConfigFile(path: string): AppConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ThrustbenchError('InvalidConfig', `Could not read ${path}: ${describe(error)}`, { cause: error });
  }
  return parseAppConfig(raw, path);
}

export function parseAppConfig(raw: unknown, source = 'config'): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ThrustbenchError('InvalidConfig', `Invalid ${source}: ${issues}`);
  }
  return result.data;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
