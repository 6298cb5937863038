import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';

/** Environment variable naming the configuration file path */
export const CONFIG_PATH_ENV = 'TALLY_CONFIG';
export const DEFAULT_CONFIG_FILE = 'config.json';

const DatabaseSchema = z.object({
  filename: z.string().min(1).default('tally.db'),
  timeoutMs: z.number().int().min(0).default(3000),
  connectAttempts: z.number().int().min(1).default(3),
  readonly: z.boolean().default(false),
});

const ConfigSchema = z.object({
  database: DatabaseSchema.default({}),
});

export type DatabaseConfig = z.infer<typeof DatabaseSchema>;
export type Config = z.infer<typeof ConfigSchema>;

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env[CONFIG_PATH_ENV];
  return fromEnv ? fromEnv : path.join(process.cwd(), DEFAULT_CONFIG_FILE);
}

/**
 * Loads the configuration from the file named by TALLY_CONFIG, or from
 * config.json in the working directory. A missing file yields the defaults;
 * values present in the file override them.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const configPath = resolveConfigPath(env);

  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`failed to read config file: ${messageOf(err)}`, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`failed to parse config file: ${messageOf(err)}`, { cause: err });
  }

  const parsed = ConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`failed to parse config file: ${issues}`);
  }

  return parsed.data;
}
