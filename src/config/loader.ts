import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, Config, RunnerSettings, formatIssues } from './validator';
import { defaults } from './defaults';
import { setDebugOutputEnabled } from '../runner/debug';
import { ConfigurationError } from '../runner/errors';

/**
 * PartialConfig allows for recursive partials of our Config interface
 * This is useful for YAML and programmatic overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? DeepPartial<U>[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface LoadConfigOptions {
  /** Directory searched for looprunner.yaml and .env (default: process.cwd()) */
  cwd?: string;
  /** Environment to read LOOPRUNNER_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export const CONFIG_FILE_NAME = 'looprunner.yaml';

export function loadConfig(overrides: DeepPartial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();

  // 1. Start with Defaults
  const config: Record<string, unknown> = structuredClone(defaults);

  // 2. Override with looprunner.yaml (if exists)
  const yamlPath = path.join(cwd, CONFIG_FILE_NAME);
  if (fs.existsSync(yamlPath)) {
    let parsedYaml: unknown;
    try {
      parsedYaml = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Invalid ${CONFIG_FILE_NAME}: ${message}`, yamlPath);
    }
    if (isRecord(parsedYaml)) {
      deepMerge(config, parsedYaml);
    } else if (parsedYaml !== null && parsedYaml !== undefined) {
      throw new ConfigurationError(`${CONFIG_FILE_NAME} must contain a mapping`, yamlPath);
    }
  }

  // 3. Override with Environment Variables (.env first, real environment wins)
  const envPath = path.join(cwd, '.env');
  const fileEnv = fs.existsSync(envPath) ? dotenv.parse(fs.readFileSync(envPath)) : {};
  const env: NodeJS.ProcessEnv = { ...fileEnv, ...(options.env ?? process.env) };

  deepMerge(config, {
    debug: parseBoolean(env.LOOPRUNNER_DEBUG),
    runner: {
      daemon: parseBoolean(env.LOOPRUNNER_DAEMON),
      copyStorage: parseBoolean(env.LOOPRUNNER_COPY_STORAGE),
      ignoreTaskFailures: parseBoolean(env.LOOPRUNNER_IGNORE_TASK_FAILURES),
      intervalMs: parseNumber(env.LOOPRUNNER_INTERVAL_MS),
    },
  });

  // 4. Override with programmatic arguments
  deepMerge(config, { ...overrides });

  // 5. Validate with Zod
  const result = ConfigSchema.safeParse(config);

  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`Configuration validation failed: ${issues.join('; ')}`, undefined, issues);
  }

  return result.data;
}

/**
 * Installs the process-wide parts of a loaded config and returns the runner
 * settings to spread into `new Runner(task, storage, { ...settings })`.
 */
export function applyConfig(config: Config): RunnerSettings {
  setDebugOutputEnabled(config.debug);
  return { ...config.runner };
}

function parseBoolean(raw: string | undefined): boolean | string | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  // Left as a string so validation reports it
  return raw;
}

function parseNumber(raw: string | undefined): number | string | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isNaN(value) ? raw : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Simple deep merge for config objects.
 * Undefined source values never overwrite the target.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const key in source) {
    if (Object.prototype.hasOwnProperty.call(source, key)) {
      const sourceValue = source[key];

      if (isRecord(sourceValue)) {
        const targetValue = target[key];
        const nested: Record<string, unknown> = isRecord(targetValue) ? targetValue : {};
        target[key] = nested;
        deepMerge(nested, sourceValue);
      } else if (sourceValue !== undefined) {
        target[key] = sourceValue;
      }
    }
  }
}
