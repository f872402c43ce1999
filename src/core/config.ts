/**
 * Configuration engine.
 *
 * Resolution priority: Environment vars > Workspace config > Global config > Defaults
 */

import { z } from 'zod';
import type { ConfigSource, PlotlineConfig, ResolvedValue } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import { atomicWriteJson, safeReadFile } from '../store/atomic.js';
import { PlotlineError, errorMessage } from './errors.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';

/** Default configuration values. */
export const DEFAULTS: PlotlineConfig = {
  version: '1',
  output: {
    defaultFormat: 'human',
    showColor: true,
  },
  backup: {
    enabled: true,
    keep: 3,
  },
  storage: {
    strictParsing: true,
  },
  logging: {
    level: 'info',
    filePath: 'logs/plotline.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

/** Schema every merged configuration must satisfy. */
export const ConfigSchema = z.object({
  version: z.string(),
  output: z.object({
    defaultFormat: z.enum(['json', 'human']),
    showColor: z.boolean(),
  }),
  backup: z.object({
    enabled: z.boolean(),
    keep: z.number().int().min(0),
  }),
  storage: z.object({
    strictParsing: z.boolean(),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
});

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'PLOTLINE_FORMAT': 'output.defaultFormat',
  'PLOTLINE_OUTPUT_SHOW_COLOR': 'output.showColor',
  'PLOTLINE_BACKUP_ENABLED': 'backup.enabled',
  'PLOTLINE_BACKUP_KEEP': 'backup.keep',
  'PLOTLINE_STRICT_PARSING': 'storage.strictParsing',
  'PLOTLINE_LOG_LEVEL': 'logging.level',
  'PLOTLINE_LOG_FILE': 'logging.filePath',
};

type ConfigObject = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
export function getNestedValue(obj: ConfigObject, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
export function setNestedValue(obj: ConfigObject, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigObject = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
export function deepMerge(target: ConfigObject, source: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse a string value (env var or CLI argument) into its JS type.
 * Handles booleans, null and numbers; anything else stays a string.
 */
export function parseConfigValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === 'null') return null;
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  return value;
}

async function readConfigFile(path: string): Promise<ConfigObject | null> {
  const raw = await safeReadFile(path);
  if (raw === null) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new PlotlineError(ExitCode.CONFIG_ERROR, `Invalid JSON in ${path}: ${errorMessage(err)}`, { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new PlotlineError(ExitCode.CONFIG_ERROR, `Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

function defaultsObject(): ConfigObject {
  const copy: unknown = JSON.parse(JSON.stringify(DEFAULTS));
  return isRecord(copy) ? copy : {};
}

function envOverrides(): ConfigObject {
  const overrides: ConfigObject = {};
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(overrides, configPath, parseConfigValue(envValue));
    }
  }
  return overrides;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < workspace config < environment vars
 */
export async function loadConfig(cwd?: string): Promise<PlotlineConfig> {
  let merged = defaultsObject();

  const globalConfig = await readConfigFile(getGlobalConfigPath());
  if (globalConfig) merged = deepMerge(merged, globalConfig);

  const workspaceConfig = await readConfigFile(getConfigPath(cwd));
  if (workspaceConfig) merged = deepMerge(merged, workspaceConfig);

  merged = deepMerge(merged, envOverrides());

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new PlotlineError(ExitCode.CONFIG_ERROR, `Invalid configuration: ${issues}`, {
      fix: 'Correct the value with `plotline config set <key> <value>`',
    });
  }
  return result.data;
}

/**
 * Get a single config value with source tracking.
 */
export async function getConfigValue(path: string, cwd?: string): Promise<ResolvedValue> {
  const fromEnv = getNestedValue(envOverrides(), path);
  if (fromEnv !== undefined) return { value: fromEnv, source: 'env' };

  const layers: Array<[ConfigSource, string]> = [
    ['workspace', getConfigPath(cwd)],
    ['global', getGlobalConfigPath()],
  ];
  for (const [source, file] of layers) {
    const config = await readConfigFile(file);
    const value = config ? getNestedValue(config, path) : undefined;
    if (value !== undefined) return { value, source };
  }

  return { value: getNestedValue(defaultsObject(), path), source: 'default' };
}

/**
 * Set a config value in the workspace or global config file (dot-notation supported).
 * The result must still validate once merged over the defaults.
 */
export async function setConfigValue(
  key: string,
  value: string,
  cwd?: string,
  opts?: { global?: boolean },
): Promise<{ key: string; value: unknown; scope: 'workspace' | 'global' }> {
  const configPath = opts?.global ? getGlobalConfigPath() : getConfigPath(cwd);
  const config = (await readConfigFile(configPath)) ?? {};
  const parsedValue = parseConfigValue(value);
  setNestedValue(config, key, parsedValue);

  const check = ConfigSchema.safeParse(deepMerge(defaultsObject(), config));
  if (!check.success) {
    const issue = check.error.issues[0];
    throw new PlotlineError(
      ExitCode.CONFIG_ERROR,
      `Invalid value for ${key}: ${issue ? issue.message : 'rejected by schema'}`,
    );
  }

  await atomicWriteJson(configPath, config);
  return { key, value: parsedValue, scope: opts?.global ? 'global' : 'workspace' };
}
