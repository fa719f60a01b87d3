import { readFile } from 'node:fs/promises';
import { resolve, isAbsolute, dirname } from 'node:path';
import { TaxalertConfigSchema, type TaxalertConfig } from './schema.js';
import { exists } from '../util/fs.js';

export const DEFAULT_CONFIG_FILE = 'taxalert.config.json';

/**
 * Config as consumed at runtime: the taxonomy path, when given, is absolute.
 */
export interface RuntimeConfig extends TaxalertConfig {
  /** Absolute path of the file this config came from, or null for built-in defaults. */
  readonly configPath: string | null;
}

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

function resolveFrom(baseDir: string, path: string | undefined): string | undefined {
  return path === undefined || isAbsolute(path) ? path : resolve(baseDir, path);
}

/**
 * Validate a raw config object and freeze it.
 * Relative taxonomy and log directory paths resolve against `baseDir`.
 */
export function parseConfig(raw: unknown, configPath: string | null, baseDir: string): RuntimeConfig {
  const result = TaxalertConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigLoadError(`Invalid config:\n${issues}`, result.error);
  }

  const config = result.data;

  const frozen: RuntimeConfig = {
    ...config,
    taxonomy: { ...config.taxonomy, path: resolveFrom(baseDir, config.taxonomy.path) },
    logging: { ...config.logging, logDir: resolveFrom(baseDir, config.logging.logDir) },
    configPath,
  };

  return Object.freeze(frozen);
}

/**
 * Load, parse, and validate a taxalert.config.json file.
 *
 * When `optional` is set and the file does not exist, the built-in defaults
 * are returned instead of failing.
 */
export async function loadConfig(
  configPath: string = DEFAULT_CONFIG_FILE,
  opts: { optional?: boolean } = {},
): Promise<RuntimeConfig> {
  const absPath = isAbsolute(configPath) ? configPath : resolve(process.cwd(), configPath);

  if (!(await exists(absPath))) {
    if (opts.optional) {
      return parseConfig({}, null, process.cwd());
    }
    throw new ConfigLoadError(`Config file not found: ${absPath}`);
  }

  let raw: unknown;
  try {
    const content = await readFile(absPath, 'utf-8');
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigLoadError(`Failed to parse config file: ${absPath}`, err);
  }

  return parseConfig(raw, absPath, dirname(absPath));
}

/**
 * Resolve `${ENV_VAR}` references in strings. Unknown variables become empty.
 */
export function resolveEnvRef(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{(\w+)\}/g, (_, name: string) => env[name] ?? '');
}
