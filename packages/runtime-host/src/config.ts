/**
 * cmdtree Runtime Host — Configuration Resolution
 *
 * Resolves the cmdtree configuration using the following precedence:
 *
 *   1. Explicit `configPath` option (e.g. from --config CLI flag)
 *   2. CMDTREE_CONFIG environment variable
 *   3. cmdtree.config.json in the working directory, if present
 *   4. Built-in defaults
 *
 * After the file (if any) is applied, two environment variables override
 * single fields: CMDTREE_PREFIX and CMDTREE_LOG_LEVEL.
 *
 * A config file named explicitly (1 or 2) must exist. Any file that is
 * found must be valid JSON with known keys of the right types; otherwise
 * resolution fails with every problem listed, rather than falling back to
 * defaults.
 *
 * Relative directories in a file are resolved against the file's own
 * directory; defaults are resolved against the working directory.
 */

import { readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import type { ValidationError, ValidationResult } from '@cmdtree/kernel';
import { DEFAULT_PREFIX, LogLevel, parseLogLevel } from '@cmdtree/kernel';
import { isNodeError } from './state/state-io.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const CONFIG_FILENAME = 'cmdtree.config.json';

export interface CmdtreeConfig {
  /** Prefix of every root created by the host. */
  readonly defaultPrefix: string;
  readonly logLevel: LogLevel;
  /** Directory scanned for module manifests (*.json). */
  readonly modulesDir: string;
  /** Directory receiving `logs/registry.jsonl`. */
  readonly stateDir: string;
}

/** The optional fields a config file may set. */
export type CmdtreeConfigFile = Partial<CmdtreeConfig>;

export type ConfigSource = 'option' | 'env' | 'cwd' | 'default';

export interface ResolvedConfig {
  readonly config: CmdtreeConfig;
  /** Where the file came from, or 'default' when none was read. */
  readonly source: ConfigSource;
  readonly configPath: string | undefined;
}

export interface ResolveConfigOptions {
  /** Highest precedence. Typically supplied by a --config CLI flag. */
  readonly configPath?: string | undefined;
  /** Defaults to process.cwd(). */
  readonly cwd?: string | undefined;
  /** Defaults to process.env. Injectable for tests. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

export const DEFAULT_CONFIG: CmdtreeConfig = {
  defaultPrefix: DEFAULT_PREFIX,
  logLevel: LogLevel.Info,
  modulesDir: './modules',
  stateDir: './.cmdtree',
};

const CONFIG_KEYS: ReadonlySet<string> = new Set(Object.keys(DEFAULT_CONFIG));

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Validate the parsed content of a config file. Every field is optional;
 * unknown keys are errors so that typos do not pass silently.
 */
export function validateConfig(raw: unknown): ValidationResult<CmdtreeConfigFile> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { ok: false, errors: [{ message: 'Config must be a JSON object.' }] };
  }

  const errors: ValidationError[] = [];
  const fields = new Map<string, unknown>(Object.entries(raw));
  let config: CmdtreeConfigFile = {};

  for (const key of fields.keys()) {
    if (!CONFIG_KEYS.has(key)) {
      errors.push({ message: `Unknown config key "${key}".`, context: key });
    }
  }

  const prefix = fields.get('defaultPrefix');
  if (prefix !== undefined) {
    if (typeof prefix === 'string' && prefix !== '') {
      config = { ...config, defaultPrefix: prefix };
    } else {
      errors.push({ message: 'defaultPrefix must be a non-empty string.', context: 'defaultPrefix' });
    }
  }

  const level = fields.get('logLevel');
  if (level !== undefined) {
    const parsed = typeof level === 'string' ? parseLogLevel(level) : undefined;
    if (parsed !== undefined) {
      config = { ...config, logLevel: parsed };
    } else {
      errors.push({
        message: 'logLevel must be one of trace, debug, info, warn, error.',
        context: 'logLevel',
      });
    }
  }

  const modulesDir = directoryField(fields, 'modulesDir', errors);
  if (modulesDir !== undefined) config = { ...config, modulesDir };
  const stateDir = directoryField(fields, 'stateDir', errors);
  if (stateDir !== undefined) config = { ...config, stateDir };

  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: config };
}

function directoryField(
  fields: ReadonlyMap<string, unknown>,
  key: 'modulesDir' | 'stateDir',
  errors: ValidationError[],
): string | undefined {
  const dir = fields.get(key);
  if (dir === undefined) return undefined;
  if (typeof dir === 'string' && dir !== '') return dir;
  errors.push({ message: `${key} must be a non-empty string.`, context: key });
  return undefined;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function nonEmpty(value: string | undefined): value is string {
  return typeof value === 'string' && value !== '';
}

type ConfigFileRead =
  | { readonly ok: true; readonly file: CmdtreeConfigFile | undefined }
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };

/** Read and validate one config file. `required` turns a missing file into an error. */
function readConfigFile(path: string, required: boolean): ConfigFileRead {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT') && !required) {
      return { ok: true, file: undefined };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, errors: [{ message: `Cannot read config file: ${message}`, context: path }] };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, errors: [{ message: `Config file is not valid JSON: ${message}`, context: path }] };
  }

  const result = validateConfig(parsed);
  if (!result.ok) {
    return { ok: false, errors: result.errors.map((e) => ({ ...e, context: `${path}: ${e.context ?? ''}` })) };
  }
  return { ok: true, file: result.value };
}

/**
 * Resolve the configuration.
 *
 * @returns the merged configuration and where it came from, or every
 *   problem found in the selected config file and the env overrides
 */
export function resolveConfig(opts: ResolveConfigOptions = {}): ValidationResult<ResolvedConfig> {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;

  const envConfig = env['CMDTREE_CONFIG'];
  let source: ConfigSource;
  let candidate: string;
  if (nonEmpty(opts.configPath)) {
    // 1. Explicit CLI override
    source = 'option';
    candidate = resolve(cwd, opts.configPath);
  } else if (nonEmpty(envConfig)) {
    // 2. CMDTREE_CONFIG env var
    source = 'env';
    candidate = resolve(cwd, envConfig);
  } else {
    // 3. cmdtree.config.json in the working directory
    source = 'cwd';
    candidate = join(cwd, CONFIG_FILENAME);
  }

  const loaded = readConfigFile(candidate, source !== 'cwd');
  if (!loaded.ok) return loaded;

  const file = loaded.file;
  // 4. Defaults when no file was found
  const configPath = file === undefined ? undefined : candidate;
  const base = configPath === undefined ? cwd : dirname(configPath);
  const errors: ValidationError[] = [];

  let logLevel = file?.logLevel ?? DEFAULT_CONFIG.logLevel;
  const envLevel = env['CMDTREE_LOG_LEVEL'];
  if (nonEmpty(envLevel)) {
    const parsed = parseLogLevel(envLevel);
    if (parsed === undefined) {
      errors.push({ message: `CMDTREE_LOG_LEVEL "${envLevel}" is not a log level.`, context: 'CMDTREE_LOG_LEVEL' });
    } else {
      logLevel = parsed;
    }
  }
  if (errors.length > 0) return { ok: false, errors };

  const envPrefix = env['CMDTREE_PREFIX'];
  const config: CmdtreeConfig = {
    defaultPrefix: nonEmpty(envPrefix) ? envPrefix : file?.defaultPrefix ?? DEFAULT_CONFIG.defaultPrefix,
    logLevel,
    modulesDir: resolve(base, file?.modulesDir ?? DEFAULT_CONFIG.modulesDir),
    stateDir: resolve(base, file?.stateDir ?? DEFAULT_CONFIG.stateDir),
  };

  return {
    ok: true,
    value: { config, source: configPath === undefined ? 'default' : source, configPath },
  };
}
