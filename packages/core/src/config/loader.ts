// packages/core/src/config/loader.ts

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { BuildConfig, PathsConfig } from '../types/config.js';
import type { LogLevel } from '../utils/logger.js';
import { CONFIG_FILENAME } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { envOverrides } from './env.js';
import { validateConfig } from './schema.js';

/** Settings a command line can override. */
export interface ConfigOverrides {
  version?: string;
  revision?: string;
  jobs?: number;
  logLevel?: LogLevel;
  template?: string;
  timeoutSec?: number;
  paths?: Partial<PathsConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged; undefined source values are ignored.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const [key, srcVal] of Object.entries(source)) {
    if (srcVal === undefined) continue;
    const tgtVal = result[key];
    result[key] = isRecord(srcVal) && isRecord(tgtVal) ? deepMerge(tgtVal, srcVal) : srcVal;
  }
  return result;
}

/** Freeze `value` and everything reachable from it. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function toLayer(overrides: ConfigOverrides): Record<string, unknown> {
  const layer: Record<string, unknown> = {
    version: overrides.version,
    jobs: overrides.jobs,
    logLevel: overrides.logLevel,
    template: overrides.template,
  };
  if (overrides.revision !== undefined) layer.source = { revision: overrides.revision };
  if (overrides.timeoutSec !== undefined) layer.timeouts = { stepSec: overrides.timeoutSec };
  if (overrides.paths) layer.paths = { ...overrides.paths };
  return layer;
}

function resolvePath(baseDir: string, path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`${configPath} must contain a mapping at the top level`);
  }
  return parsed;
}

/**
 * Load config with precedence: overrides > environment > .kiln.yml > defaults.
 * Relative paths resolve against the project directory. The result is
 * validated and deeply frozen.
 */
export function loadConfig(options?: {
  projectDir?: string;
  /** Explicit config file; must exist. */
  configPath?: string;
  env?: Readonly<Record<string, string | undefined>>;
  overrides?: ConfigOverrides;
  skipFile?: boolean;
}): BuildConfig {
  const projectDir = resolve(options?.projectDir ?? process.cwd());
  let merged: Record<string, unknown> = structuredClone(Object.fromEntries(Object.entries(DEFAULT_CONFIG)));

  if (!options?.skipFile) {
    const explicit = options?.configPath !== undefined;
    const configPath = explicit ? resolve(projectDir, options.configPath ?? '') : join(projectDir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      merged = deepMerge(merged, readConfigFile(configPath));
    } else if (explicit) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
  }

  merged = deepMerge(merged, envOverrides(options?.env ?? process.env));

  if (options?.overrides) {
    merged = deepMerge(merged, toLayer(options.overrides));
  }

  const validated = validateConfig(merged);
  const config: BuildConfig = {
    ...validated,
    paths: {
      workDir: resolvePath(projectDir, validated.paths.workDir),
      cacheDir: resolvePath(projectDir, validated.paths.cacheDir),
    },
  };
  return deepFreeze(config);
}

export { deepMerge };
