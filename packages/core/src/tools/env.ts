// packages/core/src/tools/env.ts — Explicit environments for spawned tools

import { join } from 'node:path';
import type { BuildConfig } from '../types/config.js';

// Variables passed through from the invoking shell
const BASE_ENV_ALLOWLIST = [
  'PATH',
  'HOME',
  'USER',
  'LOGNAME',
  'SHELL',
  'LANG',
  'LC_ALL',
  'TMPDIR',
  'TEMP',
  'TMP',
  'TERM',
  'SystemRoot',
  'COMSPEC',
  'USERPROFILE',
  'HTTP_PROXY',
  'HTTPS_PROXY',
  'NO_PROXY',
];

// Toolchain entries exported under their conventional variable
const TOOLCHAIN_VARS: Record<string, string> = {
  cc: 'CC',
  cxx: 'CXX',
  ld: 'LD',
  make: 'MAKE',
};

export function buildFilteredEnv(
  source: Readonly<Record<string, string | undefined>>,
  allowlist: readonly string[] = BASE_ENV_ALLOWLIST,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of allowlist) {
    const val = source[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  return env;
}

/**
 * The environment every step starts from: an allowlisted copy of the caller's
 * environment plus toolchain locations, make parallelism and tool caches kept
 * inside the work directory. Frozen; steps layer their own overrides on a copy.
 */
export function buildBaseEnv(
  config: BuildConfig,
  workDir: string,
  source: Readonly<Record<string, string | undefined>> = process.env,
): Readonly<Record<string, string>> {
  const env = buildFilteredEnv(source);
  for (const [tool, variable] of Object.entries(TOOLCHAIN_VARS)) {
    const spec = config.toolchain[tool];
    if (spec) env[variable] = spec.command;
  }
  env.MAKEFLAGS = `-j${config.jobs}`;
  env.NPM_CONFIG_CACHE = join(workDir, '.kiln', 'npm-cache');
  env.PKG_CACHE_PATH = join(workDir, '.kiln', 'pkg-cache');
  return Object.freeze(env);
}
