// packages/core/src/config/env.ts — Environment variable overrides

import { isLogLevel } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

type Env = Readonly<Record<string, string | undefined>>;

const TOOL_VARIABLES: Record<string, string> = {
  CC: 'cc',
  CXX: 'cxx',
  LD: 'ld',
  MAKE: 'make',
};

const TOOL_PREFIX = 'KILN_TOOL_';

/**
 * Config fragment from the environment: KILN_CACHE_DIR, KILN_WORK_DIR,
 * KILN_JOBS, KILN_LOG_LEVEL, CC/CXX/LD/MAKE and KILN_TOOL_<NAME> (the
 * command for toolchain entry `<name>`).
 */
export function envOverrides(env: Env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const paths: Record<string, string> = {};
  const toolchain: Record<string, { command: string }> = {};

  if (env.KILN_CACHE_DIR) paths.cacheDir = env.KILN_CACHE_DIR;
  if (env.KILN_WORK_DIR) paths.workDir = env.KILN_WORK_DIR;
  if (Object.keys(paths).length > 0) overrides.paths = paths;

  if (env.KILN_JOBS) {
    const jobs = Number(env.KILN_JOBS);
    if (!Number.isInteger(jobs) || jobs < 1) {
      throw new ConfigError(`KILN_JOBS must be a positive integer, got "${env.KILN_JOBS}"`, 'jobs');
    }
    overrides.jobs = jobs;
  }

  if (env.KILN_LOG_LEVEL) {
    if (!isLogLevel(env.KILN_LOG_LEVEL)) {
      throw new ConfigError(`KILN_LOG_LEVEL must be debug, info, warn or error`, 'logLevel');
    }
    overrides.logLevel = env.KILN_LOG_LEVEL;
  }

  for (const [variable, tool] of Object.entries(TOOL_VARIABLES)) {
    const command = env[variable];
    if (command) toolchain[tool] = { command };
  }
  for (const [key, command] of Object.entries(env)) {
    if (key.startsWith(TOOL_PREFIX) && command) {
      toolchain[key.slice(TOOL_PREFIX.length).toLowerCase()] = { command };
    }
  }
  if (Object.keys(toolchain).length > 0) overrides.toolchain = toolchain;

  return overrides;
}
