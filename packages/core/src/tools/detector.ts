// packages/core/src/tools/detector.ts — Detect toolchain availability and versions

import type { ToolSpec } from '../types/config.js';
import { parseVersion, formatVersion, satisfiesMinimum } from '../utils/semver.js';
import { buildFilteredEnv } from './env.js';
import type { ToolRunner } from './runner.js';

const DETECT_TIMEOUT_MS = 10_000;

export interface ToolDetection {
  name: string;
  command: string;
  available: boolean;
  version?: string;
  minVersion?: string;
  /** False when a minimum version is declared and not met. */
  satisfies: boolean;
  error?: string;
}

export async function detectTool(
  runner: ToolRunner,
  name: string,
  spec: ToolSpec,
  cwd: string = process.cwd(),
): Promise<ToolDetection> {
  const base = { name, command: spec.command, minVersion: spec.minVersion };
  const outcome = await runner.run({
    command: spec.command,
    args: spec.versionArgs,
    cwd,
    env: buildFilteredEnv(process.env),
    timeoutMs: DETECT_TIMEOUT_MS,
  });

  if (!outcome.ok) {
    return { ...base, available: false, satisfies: false, error: outcome.error.message };
  }

  const parsed = parseVersion(`${outcome.result.stdout}\n${outcome.result.stderr}`);
  const version = parsed ? formatVersion(parsed) : undefined;
  if (!spec.minVersion) {
    return { ...base, available: true, version, satisfies: true };
  }
  if (!version) {
    return {
      ...base,
      available: true,
      satisfies: false,
      error: `could not read a version from "${spec.command} ${spec.versionArgs.join(' ')}"`,
    };
  }
  const satisfies = satisfiesMinimum(version, spec.minVersion);
  return {
    ...base,
    available: true,
    version,
    satisfies,
    error: satisfies ? undefined : `version ${version} is below required ${spec.minVersion}`,
  };
}

export async function detectToolchain(
  runner: ToolRunner,
  toolchain: Readonly<Record<string, ToolSpec>>,
): Promise<ToolDetection[]> {
  const names = Object.keys(toolchain).sort();
  return Promise.all(names.map((name) => detectTool(runner, name, toolchain[name])));
}
