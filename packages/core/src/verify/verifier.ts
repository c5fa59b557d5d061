// packages/core/src/verify/verifier.ts — Checks a finished artifact against its requirements

import { stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { CancellationToken } from '../engine/cancellation.js';
import { buildFilteredEnv } from '../tools/env.js';
import { diagnosticsOf, type ToolRunner } from '../tools/runner.js';
import type { VerifyFailure, VerifyReport, VerifyRequirements } from '../types/report.js';
import { isErrno } from '../utils/fs.js';
import { hashFile } from '../utils/hash.js';
import { formatVersion, parseVersion, satisfiesMinimum } from '../utils/semver.js';

const VERSION_PROBE_TIMEOUT_MS = 30_000;

export interface VerifyOptions {
  env?: Readonly<Record<string, string>>;
  token?: CancellationToken;
  timeoutMs?: number;
}

/**
 * Evaluates every requirement independently and reports all failures, so a
 * single run shows everything wrong with an artifact.
 */
export class Verifier {
  constructor(private readonly runner: ToolRunner) {}

  async verify(path: string, requirements: VerifyRequirements, options: VerifyOptions = {}): Promise<VerifyReport> {
    const failures: VerifyFailure[] = [];

    let mode: number;
    try {
      const stats = await stat(path);
      if (!stats.isFile()) {
        failures.push({ code: 'NotFound', message: `${path} is not a regular file` });
        return { path, ok: false, exists: false, executable: false, checksums: null, version: null, failures };
      }
      mode = stats.mode;
    } catch (err) {
      if (!isErrno(err, 'ENOENT')) throw err;
      failures.push({ code: 'NotFound', message: `${path} does not exist` });
      return { path, ok: false, exists: false, executable: false, checksums: null, version: null, failures };
    }

    const executable = (mode & 0o111) !== 0;
    if (requirements.executable && !executable) {
      failures.push({ code: 'NotExecutable', message: `${path} is not executable` });
    }

    const checksums = {
      sha256: await hashFile(path, 'sha256'),
      sha512: await hashFile(path, 'sha512'),
    };
    for (const algorithm of ['sha256', 'sha512'] as const) {
      const expected = requirements[algorithm];
      if (expected !== undefined && expected.toLowerCase() !== checksums[algorithm]) {
        failures.push({
          code: 'ChecksumMismatch',
          message: `${algorithm} is ${checksums[algorithm]}, expected ${expected.toLowerCase()}`,
        });
      }
    }

    let version: string | null = null;
    if (requirements.minVersion !== undefined) {
      const reading = await this.readVersion(path, requirements.versionArgs, options);
      if (reading.ok) {
        version = reading.version;
        if (!satisfiesMinimum(version, requirements.minVersion)) {
          failures.push({
            code: 'VersionTooLow',
            message: `version ${version} is below required ${requirements.minVersion}`,
          });
        }
      } else {
        failures.push({ code: 'VersionUnavailable', message: reading.message });
      }
    }

    return { path, ok: failures.length === 0, exists: true, executable, checksums, version, failures };
  }

  private async readVersion(
    path: string,
    args: readonly string[],
    options: VerifyOptions,
  ): Promise<{ ok: true; version: string } | { ok: false; message: string }> {
    const outcome = await this.runner.run({
      command: path,
      args,
      cwd: dirname(path),
      env: options.env ?? buildFilteredEnv(process.env),
      timeoutMs: options.timeoutMs ?? VERSION_PROBE_TIMEOUT_MS,
      token: options.token,
    });
    if (!outcome.ok) {
      return { ok: false, message: `could not run ${path}: ${outcome.error.message}` };
    }
    const parsed = parseVersion(diagnosticsOf(outcome.result));
    if (!parsed) {
      return { ok: false, message: `no version in output of "${[path, ...args].join(' ')}"` };
    }
    return { ok: true, version: formatVersion(parsed) };
  }
}

/** One line per failure, for logs and step diagnostics. */
export function formatFailures(report: VerifyReport): string {
  return report.failures.map((f) => `${f.code}: ${f.message}`).join('\n');
}
