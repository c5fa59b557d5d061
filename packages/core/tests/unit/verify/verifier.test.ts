import { chmodSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { VerifyRequirements } from '../../../src/types/report.js';
import { sha256 } from '../../../src/utils/hash.js';
import { StepError } from '../../../src/utils/errors.js';
import { Verifier, formatFailures } from '../../../src/verify/verifier.js';
import { FakeRunner } from '../../helpers/fake-runner.js';

const CONTENT = '#!/bin/sh\necho tailwindcss v4.0.6\n';

describe('Verifier', () => {
  let dir: string;
  let artifact: string;

  beforeEach(() => {
    dir = join(tmpdir(), `kiln-verify-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    mkdirSync(dir, { recursive: true });
    artifact = join(dir, 'tailwindcss-linux-x64');
    writeFileSync(artifact, CONTENT);
    chmodSync(artifact, 0o755);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const requirements = (overrides: Partial<VerifyRequirements> = {}): VerifyRequirements => ({
    executable: true,
    minVersion: '4.0.6',
    versionArgs: ['--help'],
    ...overrides,
  });

  const helpRunner = (output: string) => new FakeRunner().otherwise(() => ({ stdout: output }));

  it('passes a good artifact and reports its checksums and version', async () => {
    const runner = helpRunner('tailwindcss v4.0.6\n\nUsage: tailwindcss [options]\n');
    const report = await new Verifier(runner).verify(artifact, requirements({ sha256: sha256(CONTENT).toUpperCase() }));

    expect(report).toMatchObject({ ok: true, exists: true, executable: true, version: '4.0.6', failures: [] });
    expect(report.checksums?.sha256).toBe(sha256(CONTENT));
    expect(report.checksums?.sha512).toMatch(/^[0-9a-f]{128}$/);
    expect(runner.calls[0]).toMatchObject({ command: artifact, args: ['--help'], cwd: dir });
  });

  it('reports every failed requirement at once', async () => {
    chmodSync(artifact, 0o644);
    const report = await new Verifier(helpRunner('tailwindcss v4.0.5\n')).verify(
      artifact,
      requirements({ sha256: 'a'.repeat(64) }),
    );

    expect(report.ok).toBe(false);
    expect(report.failures.map((f) => f.code)).toEqual(['NotExecutable', 'ChecksumMismatch', 'VersionTooLow']);
    expect(report.version).toBe('4.0.5');
    expect(formatFailures(report).split('\n')[2]).toBe('VersionTooLow: version 4.0.5 is below required 4.0.6');
  });

  it('reports only NotFound for a missing artifact', async () => {
    const runner = helpRunner('');
    const report = await new Verifier(runner).verify(join(dir, 'absent'), requirements());
    expect(report).toMatchObject({ ok: false, exists: false, checksums: null });
    expect(report.failures).toEqual([{ code: 'NotFound', message: `${join(dir, 'absent')} does not exist` }]);
    expect(runner.calls).toHaveLength(0);
  });

  it('treats a directory as not found', async () => {
    const report = await new Verifier(helpRunner('')).verify(dir, requirements());
    expect(report.failures.map((f) => f.code)).toEqual(['NotFound']);
  });

  it('reports VersionUnavailable when the output has no version', async () => {
    const report = await new Verifier(helpRunner('Usage: tailwindcss [options]\n')).verify(artifact, requirements());
    expect(report.failures).toEqual([
      { code: 'VersionUnavailable', message: `no version in output of "${artifact} --help"` },
    ]);
  });

  it('reports VersionUnavailable when the artifact cannot run', async () => {
    const runner = new FakeRunner().otherwise(() => ({ error: new StepError('ToolMissing', 'exec format error') }));
    const report = await new Verifier(runner).verify(artifact, requirements());
    expect(report.failures).toEqual([
      { code: 'VersionUnavailable', message: `could not run ${artifact}: exec format error` },
    ]);
  });

  it('skips the version check without a minimum version', async () => {
    const runner = helpRunner('');
    const report = await new Verifier(runner).verify(artifact, requirements({ minVersion: undefined }));
    expect(report.ok).toBe(true);
    expect(runner.calls).toHaveLength(0);
  });
});
