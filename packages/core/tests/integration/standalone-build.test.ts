import { createHash } from 'node:crypto';
import { readFileSync, rmSync, statSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Executor } from '../../src/engine/executor.js';
import { buildPlan } from '../../src/plan/builder.js';
import { ArtifactStore } from '../../src/store/artifact-store.js';
import type { BuildConfig } from '../../src/types/config.js';
import { PATCHED_BINARY, standaloneRunner, standaloneSteps, testConfig } from '../helpers/fake-runner.js';

describe('standalone build', () => {
  let root: string;
  let config: BuildConfig;

  beforeEach(() => {
    root = join(tmpdir(), `kiln-e2e-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    config = testConfig(root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  async function build() {
    const store = new ArtifactStore({ root: config.paths.cacheDir, version: config.version });
    const runner = standaloneRunner();
    const report = await new Executor(buildPlan(config, standaloneSteps()), { store, runner }).run();
    return { report, runner };
  }

  it('builds, patches and verifies the binary, then reuses every step', async () => {
    const first = await build();
    expect(first.report.status).toBe('succeeded');
    expect(first.report.steps.map((s) => [s.stepId, s.status])).toEqual([
      ['fetch', 'succeeded'],
      ['install_deps', 'succeeded'],
      ['compile', 'succeeded'],
      ['package', 'succeeded'],
      ['patch', 'succeeded'],
      ['verify', 'succeeded'],
    ]);

    const binary = join(config.paths.workDir, 'out', 'tailwindcss-linux-x64');
    expect(readFileSync(binary, 'utf-8')).toBe(PATCHED_BINARY);
    expect(statSync(binary).mode & 0o777).toBe(0o755);

    const sha256 = createHash('sha256').update(PATCHED_BINARY).digest('hex');
    const checksumFile = `${binary}.sha256`;
    expect(readFileSync(checksumFile, 'utf-8')).toBe(`${sha256}  tailwindcss-linux-x64\n`);

    const second = await build();
    expect(second.report.status).toBe('succeeded');
    expect(second.report.steps.every((s) => s.status === 'skipped')).toBe(true);
    expect(second.report.steps).toHaveLength(6);
    expect(second.runner.calls).toHaveLength(0);
    expect(second.report.steps.map((s) => s.fingerprint)).toEqual(first.report.steps.map((s) => s.fingerprint));
    expect(readFileSync(checksumFile, 'utf-8')).toBe(`${sha256}  tailwindcss-linux-x64\n`);
  });

  it('rebuilds from the cache into an empty work directory', async () => {
    await build();
    rmSync(config.paths.workDir, { recursive: true, force: true });

    const { report, runner } = await build();
    expect(report.steps.every((s) => s.status === 'skipped')).toBe(true);
    expect(runner.calls).toHaveLength(0);
    const binary = join(config.paths.workDir, 'out', 'tailwindcss-linux-x64');
    expect(readFileSync(binary, 'utf-8')).toBe(PATCHED_BINARY);
    expect(readFileSync(join(config.paths.workDir, 'src', 'dist', 'index.js'), 'utf-8')).toBe('module.exports = {}\n');
  });
});
