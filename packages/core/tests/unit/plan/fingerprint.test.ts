import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildPlan } from '../../../src/plan/builder.js';
import { computeFingerprint, fingerprintPlan, toolVersionsOf } from '../../../src/plan/fingerprint.js';
import type { BuildConfig } from '../../../src/types/config.js';
import type { StepDefinition } from '../../../src/types/step.js';
import { defineSteps, testConfig } from '../../helpers/fake-runner.js';

let root: string;

beforeEach(() => {
  root = join(tmpdir(), `kiln-fp-${Date.now()}-${Math.random().toString(16).slice(2)}`);
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

function workspace(name: string, files: Record<string, string>, overrides: Partial<BuildConfig> = {}): BuildConfig {
  const config = testConfig(join(root, name), overrides);
  for (const [path, content] of Object.entries(files)) {
    const full = join(config.paths.workDir, path);
    mkdirSync(join(full, '..'), { recursive: true });
    writeFileSync(full, content);
  }
  return config;
}

const chain = (): StepDefinition[] =>
  defineSteps([
    {
      id: 'compile',
      action: 'run',
      tool: 'cc',
      args: ['-o', '{{workDir}}/out/app', 'main.c'],
      inputs: ['main.c'],
      outputs: ['out/app'],
      timeoutSec: 60,
    },
    { id: 'bundle', action: 'copy', needs: ['compile'], from: 'out/app', to: 'dist/app' },
  ]);

async function fingerprints(config: BuildConfig, defs: StepDefinition[] = chain()) {
  return Object.fromEntries(await fingerprintPlan(buildPlan(config, defs)));
}

describe('fingerprints', () => {
  it('are stable for an unchanged workspace', async () => {
    const config = workspace('a', { 'main.c': 'int main(){}' });
    const first = await fingerprints(config);
    expect(first.compile).toMatch(/^[0-9a-f]{64}$/);
    expect(await fingerprints(config)).toEqual(first);
  });

  it('change with input content and propagate downstream', async () => {
    const before = await fingerprints(workspace('a', { 'main.c': 'int main(){}' }));
    const after = await fingerprints(workspace('b', { 'main.c': 'int main(){return 1;}' }));
    expect(after.compile).not.toBe(before.compile);
    expect(after.bundle).not.toBe(before.bundle);
  });

  it('do not depend on the work directory or job count', async () => {
    const here = await fingerprints(workspace('a', { 'main.c': 'int main(){}' }));
    const there = await fingerprints(workspace('b', { 'main.c': 'int main(){}' }, { jobs: 16 }));
    expect(there).toEqual(here);
  });

  it('ignore the step timeout', async () => {
    const config = workspace('a', { 'main.c': 'int main(){}' });
    const relaxed = chain().map((def) => (def.action === 'run' ? { ...def, timeoutSec: 600 } : def));
    expect(await fingerprints(config, relaxed)).toEqual(await fingerprints(config));
  });

  it('change with the pinned revision', async () => {
    const config = workspace('a', { 'main.c': 'int main(){}' });
    const repinned = { ...config, source: { ...config.source, revision: 'abcdef1234567' } };
    expect((await fingerprints(repinned)).compile).not.toBe((await fingerprints(config)).compile);
  });

  it('are null while an external input is absent, and for everything downstream', async () => {
    expect(await fingerprints(workspace('a', {}))).toEqual({ compile: null, bundle: null });
  });
});

describe('toolVersionsOf', () => {
  it('records declared versions and marks the rest unversioned', () => {
    const config = workspace('a', {});
    const plan = buildPlan(
      config,
      defineSteps([
        { id: 'cc', action: 'run', tool: 'cc' },
        { id: 'ld', action: 'run', tool: 'ld' },
        { id: 'sh', action: 'run', command: 'sh' },
      ]),
    );
    expect(toolVersionsOf(plan, plan.get('cc'))).toEqual({ cc: '12' });
    expect(toolVersionsOf(plan, plan.get('ld'))).toEqual({ ld: 'unversioned' });
    expect(toolVersionsOf(plan, plan.get('sh'))).toEqual({});
  });
});

describe('computeFingerprint', () => {
  const base = {
    descriptor: { kind: 'run', args: ['build'] },
    inputs: { 'main.c': 'abc' },
    dependencies: {},
    toolVersions: { cc: '12' },
    version: '4.0.6',
    revision: 'd045aaa',
  };

  it('ignores key order', () => {
    expect(computeFingerprint({ ...base, inputs: { b: '2', a: '1' } })).toBe(
      computeFingerprint({ ...base, inputs: { a: '1', b: '2' } }),
    );
  });

  it('changes with each component', () => {
    const fp = computeFingerprint(base);
    expect(computeFingerprint({ ...base, toolVersions: { cc: '13' } })).not.toBe(fp);
    expect(computeFingerprint({ ...base, version: '4.0.7' })).not.toBe(fp);
    expect(computeFingerprint({ ...base, dependencies: { fetch: 'x' } })).not.toBe(fp);
    expect(computeFingerprint({ ...base, descriptor: { kind: 'run', args: ['test'] } })).not.toBe(fp);
  });
});
