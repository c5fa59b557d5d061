import { mkdirSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CancellationToken } from '../../../src/engine/cancellation.js';
import { EventBus } from '../../../src/engine/event-bus.js';
import { Executor, type ExecutorOptions } from '../../../src/engine/executor.js';
import { buildPlan } from '../../../src/plan/builder.js';
import { Plan } from '../../../src/plan/plan.js';
import { ArtifactStore, type PutOptions } from '../../../src/store/artifact-store.js';
import { openDatabase } from '../../../src/store/database.js';
import { LockContentionError, acquireLock } from '../../../src/store/lock.js';
import { RunStore } from '../../../src/store/run-store.js';
import { WriteStep } from '../../../src/steps/write-step.js';
import type { ArtifactRecord, ProducedArtifact } from '../../../src/types/artifact.js';
import type { BuildConfig } from '../../../src/types/config.js';
import type { EngineEvent } from '../../../src/types/events.js';
import type { RunReport } from '../../../src/types/report.js';
import { CycleError, StepError } from '../../../src/utils/errors.js';
import { sleep } from '../../../src/utils/time.js';
import {
  defineSteps,
  FakeRunner,
  standaloneRunner,
  standaloneSteps,
  testConfig,
  writes,
} from '../../helpers/fake-runner.js';

let root: string;
let config: BuildConfig;
let store: ArtifactStore;

beforeEach(() => {
  root = join(tmpdir(), `kiln-exec-${Date.now()}-${Math.random().toString(16).slice(2)}`);
  config = testConfig(root);
  store = new ArtifactStore({ root: config.paths.cacheDir, version: config.version });
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

function statuses(report: RunReport): Record<string, string> {
  return Object.fromEntries(report.steps.map((s) => [s.stepId, s.status]));
}

function step(report: RunReport, id: string) {
  const found = report.steps.find((s) => s.stepId === id);
  if (!found) throw new Error(`no report for ${id}`);
  return found;
}

function run(plan: Plan, runner: FakeRunner, options: Partial<ExecutorOptions> = {}): Promise<RunReport> {
  return new Executor(plan, { store, runner, ...options }).run();
}

function writeInput(path: string, content: string): void {
  const full = join(config.paths.workDir, path);
  mkdirSync(join(full, '..'), { recursive: true });
  writeFileSync(full, content);
}

const diamond = () =>
  defineSteps([
    { id: 'left', action: 'run', command: 'left-tool', inputs: ['inputs/left.txt'], outputs: ['out/left'] },
    { id: 'right', action: 'run', command: 'right-tool', inputs: ['inputs/right.txt'], outputs: ['out/right'] },
    {
      id: 'join',
      action: 'run',
      command: 'join-tool',
      needs: ['left', 'right'],
      inputs: ['out/left', 'out/right'],
      outputs: ['out/joined'],
    },
  ]);

function diamondRunner(): FakeRunner {
  return new FakeRunner()
    .on('left-tool', [], writes('out/left', 'L'))
    .on('right-tool', [], writes('out/right', 'R'))
    .on('join-tool', [], writes('out/joined', 'LR'));
}

describe('Executor', () => {
  describe('ordering', () => {
    it('runs independent steps in declaration order with one job', async () => {
      const plan = buildPlan(
        { ...config, jobs: 1 },
        defineSteps([
          { id: 'c', action: 'run', command: 'tool-c' },
          { id: 'a', action: 'run', command: 'tool-a' },
          { id: 'b', action: 'run', command: 'tool-b' },
        ]),
      );
      const runner = new FakeRunner();
      const report = await run(plan, runner);

      expect(runner.calls.map((c) => c.command)).toEqual(['tool-c', 'tool-a', 'tool-b']);
      expect(report.steps.map((s) => s.stepId)).toEqual(['c', 'a', 'b']);
      expect(report.status).toBe('succeeded');
    });

    it('rejects a cyclic plan before running anything', async () => {
      const plan = new Plan(config);
      plan.addStep(new WriteStep(...twice({ id: 'a', path: 'a' })), ['b']);
      plan.addStep(new WriteStep(...twice({ id: 'b', path: 'b' })), ['a']);
      const runner = new FakeRunner();

      await expect(run(plan, runner)).rejects.toThrow(CycleError);
      expect(runner.calls).toHaveLength(0);
      expect(existsSync(join(config.paths.workDir, 'a'))).toBe(false);
    });

    it('never exceeds the job bound', async () => {
      const slow = async () => {
        await sleep(20);
        return {};
      };
      const defs = defineSteps(['s1', 's2', 's3', 's4'].map((id) => ({ id, action: 'run', command: 'slow', args: [id] })));
      const runner = new FakeRunner().on('slow', [], slow);

      await run(buildPlan({ ...config, jobs: 2 }, defs), runner);
      expect(runner.calls).toHaveLength(4);
      expect(runner.maxConcurrent).toBe(2);
    });

    it('runs steps one at a time with jobs = 1', async () => {
      const defs = defineSteps(['s1', 's2', 's3'].map((id) => ({ id, action: 'run', command: 'slow', args: [id] })));
      const runner = new FakeRunner().on('slow', [], async () => {
        await sleep(5);
        return {};
      });

      await run(buildPlan(config, defs), runner, { jobs: 1 });
      expect(runner.maxConcurrent).toBe(1);
    });
  });

  describe('caching', () => {
    it('skips every step on an unchanged second run', async () => {
      writeInput('inputs/left.txt', 'left v1');
      writeInput('inputs/right.txt', 'right v1');
      const plan = buildPlan(config, diamond());
      const runner = diamondRunner();

      const first = await run(plan, runner);
      expect(statuses(first)).toEqual({ left: 'succeeded', right: 'succeeded', join: 'succeeded' });

      const second = await run(plan, runner);
      expect(statuses(second)).toEqual({ left: 'skipped', right: 'skipped', join: 'skipped' });
      expect(second.steps.map((s) => s.fingerprint)).toEqual(first.steps.map((s) => s.fingerprint));
      expect(runner.calls).toHaveLength(3);
    });

    it('re-runs a changed step and its dependents but not its sibling', async () => {
      writeInput('inputs/left.txt', 'left v1');
      writeInput('inputs/right.txt', 'right v1');
      const plan = buildPlan(config, diamond());
      const runner = diamondRunner();
      const first = await run(plan, runner);

      writeInput('inputs/left.txt', 'left v2');
      const second = await run(plan, runner);

      expect(statuses(second)).toEqual({ left: 'succeeded', right: 'skipped', join: 'succeeded' });
      expect(step(second, 'left').fingerprint).not.toBe(step(first, 'left').fingerprint);
      expect(step(second, 'right').fingerprint).toBe(step(first, 'right').fingerprint);
      expect(step(second, 'join').fingerprint).not.toBe(step(first, 'join').fingerprint);
      expect(runner.callsTo('right-tool')).toHaveLength(1);
      expect(runner.callsTo('left-tool')).toHaveLength(2);
    });

    it('changes fingerprints when a declared tool version changes', async () => {
      const defs = defineSteps([{ id: 'build', action: 'run', tool: 'pnpm', args: ['run', 'build'] }]);
      const runner = new FakeRunner();
      const first = await run(buildPlan(config, defs), runner);

      const bumped = {
        ...config,
        toolchain: { ...config.toolchain, pnpm: { ...config.toolchain.pnpm, version: '9.7.0' } },
      };
      const second = await run(buildPlan(bumped, defs), runner);

      expect(step(second, 'build').status).toBe('succeeded');
      expect(step(second, 'build').fingerprint).not.toBe(step(first, 'build').fingerprint);
    });

    it('restores outputs missing from the work directory', async () => {
      writeInput('inputs/left.txt', 'left v1');
      writeInput('inputs/right.txt', 'right v1');
      const plan = buildPlan(config, diamond());
      const runner = diamondRunner();
      const events: EngineEvent[] = [];
      const bus = new EventBus();
      bus.on('event', (e) => events.push(e));

      await run(plan, runner);
      rmSync(join(config.paths.workDir, 'out'), { recursive: true });
      const second = await run(plan, runner, { events: bus });

      expect(statuses(second)).toEqual({ left: 'skipped', right: 'skipped', join: 'skipped' });
      expect(readFileSync(join(config.paths.workDir, 'out', 'joined'), 'utf-8')).toBe('LR');
      const skipped = events.filter((e) => e.type === 'step.skipped');
      expect(skipped).toHaveLength(3);
      expect(skipped.every((e) => e.type === 'step.skipped' && e.restored)).toBe(true);
    });

    it('treats a corrupt cache entry as a miss', async () => {
      writeInput('inputs/left.txt', 'left v1');
      writeInput('inputs/right.txt', 'right v1');
      const plan = buildPlan(config, diamond());
      const runner = diamondRunner();
      const first = await run(plan, runner);

      const leftFp = step(first, 'left').fingerprint ?? '';
      writeFileSync(join(store.objectDir(leftFp), 'out', 'left'), 'garbage');
      rmSync(join(config.paths.workDir, 'out', 'left'));

      const second = await run(plan, runner);
      expect(step(second, 'left').status).toBe('succeeded');
      expect(step(second, 'join').status).toBe('skipped');
      expect(readFileSync(join(config.paths.workDir, 'out', 'left'), 'utf-8')).toBe('L');
      expect(runner.callsTo('left-tool')).toHaveLength(2);
    });
  });

  describe('shared cache', () => {
    const buildStep = () =>
      defineSteps([{ id: 'build', action: 'run', command: 'build-tool', outputs: ['out/app'] }]);
    const buildRunner = () => new FakeRunner().on('build-tool', [], writes('out/app', 'app'));

    function producedElsewhere(content: string): ProducedArtifact {
      const otherWork = join(root, 'other-work');
      mkdirSync(join(otherWork, 'out'), { recursive: true });
      writeFileSync(join(otherWork, 'out', 'app'), content);
      return { stepId: 'build', workDir: otherWork, outputs: ['out/app'], toolVersions: {} };
    }

    async function fingerprintOf(plan: Plan): Promise<string> {
      const first = await run(plan, buildRunner());
      await store.evict({ kind: 'all' });
      rmSync(join(config.paths.workDir, 'out'), { recursive: true, force: true });
      return step(first, 'build').fingerprint ?? '';
    }

    it('waits for another build producing the same step past the store lock timeout', async () => {
      const plan = buildPlan(config, buildStep());
      const fp = await fingerprintOf(plan);
      const other = new ArtifactStore({ root: config.paths.cacheDir, version: config.version });
      const otherBuild = other.put(fp, async () => {
        await sleep(400);
        return producedElsewhere('from other build');
      });
      await sleep(50);

      const runner = buildRunner();
      const impatient = new ArtifactStore({ root: config.paths.cacheDir, version: config.version, lockTimeoutMs: 50 });
      const report = await run(plan, runner, { store: impatient });
      await otherBuild;

      expect(step(report, 'build').status).toBe('skipped');
      expect(readFileSync(join(config.paths.workDir, 'out', 'app'), 'utf-8')).toBe('from other build');
      expect(runner.calls).toHaveLength(0);
    });

    it('stops waiting for another build when cancelled', async () => {
      const plan = buildPlan(config, buildStep());
      const fp = await fingerprintOf(plan);
      const lock = await acquireLock({ lockPath: join(store.scopeDir, 'locks', `${fp}.lock`), owner: 'other build' });
      const token = new CancellationToken();
      token.cancelAfter(200, 'interrupted');
      const runner = buildRunner();

      try {
        const report = await run(plan, runner, { token });
        expect(step(report, 'build').error).toMatchObject({ kind: 'Cancelled', message: 'build: interrupted' });
        expect(runner.calls).toHaveLength(0);
      } finally {
        await lock.release();
      }
    });

    it('runs the step when the record another build stored turns out corrupt', async () => {
      class DamagedWinnerStore extends ArtifactStore {
        private raced = false;

        override async put(
          fingerprint: string,
          producer: () => Promise<ProducedArtifact>,
          options?: PutOptions,
        ): Promise<ArtifactRecord> {
          if (this.raced) return super.put(fingerprint, producer, options);
          this.raced = true;
          const record = await super.put(fingerprint, async () => producedElsewhere('other'));
          writeFileSync(join(record.path, 'out', 'app'), 'damaged');
          return record;
        }
      }
      const runner = buildRunner();
      const damaged = new DamagedWinnerStore({ root: config.paths.cacheDir, version: config.version });

      const report = await run(buildPlan(config, buildStep()), runner, { store: damaged });

      expect(step(report, 'build').status).toBe('succeeded');
      expect(readFileSync(join(config.paths.workDir, 'out', 'app'), 'utf-8')).toBe('app');
      expect(runner.callsTo('build-tool')).toHaveLength(1);
    });
  });

  describe('clean builds', () => {
    beforeEach(() => {
      writeInput('inputs/left.txt', 'left v1');
      writeInput('inputs/right.txt', 'right v1');
    });

    it('evicts this version and re-executes every step', async () => {
      const plan = buildPlan(config, diamond());
      const runner = diamondRunner();
      await run(plan, runner);
      // clean wipes the work directory, so inputs have to be provided again
      const cleanPlan = buildPlan(
        config,
        defineSteps([
          { id: 'seed', action: 'write', path: 'inputs/left.txt', content: 'left v1' },
          { id: 'left', action: 'run', command: 'left-tool', needs: ['seed'], inputs: ['inputs/left.txt'], outputs: ['out/left'] },
        ]),
      );
      await run(cleanPlan, runner);
      const report = await run(cleanPlan, runner, { clean: true });

      expect(statuses(report)).toEqual({ seed: 'succeeded', left: 'succeeded' });
      expect(await store.list()).toHaveLength(2);
    });

    it('with keepCache wipes the work directory but restores from the cache', async () => {
      const plan = buildPlan(
        config,
        defineSteps([
          { id: 'seed', action: 'write', path: 'inputs/seed.txt', content: 'seed' },
          { id: 'use', action: 'run', command: 'use-tool', needs: ['seed'], inputs: ['inputs/seed.txt'], outputs: ['out/used'] },
        ]),
      );
      const runner = new FakeRunner().on('use-tool', [], writes('out/used', 'used'));
      await run(plan, runner);
      writeInput('stray.txt', 'left over');

      const report = await run(plan, runner, { clean: true, keepCache: true });

      expect(statuses(report)).toEqual({ seed: 'skipped', use: 'skipped' });
      expect(existsSync(join(config.paths.workDir, 'stray.txt'))).toBe(false);
      expect(readFileSync(join(config.paths.workDir, 'out', 'used'), 'utf-8')).toBe('used');
      expect(runner.callsTo('use-tool')).toHaveLength(1);
    });
  });

  describe('failures', () => {
    it('stops at a revision mismatch without retrying and blocks the rest', async () => {
      const runner = standaloneRunner({ revision: '0123456789abcdef0123456789abcdef01234567' });
      const report = await run(buildPlan(config, standaloneSteps()), runner);

      expect(report.status).toBe('failed');
      const fetch = step(report, 'fetch');
      expect(fetch.status).toBe('failed');
      expect(fetch.attempts).toBe(1);
      expect(fetch.error?.kind).toBe('RevisionMismatch');
      expect(fetch.error?.message).toContain('expected pinned revision d045aaa75edb8ee6b69c4b1e2551c2a844377927');
      expect(runner.callsTo('git', 'clone')).toHaveLength(1);
      expect(existsSync(join(config.paths.workDir, 'src'))).toBe(false);

      expect(step(report, 'install_deps')).toMatchObject({ status: 'blocked', reason: 'dependency fetch failed' });
      expect(step(report, 'compile')).toMatchObject({
        status: 'blocked',
        reason: 'dependency install_deps did not run',
      });
      expect(report.steps.filter((s) => s.status === 'blocked')).toHaveLength(5);
    });

    it('halts independent steps after a plan-fatal failure', async () => {
      const defs = defineSteps([
        { id: 'fetch', action: 'fetch', dest: 'src' },
        { id: 'other', action: 'write', path: 'notes.txt', content: 'independent' },
      ]);
      const runner = standaloneRunner({ revision: 'ffffffffffffffffffffffffffffffffffffffff' });
      const report = await run(buildPlan({ ...config, jobs: 1 }, defs), runner);

      expect(step(report, 'other')).toMatchObject({
        status: 'blocked',
        reason: 'run halted: fetch failed with RevisionMismatch',
      });
    });

    it('keeps running independent branches after an ordinary failure', async () => {
      const defs = defineSteps([
        { id: 'broken', action: 'run', command: 'broken-tool' },
        { id: 'after', action: 'run', command: 'after-tool', needs: ['broken'] },
        { id: 'other', action: 'write', path: 'notes.txt', content: 'independent' },
      ]);
      const runner = new FakeRunner().on('broken-tool', [], () => ({ exitCode: 2, stderr: 'syntax error\n' }));
      const report = await run(buildPlan({ ...config, jobs: 1 }, defs), runner);

      expect(report.status).toBe('failed');
      expect(step(report, 'broken')).toMatchObject({ status: 'failed', attempts: 1 });
      expect(step(report, 'broken').error).toEqual({
        kind: 'NonZeroExit',
        message: 'broken: broken-tool exited with code 2',
        exitCode: 2,
        diagnostics: 'syntax error',
      });
      expect(step(report, 'after')).toMatchObject({ status: 'blocked', reason: 'dependency broken failed' });
      expect(step(report, 'other').status).toBe('succeeded');
    });

    it('retries a transient network failure and succeeds', async () => {
      const defs = defineSteps([
        { id: 'deps', action: 'run', command: 'pnpm', args: ['install'], outputs: ['node_modules'], network: true },
      ]);
      let calls = 0;
      const runner = new FakeRunner().on('pnpm', ['install'], async (inv) => {
        calls++;
        if (calls === 1) {
          return { exitCode: 1, stderr: 'ERR_PNPM_META_FETCH_FAIL connect ECONNRESET 127.0.0.1:443\n' };
        }
        return writes('node_modules/.modules.yaml', 'ok')(inv);
      });
      const events: EngineEvent[] = [];
      const bus = new EventBus();
      bus.on('event', (e) => events.push(e));

      const report = await run(buildPlan(config, defs), runner, { events: bus });

      expect(step(report, 'deps')).toMatchObject({ status: 'succeeded', attempts: 2 });
      const retries = events.filter((e) => e.type === 'step.retry');
      expect(retries).toHaveLength(1);
      expect(retries[0]).toMatchObject({ stepId: 'deps', attempt: 1, delayMs: 1, kind: 'NetworkFailure' });
    });

    it('retries a tool that timed out and succeeds', async () => {
      const defs = defineSteps([{ id: 'compile', action: 'run', command: 'make', outputs: ['out/app'] }]);
      let calls = 0;
      const runner = new FakeRunner().on('make', [], async (inv) => {
        calls++;
        if (calls === 1) return { error: new StepError('Timeout', 'make timed out after 100ms') };
        return writes('out/app', 'built')(inv);
      });
      const events: EngineEvent[] = [];
      const bus = new EventBus();
      bus.on('event', (e) => events.push(e));

      const report = await run(buildPlan(config, defs), runner, { events: bus });

      expect(step(report, 'compile')).toMatchObject({ status: 'succeeded', attempts: 2 });
      expect(events.filter((e) => e.type === 'step.retry')).toEqual([
        expect.objectContaining({ stepId: 'compile', attempt: 1, kind: 'Timeout', message: 'make timed out after 100ms' }),
      ]);
      expect(readFileSync(join(config.paths.workDir, 'out', 'app'), 'utf-8')).toBe('built');
    });

    it('gives up after the configured attempts', async () => {
      const defs = defineSteps([{ id: 'deps', action: 'run', command: 'pnpm', args: ['install'], network: true }]);
      const runner = new FakeRunner().on('pnpm', ['install'], () => ({
        exitCode: 1,
        stderr: 'getaddrinfo EAI_AGAIN registry.npmjs.org\n',
      }));
      const report = await run(buildPlan(config, defs), runner);

      expect(step(report, 'deps')).toMatchObject({ status: 'failed', attempts: 3 });
      expect(step(report, 'deps').error?.kind).toBe('NetworkFailure');
      expect(runner.calls).toHaveLength(3);
    });

    it('fails a step that does not produce its declared outputs', async () => {
      const defs = defineSteps([
        { id: 'lazy', action: 'run', command: 'lazy-tool', outputs: ['out/thing'] },
        { id: 'next', action: 'run', command: 'next-tool', needs: ['lazy'], inputs: ['out/thing'] },
      ]);
      const report = await run(buildPlan(config, defs), new FakeRunner());

      expect(step(report, 'lazy').error?.kind).toBe('OutputMissing');
      expect(step(report, 'lazy').error?.message).toBe('lazy: did not produce out/thing');
      expect(step(report, 'next').status).toBe('blocked');
    });

    it('fails a step whose external input is missing', async () => {
      const defs = defineSteps([{ id: 'read', action: 'run', command: 'reader', inputs: ['inputs/absent.txt'] }]);
      const runner = new FakeRunner();
      const report = await run(buildPlan(config, defs), runner);

      expect(step(report, 'read').error).toMatchObject({
        kind: 'InputMissing',
        message: 'read: missing input inputs/absent.txt',
      });
      expect(runner.calls).toHaveLength(0);
    });
  });

  describe('cancellation', () => {
    it('dispatches nothing when cancelled before the run', async () => {
      const token = new CancellationToken();
      token.cancel('interrupted');
      const runner = new FakeRunner();
      const report = await run(buildPlan(config, defineSteps([{ id: 'a', action: 'run', command: 'a' }])), runner, {
        token,
      });

      expect(report.status).toBe('cancelled');
      expect(step(report, 'a')).toMatchObject({ status: 'blocked', reason: 'run halted: cancelled: interrupted' });
      expect(runner.calls).toHaveLength(0);
    });

    it('stops dispatching after cancellation mid-run', async () => {
      const token = new CancellationToken();
      const defs = defineSteps([
        { id: 'first', action: 'run', command: 'first-tool' },
        { id: 'second', action: 'run', command: 'second-tool', needs: ['first'] },
      ]);
      const runner = new FakeRunner().on('first-tool', [], () => {
        token.cancel('interrupted');
        return {};
      });
      const report = await run(buildPlan(config, defs), runner, { token });

      expect(report.status).toBe('cancelled');
      expect(step(report, 'first').status).toBe('succeeded');
      expect(step(report, 'second')).toMatchObject({ status: 'blocked', reason: 'run halted: cancelled: interrupted' });
      expect(runner.callsTo('second-tool')).toHaveLength(0);
    });
  });

  describe('reporting', () => {
    it('returns a frozen report', async () => {
      const report = await run(buildPlan(config, defineSteps([{ id: 'a', action: 'run', command: 'a' }])), new FakeRunner());
      expect(Object.isFrozen(report)).toBe(true);
      expect(Object.isFrozen(report.steps)).toBe(true);
      expect(Object.isFrozen(report.steps[0])).toBe(true);
    });

    it('writes captured tool output to a per-step log', async () => {
      const runner = new FakeRunner().on('chatty', [], () => ({ stdout: 'hello from chatty\n' }));
      const report = await run(buildPlan(config, defineSteps([{ id: 'talk', action: 'run', command: 'chatty' }])), runner);

      const logPath = step(report, 'talk').logPath ?? '';
      expect(logPath).toBe(join(config.paths.workDir, '.kiln', 'logs', report.runId, 'talk.log'));
      expect(readFileSync(logPath, 'utf-8')).toContain('hello from chatty');
    });

    it('saves the report to the run store', async () => {
      const db: Database.Database = openDatabase(':memory:');
      try {
        const runStore = new RunStore(db);
        const report = await run(buildPlan(config, defineSteps([{ id: 'a', action: 'run', command: 'a' }])), new FakeRunner(), {
          runStore,
        });
        expect(runStore.get(report.runId)).toEqual(report);
      } finally {
        db.close();
      }
    });

    it('refuses to share a work directory with a running build', async () => {
      mkdirSync(config.paths.workDir, { recursive: true });
      writeFileSync(
        join(config.paths.workDir, '.kiln.lock'),
        JSON.stringify({ pid: process.pid, startedMs: Date.now(), owner: 'other run' }),
      );
      const plan = buildPlan(config, defineSteps([{ id: 'a', action: 'run', command: 'a' }]));
      await expect(run(plan, new FakeRunner())).rejects.toThrow(LockContentionError);
    });
  });
});

function twice(def: { id: string; path: string }) {
  const full = { ...def, action: 'write' as const, content: '', needs: [], inputs: [], outputs: [] };
  return [full, full] as const;
}
