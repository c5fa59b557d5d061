// packages/core/src/engine/executor.ts — Runs a Plan with caching, retries and bounded parallelism

import { mkdir, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fingerprintStep, toolVersionsOf } from '../plan/fingerprint.js';
import type { Plan } from '../plan/plan.js';
import { LockContentionError, acquireLock } from '../store/lock.js';
import type { ArtifactStore } from '../store/artifact-store.js';
import type { RunStore } from '../store/run-store.js';
import { buildBaseEnv } from '../tools/env.js';
import type { ToolRunner } from '../tools/runner.js';
import type { RunReport, RunStatus, StepReport } from '../types/report.js';
import type { Step, StepContext } from '../types/step.js';
import { StepError, errorMessage, isStepError } from '../utils/errors.js';
import { generateRunId } from '../utils/id.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { isoNow } from '../utils/time.js';
import { CancellationToken } from './cancellation.js';
import { EventBus } from './event-bus.js';
import { StepStateTable, isSatisfied } from './state-machine.js';

export const WORKSPACE_LOCK = '.kiln.lock';
export const STATE_DIR = '.kiln';

// Per-step log buffer cap
const MAX_LOG_BYTES = 8 * 1024 * 1024;

export interface ExecutorOptions {
  store: ArtifactStore;
  runner: ToolRunner;
  logger?: Logger;
  events?: EventBus;
  token?: CancellationToken;
  /** Persist the finished report here. */
  runStore?: RunStore;
  /** Overrides the plan config's job count. */
  jobs?: number;
  /** Evict this version's cache records and wipe the work directory first. */
  clean?: boolean;
  /** With `clean`, wipe the work directory but keep cache records. */
  keepCache?: boolean;
  /** Wait this long for a concurrent run on the same work directory. */
  lockTimeoutMs?: number;
  /** Source for the allowlisted tool environment. */
  env?: Readonly<Record<string, string | undefined>>;
}

interface RunState {
  runId: string;
  states: StepStateTable;
  reports: Map<string, StepReport>;
  fingerprints: Map<string, string>;
  /** Set once a plan-fatal failure or cancellation stops dispatch. */
  halted: string | null;
  baseEnv: Readonly<Record<string, string>>;
}

function deepFreezeReport(report: RunReport): RunReport {
  for (const step of report.steps) {
    if (step.error) Object.freeze(step.error);
    Object.freeze(step);
  }
  Object.freeze(report.steps);
  return Object.freeze(report);
}

function toStepError(err: unknown): StepError {
  if (isStepError(err)) return err;
  if (err instanceof LockContentionError) return new StepError('LockContention', err.message);
  return new StepError('NonZeroExit', errorMessage(err), err instanceof Error ? (err.stack ?? '') : '');
}

/**
 * Executes a plan: steps run in topological order, at most `jobs` at a time.
 * A step whose fingerprint is already in the store is skipped (its outputs
 * restored if the work directory lacks them). Transient failures are retried
 * with backoff. A plan-fatal failure stops all further dispatch; any other
 * failure blocks only the failed step's dependents.
 */
export class Executor {
  private readonly logger: Logger;
  private readonly events: EventBus;
  private readonly token: CancellationToken;

  constructor(
    private readonly plan: Plan,
    private readonly options: ExecutorOptions,
  ) {
    this.logger = options.logger ?? silentLogger();
    this.events = options.events ?? new EventBus();
    this.token = options.token ?? new CancellationToken();
  }

  async run(): Promise<RunReport> {
    const config = this.plan.config;
    const order = this.plan.topologicalOrder();
    const workDir = config.paths.workDir;
    const jobs = Math.max(1, this.options.jobs ?? config.jobs);

    await mkdir(workDir, { recursive: true });
    const lock = await acquireLock({
      lockPath: join(workDir, WORKSPACE_LOCK),
      timeoutMs: this.options.lockTimeoutMs ?? 0,
      owner: `${config.name}@${config.version}`,
    });

    try {
      if (this.options.clean) await this.cleanWorkspace(workDir);
      if (config.timeouts.planSec !== undefined) {
        this.token.cancelAfter(config.timeouts.planSec * 1000, `plan timed out after ${config.timeouts.planSec}s`);
      }

      const state: RunState = {
        runId: generateRunId(),
        states: new StepStateTable(order.map((s) => s.id)),
        reports: new Map(order.map((s) => [s.id, this.emptyReport(s.id)])),
        fingerprints: new Map(),
        halted: null,
        baseEnv: buildBaseEnv(config, workDir, this.options.env),
      };
      const startedAt = isoNow();
      const started = Date.now();

      this.logger.info(`Run ${state.runId}: ${order.length} step(s), ${config.name} ${config.version}, jobs=${jobs}`);
      this.events.emitEvent({
        type: 'run.started',
        runId: state.runId,
        version: config.version,
        stepCount: order.length,
        jobs,
        timestamp: '',
      });

      await this.schedule(order, state, jobs);
      this.markBlocked(order, state);

      const steps = order.map((s) => this.reportOf(state, s.id));
      const status: RunStatus = this.token.isCancelled
        ? 'cancelled'
        : steps.every((s) => s.status === 'succeeded' || s.status === 'skipped')
          ? 'succeeded'
          : 'failed';

      const report = deepFreezeReport({
        runId: state.runId,
        name: config.name,
        version: config.version,
        status,
        startedAt,
        finishedAt: isoNow(),
        durationMs: Date.now() - started,
        steps,
      });

      this.options.runStore?.save(report);
      this.events.emitEvent({ type: 'run.completed', runId: state.runId, status, report, timestamp: '' });
      this.logger.info(`Run ${state.runId} ${status} in ${report.durationMs}ms`);
      return report;
    } finally {
      this.token.clearDeadline();
      await lock.release();
    }
  }

  private async schedule(order: Step[], state: RunState, jobs: number): Promise<void> {
    const running = new Map<string, Promise<void>>();

    for (;;) {
      if (state.halted === null && this.token.isCancelled) {
        state.halted = `cancelled: ${this.token.reason ?? 'cancelled'}`;
      }

      if (state.halted === null) {
        for (const step of order) {
          if (running.size >= jobs) break;
          if (state.states.get(step.id) !== 'pending') continue;
          const deps = this.plan.dependenciesOf(step.id);
          if (!deps.every((dep) => isSatisfied(state.states.get(dep)))) continue;

          const task = this.runStep(step, state).finally(() => running.delete(step.id));
          running.set(step.id, task);
        }
      }

      if (running.size === 0) return;
      await Promise.race(running.values());
    }
  }

  private async runStep(step: Step, state: RunState): Promise<void> {
    const report = this.reportOf(state, step.id);
    report.startedAt = isoNow();
    const started = Date.now();
    const log: string[] = [];
    let logBytes = 0;
    const ctx = this.contextFor(step, state, (chunk) => {
      if (logBytes >= MAX_LOG_BYTES) return;
      logBytes += Buffer.byteLength(chunk);
      log.push(chunk);
    });

    try {
      const readiness = await step.prepare(ctx);
      if (readiness.status === 'blocked') {
        state.states.transition(step.id, 'blocked');
        throw new StepError('InputMissing', `${step.id}: ${readiness.reason}`);
      }
      state.states.transition(step.id, 'ready');

      const fp = await fingerprintStep(this.plan, step, state.fingerprints);
      if (!fp.ok) {
        throw new StepError('InputMissing', `${step.id}: cannot fingerprint, missing ${fp.missing.join(', ')}`);
      }
      const fingerprint = fp.fingerprint;
      state.fingerprints.set(step.id, fingerprint);
      report.fingerprint = fingerprint;

      const nested = this.plan.nestedOutputs(step.id);
      const cached = await this.options.store.get(fingerprint);
      if (cached) {
        const restored = await this.options.store.restore(cached, ctx.workDir, nested);
        if (restored !== 'corrupt') {
          state.states.transition(step.id, 'skipped');
          this.finish(report, 'skipped', started);
          this.logger.debug(`${step.id}: cached (${fingerprint.slice(0, 12)})${restored === 'restored' ? ', restored' : ''}`);
          this.events.emitEvent({
            type: 'step.skipped',
            stepId: step.id,
            fingerprint,
            restored: restored === 'restored',
            timestamp: '',
          });
          return;
        }
      }

      state.states.transition(step.id, 'running');
      let produced = false;
      const producer = async () => {
        produced = true;
        await this.executeWithRetry(step, ctx, fingerprint, report);
        return {
          stepId: step.id,
          workDir: ctx.workDir,
          outputs: [...step.outputs],
          toolVersions: toolVersionsOf(this.plan, step),
          exclude: nested,
        };
      };
      // Another build producing this fingerprint is waited on for as long as the step itself may run.
      const putOptions = { waitMs: ctx.timeoutMs, wait: (ms: number) => this.token.sleep(ms) };
      const record = await this.options.store.put(fingerprint, producer, putOptions);

      if (!produced) {
        const restored = await this.options.store.restore(record, ctx.workDir, nested);
        if (restored !== 'corrupt') {
          state.states.transition(step.id, 'skipped');
          this.finish(report, 'skipped', started);
          this.events.emitEvent({ type: 'step.skipped', stepId: step.id, fingerprint, restored: true, timestamp: '' });
          return;
        }
        // restore evicted the damaged record; produce it here
        await this.options.store.put(fingerprint, producer, putOptions);
        if (!produced) {
          throw new StepError('OutputMissing', `${step.id}: stored outputs for ${fingerprint.slice(0, 12)} are corrupt`);
        }
      }

      state.states.transition(step.id, 'succeeded');
      this.finish(report, 'succeeded', started);
      this.logger.info(`${step.id}: done in ${report.durationMs}ms`);
      this.events.emitEvent({
        type: 'step.completed',
        stepId: step.id,
        fingerprint,
        durationMs: report.durationMs,
        timestamp: '',
      });
    } catch (err) {
      const error =
        err instanceof LockContentionError && this.token.isCancelled
          ? new StepError('Cancelled', `${step.id}: ${this.token.reason ?? 'cancelled'}`)
          : toStepError(err);
      if (state.states.get(step.id) === 'pending') state.states.transition(step.id, 'blocked');
      state.states.transition(step.id, 'failed');
      report.error = {
        kind: error.kind,
        message: error.message,
        exitCode: error.exitCode,
        diagnostics: error.diagnostics,
      };
      this.finish(report, 'failed', started);
      if (error.haltsPlan && state.halted === null) {
        state.halted = `${step.id} failed with ${error.kind}`;
      }
      this.logger.error(`${step.id}: ${error.kind}: ${error.message}`);
      this.events.emitEvent({
        type: 'step.failed',
        stepId: step.id,
        kind: error.kind,
        error: error.message,
        attempts: report.attempts,
        timestamp: '',
      });
    } finally {
      if (log.length > 0) {
        try {
          report.logPath = await this.writeLog(state.runId, step.id, ctx.workDir, log);
        } catch (err) {
          this.logger.warn(`${step.id}: could not write step log: ${errorMessage(err)}`);
        }
      }
    }
  }

  private async executeWithRetry(step: Step, ctx: StepContext, fingerprint: string, report: StepReport): Promise<void> {
    const retry = this.plan.config.retry;
    await withRetry(
      async (attempt) => {
        report.attempts = attempt;
        if (this.token.isCancelled) {
          throw new StepError('Cancelled', `${step.id}: ${this.token.reason ?? 'cancelled'}`);
        }
        this.logger.debug(`${step.id}: attempt ${attempt} (${fingerprint.slice(0, 12)})`);
        this.events.emitEvent({ type: 'step.started', stepId: step.id, fingerprint, attempt, timestamp: '' });

        const result = await step.execute(ctx);
        if (!result.ok) throw result.error;
        if (result.output.log) ctx.onOutput?.(`${result.output.log}\n`);
        if (!(await step.verify(ctx))) {
          throw new StepError('OutputMissing', `${step.id}: declared outputs missing after execution`);
        }
      },
      {
        attempts: retry.attempts,
        backoff: retry.backoffMs,
        maxBackoff: retry.maxBackoffMs,
        retryOn: (err) => isStepError(err) && err.isTransient && !this.token.isCancelled,
        onRetry: (err, attempt, delayMs) => {
          const error = toStepError(err);
          this.logger.warn(`${step.id}: ${error.kind} on attempt ${attempt}, retrying in ${delayMs}ms`);
          this.events.emitEvent({
            type: 'step.retry',
            stepId: step.id,
            attempt,
            delayMs,
            kind: error.kind,
            message: error.message,
            timestamp: '',
          });
        },
        wait: (ms) => this.token.sleep(ms),
      },
    );
  }

  private contextFor(step: Step, state: RunState, onOutput: (chunk: string) => void): StepContext {
    return {
      workDir: this.plan.config.paths.workDir,
      runner: this.options.runner,
      token: this.token,
      logger: this.logger.child(step.id),
      env: state.baseEnv,
      timeoutMs: this.plan.config.timeouts.stepSec * 1000,
      onOutput,
    };
  }

  /** Steps never dispatched become `blocked` with the reason they did not run. */
  private markBlocked(order: Step[], state: RunState): void {
    for (const step of order) {
      if (state.states.get(step.id) !== 'pending') continue;
      state.states.transition(step.id, 'blocked');
      const report = this.reportOf(state, step.id);
      report.status = 'blocked';

      const upstream = this.plan
        .dependenciesOf(step.id)
        .find((dep) => !isSatisfied(state.states.get(dep)));
      if (upstream !== undefined && state.states.get(upstream) === 'failed') {
        report.reason = `dependency ${upstream} failed`;
      } else if (upstream !== undefined) {
        report.reason = `dependency ${upstream} did not run`;
      } else {
        report.reason = `run halted: ${state.halted ?? 'not dispatched'}`;
      }
    }
  }

  private async cleanWorkspace(workDir: string): Promise<void> {
    if (!this.options.keepCache) {
      const evicted = await this.options.store.evict({ kind: 'version', version: this.plan.config.version });
      this.logger.info(`Clean build: evicted ${evicted} cache record(s) for ${this.plan.config.version}`);
    }
    for (const entry of await readdir(workDir)) {
      if (entry === WORKSPACE_LOCK) continue;
      await rm(join(workDir, entry), { recursive: true, force: true });
    }
  }

  private async writeLog(runId: string, stepId: string, workDir: string, chunks: string[]): Promise<string> {
    const dir = join(workDir, STATE_DIR, 'logs', runId);
    await mkdir(dir, { recursive: true });
    const path = join(dir, `${stepId}.log`);
    await writeFile(path, chunks.join(''));
    return path;
  }

  private emptyReport(stepId: string): StepReport {
    return {
      stepId,
      status: 'blocked',
      fingerprint: null,
      attempts: 0,
      startedAt: null,
      finishedAt: null,
      durationMs: 0,
      logPath: null,
    };
  }

  private reportOf(state: RunState, stepId: string): StepReport {
    const report = state.reports.get(stepId);
    if (!report) throw new Error(`No report for step "${stepId}"`);
    return report;
  }

  private finish(report: StepReport, status: StepReport['status'], started: number): void {
    report.status = status;
    report.finishedAt = isoNow();
    report.durationMs = Date.now() - started;
  }
}
