// packages/core/src/steps/run-step.ts — Runs one toolchain command

import { rm } from 'node:fs/promises';
import type { ToolSpec } from '../types/config.js';
import type { Readiness, RunStepDefinition, StepContext, StepResult } from '../types/step.js';
import { classifyExit } from '../tools/classify.js';
import { diagnosticsOf } from '../tools/runner.js';
import { PlanError } from '../utils/errors.js';
import { pathCovers } from '../plan/plan.js';
import { BaseStep, assertContained } from './base.js';

export class RunStep extends BaseStep<RunStepDefinition> {
  override readonly tools: readonly string[];
  private readonly program: string;

  constructor(def: RunStepDefinition, portable: RunStepDefinition, toolchain: Readonly<Record<string, ToolSpec>>) {
    super(def, portable);
    if (def.tool !== undefined) {
      const spec = toolchain[def.tool];
      if (!spec) throw new PlanError(`Step "${def.id}" uses tool "${def.tool}", which the toolchain does not declare`, def.id);
      this.program = spec.command;
      this.tools = [def.tool];
    } else if (def.command !== undefined) {
      this.program = def.command;
      this.tools = [];
    } else {
      throw new PlanError(`Step "${def.id}" needs a tool or a command`, def.id);
    }
    if (def.cwd !== undefined) assertContained(def.id, def.cwd);
    for (const output of def.outputs) {
      const replaced = def.inputs.find((input) => pathCovers(output, input));
      if (replaced !== undefined) {
        throw new PlanError(`Step "${def.id}" output "${output}" would replace its input "${replaced}"`, def.id);
      }
    }
  }

  protected override undescribedFields(): readonly string[] {
    return ['timeoutSec'];
  }

  override async prepare(ctx: StepContext): Promise<Readiness> {
    const readiness = await super.prepare(ctx);
    if (readiness.status === 'blocked' || this.def.cwd === undefined) return readiness;
    const missing = await this.missingPaths(ctx, [this.def.cwd]);
    return missing.length > 0 ? { status: 'blocked', reason: `missing working directory ${this.def.cwd}` } : readiness;
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    // Stale outputs from an interrupted attempt must not pass verification
    for (const output of this.outputs) {
      await rm(this.resolvePath(ctx, output), { recursive: true, force: true });
    }

    const label = [this.program, ...this.def.args].join(' ');
    ctx.logger.debug(`${this.id}: ${label}`);
    const outcome = await ctx.runner.run({
      command: this.program,
      args: this.def.args,
      cwd: this.resolvePath(ctx, this.def.cwd ?? '.'),
      env: { ...ctx.env, ...this.def.env },
      timeoutMs: this.def.timeoutSec !== undefined ? this.def.timeoutSec * 1000 : ctx.timeoutMs,
      token: ctx.token,
      onOutput: ctx.onOutput,
    });
    if (!outcome.ok) return { ok: false, error: outcome.error };

    const error = classifyExit(`${this.id}: ${label}`, outcome.result, { network: this.def.network });
    if (error) return { ok: false, error };

    const missing = await this.missingPaths(ctx, this.outputs);
    if (missing.length > 0) {
      return this.fail('OutputMissing', `did not produce ${missing.join(', ')}`, diagnosticsOf(outcome.result));
    }
    return this.succeed(diagnosticsOf(outcome.result));
  }
}
