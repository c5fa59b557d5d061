// packages/core/src/steps/fetch-step.ts — Shallow clone at a pinned revision

import { mkdir, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ToolSpec } from '../types/config.js';
import type { FetchStepDefinition, StepContext, StepResult } from '../types/step.js';
import { classifyExit } from '../tools/classify.js';
import { diagnosticsOf } from '../tools/runner.js';
import { MIN_REVISION_LENGTH } from '../utils/constants.js';
import { PlanError } from '../utils/errors.js';
import { commitTemp, tempSibling } from '../utils/fs.js';
import { BaseStep } from './base.js';

/** Case-insensitive prefix match of a resolved commit against its pin. */
export function revisionMatches(actual: string, pinned: string): boolean {
  const a = actual.trim().toLowerCase();
  const p = pinned.trim().toLowerCase();
  return p.length >= MIN_REVISION_LENGTH && a.startsWith(p);
}

function withDestOutput(def: FetchStepDefinition): FetchStepDefinition {
  return def.outputs.includes(def.dest) ? def : { ...def, outputs: [...def.outputs, def.dest] };
}

export class FetchStep extends BaseStep<FetchStepDefinition> {
  override readonly tools: readonly string[];
  private readonly program: string;

  constructor(def: FetchStepDefinition, portable: FetchStepDefinition, toolchain: Readonly<Record<string, ToolSpec>>) {
    super(withDestOutput(def), withDestOutput(portable));
    if (!/^[0-9a-f]+$/i.test(def.revision) || def.revision.length < MIN_REVISION_LENGTH) {
      throw new PlanError(
        `Step "${def.id}" pins revision "${def.revision}"; expected at least ${MIN_REVISION_LENGTH} hex characters`,
        def.id,
      );
    }
    this.program = toolchain[def.tool]?.command ?? def.tool;
    this.tools = [def.tool];
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    const dest = this.resolvePath(ctx, this.def.dest);
    await mkdir(dirname(dest), { recursive: true });
    const tmp = tempSibling(dest);
    const base = { env: ctx.env, timeoutMs: ctx.timeoutMs, token: ctx.token, onOutput: ctx.onOutput };

    try {
      const clone = await ctx.runner.run({
        ...base,
        command: this.program,
        args: ['clone', '--depth', '1', '--branch', this.def.ref, this.def.repository, tmp],
        cwd: dirname(dest),
      });
      if (!clone.ok) return { ok: false, error: clone.error };
      const cloneError = classifyExit(`${this.id}: clone ${this.def.repository}@${this.def.ref}`, clone.result, {
        network: true,
      });
      if (cloneError) return { ok: false, error: cloneError };

      const head = await ctx.runner.run({ ...base, command: this.program, args: ['rev-parse', 'HEAD'], cwd: tmp });
      if (!head.ok) return { ok: false, error: head.error };
      const headError = classifyExit(`${this.id}: rev-parse HEAD`, head.result, { network: false });
      if (headError) return { ok: false, error: headError };

      const actual = head.result.stdout.trim();
      if (!revisionMatches(actual, this.def.revision)) {
        return this.fail(
          'RevisionMismatch',
          `${this.def.ref} resolved to ${actual || '(nothing)'}, expected pinned revision ${this.def.revision}`,
          diagnosticsOf(head.result),
        );
      }

      await commitTemp(tmp, dest);
      return this.succeed(`fetched ${this.def.repository}@${this.def.ref} (${actual})`);
    } finally {
      await rm(tmp, { recursive: true, force: true });
    }
  }
}
