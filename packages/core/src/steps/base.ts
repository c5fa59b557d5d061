// packages/core/src/steps/base.ts — Shared behaviour of the built-in step kinds

import { isAbsolute, posix, resolve } from 'node:path';
import type {
  Readiness,
  Step,
  StepContext,
  StepDefinition,
  StepDescriptor,
  StepKind,
  StepResult,
} from '../types/step.js';
import { PlanError, StepError, type StepErrorKind } from '../utils/errors.js';
import { pathExists } from '../utils/fs.js';

/** Reject declared paths that are absolute or climb out of the work directory. */
export function assertContained(stepId: string, path: string): void {
  const normalized = posix.normalize(path.replaceAll('\\', '/'));
  if (isAbsolute(path) || normalized === '..' || normalized.startsWith('../')) {
    throw new PlanError(`Step "${stepId}" declares path "${path}" outside the work directory`, stepId);
  }
}

export abstract class BaseStep<D extends StepDefinition> implements Step {
  readonly id: string;
  readonly kind: StepKind;
  readonly description?: string;
  readonly inputs: readonly string[];
  readonly outputs: readonly string[];
  readonly tools: readonly string[] = [];

  /**
   * @param def Definition expanded with this machine's values.
   * @param portable The same definition expanded with placeholders.
   */
  constructor(
    protected readonly def: D,
    protected readonly portable: D,
  ) {
    this.id = def.id;
    this.kind = def.action;
    this.description = def.description;
    this.inputs = Object.freeze([...def.inputs]);
    this.outputs = Object.freeze([...def.outputs]);
    for (const path of [...this.inputs, ...this.outputs]) assertContained(def.id, path);
  }

  describe(): StepDescriptor {
    const omitted = new Set(['id', 'description', 'needs', 'action', ...this.undescribedFields()]);
    const descriptor: StepDescriptor = { kind: this.portable.action };
    for (const [key, value] of Object.entries(this.portable)) {
      if (!omitted.has(key)) descriptor[key] = value;
    }
    return descriptor;
  }

  /** Definition fields that do not change what the step produces. */
  protected undescribedFields(): readonly string[] {
    return [];
  }

  async prepare(ctx: StepContext): Promise<Readiness> {
    const missing = await this.missingPaths(ctx, this.inputs);
    if (missing.length > 0) {
      return { status: 'blocked', reason: `missing input ${missing.join(', ')}` };
    }
    return { status: 'ready' };
  }

  abstract execute(ctx: StepContext): Promise<StepResult>;

  async verify(ctx: StepContext): Promise<boolean> {
    return (await this.missingPaths(ctx, this.outputs)).length === 0;
  }

  protected resolvePath(ctx: StepContext, path: string): string {
    return resolve(ctx.workDir, path);
  }

  protected async missingPaths(ctx: StepContext, paths: readonly string[]): Promise<string[]> {
    const missing: string[] = [];
    for (const path of paths) {
      if (!(await pathExists(this.resolvePath(ctx, path)))) missing.push(path);
    }
    return missing;
  }

  protected succeed(log = ''): StepResult {
    return { ok: true, output: { outputs: [...this.outputs], log } };
  }

  protected fail(kind: StepErrorKind, message: string, diagnostics = '', exitCode?: number): StepResult {
    return { ok: false, error: new StepError(kind, `${this.id}: ${message}`, diagnostics, exitCode) };
  }
}
