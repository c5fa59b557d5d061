// packages/core/src/steps/copy-step.ts

import { chmod } from 'node:fs/promises';
import type { CopyStepDefinition, StepContext, StepResult } from '../types/step.js';
import { atomicCopy } from '../utils/fs.js';
import { BaseStep } from './base.js';

function withImpliedPaths(def: CopyStepDefinition): CopyStepDefinition {
  return {
    ...def,
    inputs: def.inputs.includes(def.from) ? def.inputs : [...def.inputs, def.from],
    outputs: def.outputs.includes(def.to) ? def.outputs : [...def.outputs, def.to],
  };
}

/** Copies a file or tree inside the work directory, optionally setting its mode. */
export class CopyStep extends BaseStep<CopyStepDefinition> {
  constructor(def: CopyStepDefinition, portable: CopyStepDefinition) {
    super(withImpliedPaths(def), withImpliedPaths(portable));
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    const target = this.resolvePath(ctx, this.def.to);
    await atomicCopy(this.resolvePath(ctx, this.def.from), target);
    if (this.def.mode !== undefined) await chmod(target, this.def.mode);
    return this.succeed(`copied ${this.def.from} to ${this.def.to}`);
  }
}
