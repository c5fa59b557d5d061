// packages/core/src/steps/write-step.ts

import type { StepContext, StepResult, WriteStepDefinition } from '../types/step.js';
import { atomicWriteFile } from '../utils/fs.js';
import { BaseStep } from './base.js';

/** Writes literal (template-expanded) content to a file. */
export class WriteStep extends BaseStep<WriteStepDefinition> {
  constructor(def: WriteStepDefinition, portable: WriteStepDefinition) {
    super(withPathOutput(def), withPathOutput(portable));
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    await atomicWriteFile(this.resolvePath(ctx, this.def.path), this.def.content, this.def.mode);
    return this.succeed(`wrote ${this.def.path}`);
  }
}

function withPathOutput(def: WriteStepDefinition): WriteStepDefinition {
  return def.outputs.includes(def.path) ? def : { ...def, outputs: [...def.outputs, def.path] };
}
