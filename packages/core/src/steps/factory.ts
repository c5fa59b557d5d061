// packages/core/src/steps/factory.ts

import type { ToolSpec } from '../types/config.js';
import type { Step, StepDefinition } from '../types/step.js';
import { PlanError } from '../utils/errors.js';
import { CopyStep } from './copy-step.js';
import { FetchStep } from './fetch-step.js';
import { PatchStep } from './patch-step.js';
import { RunStep } from './run-step.js';
import { VerifyStep } from './verify-step.js';
import { WriteStep } from './write-step.js';

/**
 * Instantiate the step for an expanded definition. `portable` is the same
 * definition expanded with machine-independent placeholders.
 */
export function createStep(
  def: StepDefinition,
  portable: StepDefinition,
  toolchain: Readonly<Record<string, ToolSpec>>,
): Step {
  switch (def.action) {
    case 'run':
      if (portable.action !== 'run') break;
      return new RunStep(def, portable, toolchain);
    case 'fetch':
      if (portable.action !== 'fetch') break;
      return new FetchStep(def, portable, toolchain);
    case 'write':
      if (portable.action !== 'write') break;
      return new WriteStep(def, portable);
    case 'copy':
      if (portable.action !== 'copy') break;
      return new CopyStep(def, portable);
    case 'patch':
      if (portable.action !== 'patch') break;
      return new PatchStep(def, portable);
    case 'verify':
      if (portable.action !== 'verify') break;
      return new VerifyStep(def, portable);
  }
  throw new PlanError(`Step "${def.id}" definitions disagree on their action`, def.id);
}
