// packages/core/src/steps/index.ts -- barrel re-export

export { BaseStep, assertContained } from './base.js';
export { RunStep } from './run-step.js';
export { FetchStep, revisionMatches } from './fetch-step.js';
export { WriteStep } from './write-step.js';
export { CopyStep } from './copy-step.js';
export { PatchStep, applyPatchRules } from './patch-step.js';
export type { PatchOutcome } from './patch-step.js';
export { VerifyStep } from './verify-step.js';
export { createStep } from './factory.js';
