// packages/core/src/steps/verify-step.ts — Final artifact check and checksum files

import { basename } from 'node:path';
import type { StepContext, StepResult, VerifyStepDefinition } from '../types/step.js';
import { atomicWriteFile } from '../utils/fs.js';
import { formatFailures, Verifier } from '../verify/verifier.js';
import { BaseStep } from './base.js';

function withImpliedPaths(def: VerifyStepDefinition): VerifyStepDefinition {
  const outputs = [`${def.artifact}.sha256`, `${def.artifact}.sha512`].filter((o) => !def.outputs.includes(o));
  return {
    ...def,
    inputs: def.inputs.includes(def.artifact) ? def.inputs : [...def.inputs, def.artifact],
    outputs: [...def.outputs, ...outputs],
  };
}

/**
 * Runs the Verifier over the artifact; on success writes `<artifact>.sha256`
 * and `<artifact>.sha512` in the `<hash>  <name>` format sha256sum reads.
 */
export class VerifyStep extends BaseStep<VerifyStepDefinition> {
  constructor(def: VerifyStepDefinition, portable: VerifyStepDefinition) {
    super(withImpliedPaths(def), withImpliedPaths(portable));
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    const artifact = this.resolvePath(ctx, this.def.artifact);
    const report = await new Verifier(ctx.runner).verify(artifact, this.def, {
      env: ctx.env,
      token: ctx.token,
    });

    if (!report.ok || !report.checksums) {
      const kind = report.failures.some((f) => f.code === 'ChecksumMismatch') ? 'ChecksumMismatch' : 'VerificationFailed';
      return this.fail(kind, `${this.def.artifact} failed verification`, formatFailures(report));
    }

    const name = basename(artifact);
    await atomicWriteFile(`${artifact}.sha256`, `${report.checksums.sha256}  ${name}\n`);
    await atomicWriteFile(`${artifact}.sha512`, `${report.checksums.sha512}  ${name}\n`);
    const version = report.version ? ` version ${report.version}` : '';
    return this.succeed(`verified ${this.def.artifact}${version} sha256 ${report.checksums.sha256}`);
  }
}
