// packages/core/src/steps/patch-step.ts — Offset rewriting in packaged binaries

import { readFile } from 'node:fs/promises';
import type { PatchRule, PatchStepDefinition, StepContext, StepResult } from '../types/step.js';
import { atomicWriteFile } from '../utils/fs.js';
import { BaseStep } from './base.js';

export interface PatchOutcome {
  content: Buffer;
  /** Markers with no `<marker><byte><digits>` occurrence. */
  missing: string[];
  /** Applied rewrites as `old -> new` per marker. */
  applied: { marker: string; from: string; to: string }[];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * For each rule, find the first `<marker><any byte><digits>` and add the
 * rule's delta to the number. Works on a latin1 view so every other byte of
 * the binary is written back unchanged.
 */
export function applyPatchRules(content: Buffer, rules: readonly PatchRule[]): PatchOutcome {
  let text = content.toString('latin1');
  const missing: string[] = [];
  const applied: PatchOutcome['applied'] = [];

  for (const rule of rules) {
    const pattern = new RegExp(`(${escapeRegExp(rule.marker)}[^\\n])(\\d+)`);
    const match = pattern.exec(text);
    if (!match) {
      missing.push(rule.marker);
      continue;
    }
    const [whole, prefix, digits] = match;
    const next = (BigInt(digits) + BigInt(rule.delta)).toString();
    text = text.slice(0, match.index) + prefix + next + text.slice(match.index + whole.length);
    applied.push({ marker: rule.marker, from: digits, to: next });
  }

  return { content: Buffer.from(text, 'latin1'), missing, applied };
}

function withImpliedPaths(def: PatchStepDefinition): PatchStepDefinition {
  return {
    ...def,
    inputs: def.inputs.includes(def.source) ? def.inputs : [...def.inputs, def.source],
    outputs: def.outputs.includes(def.dest) ? def.outputs : [...def.outputs, def.dest],
  };
}

export class PatchStep extends BaseStep<PatchStepDefinition> {
  constructor(def: PatchStepDefinition, portable: PatchStepDefinition) {
    super(withImpliedPaths(def), withImpliedPaths(portable));
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    const source = await readFile(this.resolvePath(ctx, this.def.source));
    const outcome = applyPatchRules(source, this.def.rules);
    if (outcome.missing.length > 0) {
      return this.fail(
        'PatchTargetNotFound',
        `${this.def.source} has no occurrence of ${outcome.missing.map((m) => JSON.stringify(m)).join(', ')}`,
      );
    }
    await atomicWriteFile(this.resolvePath(ctx, this.def.dest), outcome.content, this.def.mode);
    const log = outcome.applied.map((a) => `${a.marker.trim()} ${a.from} -> ${a.to}`).join('\n');
    return this.succeed(log);
  }
}
