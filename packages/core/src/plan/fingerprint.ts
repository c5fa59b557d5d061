// packages/core/src/plan/fingerprint.ts — Content-addressed step identity

import { resolve } from 'node:path';
import type { Step } from '../types/step.js';
import { hashPath, hashValue } from '../utils/hash.js';
import type { Plan } from './plan.js';

/** Bumped whenever the fingerprint layout changes. */
export const FINGERPRINT_SCHEMA = 1;

export interface FingerprintInputs {
  descriptor: unknown;
  /** Input path → content hash, or the producing steps' fingerprints. */
  inputs: Record<string, string>;
  /** Direct dependency id → fingerprint. */
  dependencies: Record<string, string>;
  toolVersions: Record<string, string>;
  version: string;
  revision: string;
}

export function computeFingerprint(parts: FingerprintInputs): string {
  return hashValue({ schema: FINGERPRINT_SCHEMA, ...parts });
}

export function toolVersionsOf(plan: Plan, step: Step): Record<string, string> {
  const versions: Record<string, string> = {};
  for (const tool of step.tools) {
    versions[tool] = plan.config.toolchain[tool]?.version ?? 'unversioned';
  }
  return versions;
}

export type FingerprintResult =
  | { ok: true; fingerprint: string }
  | { ok: false; missing: string[] };

/**
 * Fingerprint `step` from its descriptor, its inputs and everything upstream.
 * Inputs written by upstream steps contribute those steps' fingerprints, so
 * a change propagates to dependents without re-hashing large trees; inputs
 * no upstream step writes are hashed from disk.
 */
export async function fingerprintStep(
  plan: Plan,
  step: Step,
  known: ReadonlyMap<string, string>,
): Promise<FingerprintResult> {
  const workDir = plan.config.paths.workDir;
  const inputs: Record<string, string> = {};
  const missing: string[] = [];

  const ancestors = plan.ancestorsOf(step.id);
  for (const input of step.inputs) {
    const producers = plan.producersOf(input, step.id).filter((producer) => ancestors.has(producer.id));
    if (producers.length > 0) {
      const upstream: string[] = [];
      for (const producer of producers) {
        const fp = known.get(producer.id);
        if (fp === undefined) missing.push(`${input} (from ${producer.id})`);
        else upstream.push(`${producer.id}:${fp}`);
      }
      inputs[input] = `steps:${upstream.join(',')}`;
      continue;
    }
    const hash = await hashPath(resolve(workDir, input));
    if (hash === null) missing.push(input);
    else inputs[input] = hash;
  }

  const dependencies: Record<string, string> = {};
  for (const dep of plan.dependenciesOf(step.id)) {
    const fp = known.get(dep);
    if (fp === undefined) missing.push(`step ${dep}`);
    else dependencies[dep] = fp;
  }

  if (missing.length > 0) return { ok: false, missing };
  return {
    ok: true,
    fingerprint: computeFingerprint({
      descriptor: step.describe(),
      inputs,
      dependencies,
      toolVersions: toolVersionsOf(plan, step),
      version: plan.config.version,
      revision: plan.config.source.revision,
    }),
  };
}

/**
 * Fingerprints for the whole plan as of now, in topological order. A step
 * whose inputs are not yet on disk, or whose upstream could not be
 * fingerprinted, maps to null.
 */
export async function fingerprintPlan(plan: Plan): Promise<Map<string, string | null>> {
  const known = new Map<string, string>();
  const result = new Map<string, string | null>();
  for (const step of plan.topologicalOrder()) {
    const fp = await fingerprintStep(plan, step, known);
    if (fp.ok) {
      known.set(step.id, fp.fingerprint);
      result.set(step.id, fp.fingerprint);
    } else {
      result.set(step.id, null);
    }
  }
  return result;
}
