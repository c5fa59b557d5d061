// packages/core/src/plan/plan.ts — Step DAG with deterministic ordering

import { posix } from 'node:path';
import type { BuildConfig } from '../types/config.js';
import type { Step } from '../types/step.js';
import { CycleError, PlanError } from '../utils/errors.js';

/** True when `outer` is `inner` or one of its ancestors. */
export function pathCovers(outer: string, inner: string): boolean {
  const a = posix.normalize(outer);
  const b = posix.normalize(inner);
  return a === b || a === '.' || b.startsWith(`${a}/`);
}

export function pathsOverlap(a: string, b: string): boolean {
  return pathCovers(a, b) || pathCovers(b, a);
}

/**
 * An immutable-config DAG of steps. Ties in the topological order are broken
 * by declaration order, so the same plan always runs in the same sequence.
 */
export class Plan {
  private readonly steps = new Map<string, Step>();
  private readonly deps = new Map<string, string[]>();
  private readonly declared: string[] = [];

  constructor(readonly config: BuildConfig) {}

  addStep(step: Step, dependsOn: readonly string[] = []): this {
    if (this.steps.has(step.id)) {
      throw new PlanError(`Duplicate step id "${step.id}"`, step.id);
    }
    this.steps.set(step.id, step);
    this.deps.set(step.id, [...new Set(dependsOn)]);
    this.declared.push(step.id);
    return this;
  }

  get size(): number {
    return this.declared.length;
  }

  has(id: string): boolean {
    return this.steps.has(id);
  }

  get(id: string): Step {
    const step = this.steps.get(id);
    if (!step) throw new PlanError(`Unknown step "${id}"`, id);
    return step;
  }

  /** Step ids in declaration order. */
  ids(): string[] {
    return [...this.declared];
  }

  dependenciesOf(id: string): readonly string[] {
    return this.deps.get(id) ?? [];
  }

  dependentsOf(id: string): string[] {
    return this.declared.filter((other) => this.dependenciesOf(other).includes(id));
  }

  /** Every step that depends on `id`, directly or transitively. */
  downstreamOf(id: string): Set<string> {
    const seen = new Set<string>();
    const queue = this.dependentsOf(id);
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      queue.push(...this.dependentsOf(next));
    }
    return seen;
  }

  ancestorsOf(id: string): Set<string> {
    const seen = new Set<string>();
    const queue = [...this.dependenciesOf(id)];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      queue.push(...this.dependenciesOf(next));
    }
    return seen;
  }

  /** Other steps whose declared outputs overlap `path`. */
  producersOf(path: string, exclude?: string): Step[] {
    return this.declared
      .filter((id) => id !== exclude)
      .map((id) => this.get(id))
      .filter((step) => step.outputs.some((output) => pathsOverlap(output, path)));
  }

  /** Outputs of other steps that sit strictly inside one of `id`'s outputs. */
  nestedOutputs(id: string): string[] {
    const own = this.get(id).outputs;
    const nested = new Set<string>();
    for (const other of this.declared) {
      if (other === id) continue;
      for (const output of this.get(other).outputs) {
        if (own.some((mine) => pathCovers(mine, output) && posix.normalize(mine) !== posix.normalize(output))) {
          nested.add(output);
        }
      }
    }
    return [...nested].sort();
  }

  /**
   * Kahn's algorithm. The ready set is always drained lowest declaration
   * index first. Throws CycleError naming one cycle when no order exists.
   */
  topologicalOrder(): Step[] {
    this.checkReferences();
    const index = new Map(this.declared.map((id, i) => [id, i]));
    const remaining = new Map(this.declared.map((id) => [id, this.dependenciesOf(id).length]));
    const ready = this.declared.filter((id) => remaining.get(id) === 0);
    const order: Step[] = [];

    while (ready.length > 0) {
      ready.sort((a, b) => (index.get(a) ?? 0) - (index.get(b) ?? 0));
      const id = ready.shift();
      if (id === undefined) break;
      remaining.delete(id);
      order.push(this.get(id));
      for (const dependent of this.dependentsOf(id)) {
        const count = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, count);
        if (count === 0) ready.push(dependent);
      }
    }

    if (remaining.size > 0) {
      throw new CycleError(this.findCycle(new Set(remaining.keys())));
    }
    return order;
  }

  /**
   * Structural checks: dependencies exist, no cycles, and any step that
   * writes a whole input (or a directory above it) is an ancestor of the
   * reader. Downstream steps may still add entries inside an input tree.
   */
  validate(): void {
    this.topologicalOrder();
    for (const id of this.declared) {
      const step = this.get(id);
      const ancestors = this.ancestorsOf(id);
      for (const input of step.inputs) {
        for (const producer of this.producersOf(input, id)) {
          const covers = producer.outputs.some((output) => pathCovers(output, input));
          if (covers && !ancestors.has(producer.id)) {
            throw new PlanError(
              `Step "${id}" reads "${input}", which step "${producer.id}" writes, but does not depend on it`,
              id,
            );
          }
        }
      }
    }
  }

  private checkReferences(): void {
    for (const id of this.declared) {
      for (const dep of this.dependenciesOf(id)) {
        if (!this.steps.has(dep)) {
          throw new PlanError(`Step "${id}" depends on unknown step "${dep}"`, id);
        }
      }
    }
  }

  // Every unresolved node still waits on another unresolved node, so walking
  // first unresolved dependencies must revisit a node.
  private findCycle(unresolved: Set<string>): string[] {
    const start = this.declared.find((id) => unresolved.has(id));
    if (start === undefined) return [];
    const path: string[] = [];
    let current: string | undefined = start;
    while (current !== undefined && !path.includes(current)) {
      path.push(current);
      current = this.dependenciesOf(current).find((dep) => unresolved.has(dep));
    }
    if (current === undefined) return path;
    return path.slice(path.indexOf(current));
  }
}
