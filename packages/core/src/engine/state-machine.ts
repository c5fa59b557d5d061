// packages/core/src/engine/state-machine.ts — Per-step status transitions

import type { StepStatus } from '../types/step.js';

const VALID_STEP_TRANSITIONS: Record<StepStatus, readonly StepStatus[]> = {
  pending: ['blocked', 'ready'],
  blocked: ['ready', 'failed'],
  ready: ['running', 'skipped', 'failed'],
  // skipped: another producer finished the same fingerprint first
  running: ['succeeded', 'failed', 'skipped'],
  succeeded: [],
  failed: [],
  skipped: [],
};

export class InvalidTransitionError extends Error {
  constructor(
    public readonly stepId: string,
    public readonly from: StepStatus,
    public readonly to: StepStatus,
  ) {
    super(`Invalid step state transition for "${stepId}": ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export function canTransition(from: StepStatus, to: StepStatus): boolean {
  return VALID_STEP_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: StepStatus): boolean {
  return status === 'succeeded' || status === 'failed' || status === 'skipped';
}

/** Terminal and usable by dependents. */
export function isSatisfied(status: StepStatus): boolean {
  return status === 'succeeded' || status === 'skipped';
}

/** Tracks every step's status and rejects invalid transitions. */
export class StepStateTable {
  private states = new Map<string, StepStatus>();

  constructor(stepIds: Iterable<string>) {
    for (const id of stepIds) this.states.set(id, 'pending');
  }

  get(stepId: string): StepStatus {
    const status = this.states.get(stepId);
    if (status === undefined) throw new Error(`Unknown step "${stepId}"`);
    return status;
  }

  transition(stepId: string, to: StepStatus): void {
    const from = this.get(stepId);
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(stepId, from, to);
    }
    this.states.set(stepId, to);
  }

  /** Walk `path` in order, e.g. pending → ready → running. */
  advance(stepId: string, ...path: StepStatus[]): void {
    for (const to of path) this.transition(stepId, to);
  }

  entries(): [string, StepStatus][] {
    return [...this.states.entries()];
  }
}
