// packages/core/src/utils/errors.ts

export type StepErrorKind =
  | 'ToolMissing'
  | 'NetworkFailure'
  | 'NonZeroExit'
  | 'ChecksumMismatch'
  | 'RevisionMismatch'
  | 'Timeout'
  | 'PatchTargetNotFound'
  | 'InputMissing'
  | 'OutputMissing'
  | 'VerificationFailed'
  | 'LockContention'
  | 'Cancelled';

/** Kinds the executor retries with backoff. */
const TRANSIENT_KINDS: ReadonlySet<StepErrorKind> = new Set<StepErrorKind>(['NetworkFailure', 'Timeout']);

/** Kinds that stop all further dispatch, not just the failed branch. */
const PLAN_FATAL_KINDS: ReadonlySet<StepErrorKind> = new Set<StepErrorKind>([
  'ToolMissing',
  'RevisionMismatch',
  'ChecksumMismatch',
  'Cancelled',
]);

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class PlanError extends Error {
  constructor(
    message: string,
    public readonly stepId?: string,
  ) {
    super(message);
    this.name = 'PlanError';
  }
}

export class CycleError extends PlanError {
  constructor(public readonly cycle: readonly string[]) {
    super(`Plan contains a cycle through: ${cycle.join(', ')}`, cycle[0]);
    this.name = 'CycleError';
  }
}

export class StepError extends Error {
  constructor(
    public readonly kind: StepErrorKind,
    message: string,
    public readonly diagnostics = '',
    public readonly exitCode?: number,
  ) {
    super(message);
    this.name = 'StepError';
  }

  get isTransient(): boolean {
    return TRANSIENT_KINDS.has(this.kind);
  }

  get haltsPlan(): boolean {
    return PLAN_FATAL_KINDS.has(this.kind);
  }
}

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly fingerprint?: string,
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export function isStepError(error: unknown): error is StepError {
  return error instanceof StepError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
