// packages/core/src/types/report.ts — Run and verification reports

import type { StepErrorKind } from '../utils/errors.js';

export type RunStatus = 'succeeded' | 'failed' | 'cancelled';

/** Terminal state shown for a step in a report. */
export type StepOutcome = 'succeeded' | 'skipped' | 'failed' | 'blocked';

export interface StepFailure {
  kind: StepErrorKind;
  message: string;
  exitCode?: number;
  /** Full captured diagnostic text of the underlying tool. */
  diagnostics: string;
}

export interface StepReport {
  stepId: string;
  status: StepOutcome;
  fingerprint: string | null;
  attempts: number;
  startedAt: string | null;
  finishedAt: string | null;
  durationMs: number;
  /** Captured tool output for this step, if any was written. */
  logPath: string | null;
  /** Why a blocked step never ran. */
  reason?: string;
  error?: StepFailure;
}

export interface RunReport {
  runId: string;
  name: string;
  version: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  steps: StepReport[];
}

export type VerifyFailureCode =
  | 'NotFound'
  | 'NotExecutable'
  | 'ChecksumMismatch'
  | 'VersionTooLow'
  | 'VersionUnavailable';

export interface VerifyFailure {
  code: VerifyFailureCode;
  message: string;
}

export interface VerifyRequirements {
  executable: boolean;
  minVersion?: string;
  versionArgs: readonly string[];
  sha256?: string;
  sha512?: string;
}

export interface VerifyReport {
  path: string;
  ok: boolean;
  exists: boolean;
  executable: boolean;
  checksums: { sha256: string; sha512: string } | null;
  version: string | null;
  failures: VerifyFailure[];
}
