// packages/core/src/types/events.ts

/**
 * Engine events, emitted by the executor and rendered by the CLI.
 * Type names are dot-separated.
 */

import type { StepErrorKind } from '../utils/errors.js';
import type { RunReport, RunStatus } from './report.js';

export interface RunStartedEvent {
  type: 'run.started';
  runId: string;
  version: string;
  stepCount: number;
  jobs: number;
  timestamp: string;
}

export interface RunCompletedEvent {
  type: 'run.completed';
  runId: string;
  status: RunStatus;
  report: RunReport;
  timestamp: string;
}

export interface StepStartedEvent {
  type: 'step.started';
  stepId: string;
  fingerprint: string;
  attempt: number;
  timestamp: string;
}

export interface StepRetryEvent {
  type: 'step.retry';
  stepId: string;
  attempt: number;
  delayMs: number;
  kind: StepErrorKind;
  message: string;
  timestamp: string;
}

export interface StepSkippedEvent {
  type: 'step.skipped';
  stepId: string;
  fingerprint: string;
  restored: boolean;
  timestamp: string;
}

export interface StepCompletedEvent {
  type: 'step.completed';
  stepId: string;
  fingerprint: string;
  durationMs: number;
  timestamp: string;
}

export interface StepFailedEvent {
  type: 'step.failed';
  stepId: string;
  kind: StepErrorKind;
  error: string;
  attempts: number;
  timestamp: string;
}

export type EngineEvent =
  | RunStartedEvent
  | RunCompletedEvent
  | StepStartedEvent
  | StepRetryEvent
  | StepSkippedEvent
  | StepCompletedEvent
  | StepFailedEvent;
