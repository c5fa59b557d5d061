// packages/core/src/types/step.ts — Step definitions, contexts and results

import type { CancellationToken } from '../engine/cancellation.js';
import type { ToolRunner } from '../tools/runner.js';
import type { Logger } from '../utils/logger.js';
import type { StepError } from '../utils/errors.js';

export type StepKind = 'run' | 'fetch' | 'write' | 'copy' | 'patch' | 'verify';

export type StepStatus =
  | 'pending'
  | 'blocked'
  | 'ready'
  | 'running'
  | 'succeeded'
  | 'failed'
  | 'skipped';

// -- Template form (before variable expansion) --

interface StepDefinitionBase {
  id: string;
  description?: string;
  needs: string[];
  inputs: string[];
  outputs: string[];
}

export interface RunStepDefinition extends StepDefinitionBase {
  action: 'run';
  /** Toolchain entry to invoke; takes precedence over `command`. */
  tool?: string;
  command?: string;
  args: string[];
  env: Record<string, string>;
  cwd?: string;
  /** Classify failures with network diagnostics as transient. */
  network: boolean;
  timeoutSec?: number;
}

export interface FetchStepDefinition extends StepDefinitionBase {
  action: 'fetch';
  tool: string;
  repository: string;
  ref: string;
  revision: string;
  dest: string;
}

export interface WriteStepDefinition extends StepDefinitionBase {
  action: 'write';
  path: string;
  content: string;
  mode?: number;
}

export interface CopyStepDefinition extends StepDefinitionBase {
  action: 'copy';
  from: string;
  to: string;
  mode?: number;
}

export interface PatchRule {
  /** Literal text preceding one arbitrary byte and a decimal number. */
  marker: string;
  delta: number;
}

export interface PatchStepDefinition extends StepDefinitionBase {
  action: 'patch';
  source: string;
  dest: string;
  rules: PatchRule[];
  mode?: number;
}

export interface VerifyStepDefinition extends StepDefinitionBase {
  action: 'verify';
  artifact: string;
  executable: boolean;
  minVersion?: string;
  versionArgs: string[];
  sha256?: string;
  sha512?: string;
}

export type StepDefinition =
  | RunStepDefinition
  | FetchStepDefinition
  | WriteStepDefinition
  | CopyStepDefinition
  | PatchStepDefinition
  | VerifyStepDefinition;

// -- Runtime contract --

export interface StepContext {
  /** Absolute work directory; declared paths are relative to it. */
  readonly workDir: string;
  readonly runner: ToolRunner;
  readonly token: CancellationToken;
  readonly logger: Logger;
  /** Immutable base environment for spawned tools. */
  readonly env: Readonly<Record<string, string>>;
  readonly timeoutMs: number;
  /** Receives captured tool output for the step log. */
  readonly onOutput?: (chunk: string) => void;
}

export type Readiness = { status: 'ready' } | { status: 'blocked'; reason: string };

export interface StepOutput {
  /** Declared outputs produced, relative to the work directory. */
  outputs: string[];
  /** Combined tool output, if any. */
  log: string;
}

export type StepResult = { ok: true; output: StepOutput } | { ok: false; error: StepError };

/** Machine-independent description of what a step does; fingerprint input. */
export interface StepDescriptor {
  kind: StepKind;
  [key: string]: unknown;
}

export interface Step {
  readonly id: string;
  readonly kind: StepKind;
  readonly description?: string;
  readonly inputs: readonly string[];
  readonly outputs: readonly string[];
  /** Toolchain entries the step invokes. */
  readonly tools: readonly string[];
  describe(): StepDescriptor;
  prepare(ctx: StepContext): Promise<Readiness>;
  execute(ctx: StepContext): Promise<StepResult>;
  verify(ctx: StepContext): Promise<boolean>;
}
