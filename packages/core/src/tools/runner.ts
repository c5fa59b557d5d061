// packages/core/src/tools/runner.ts — The one primitive every external tool goes through

import type { CancellationToken } from '../engine/cancellation.js';
import type { StepError } from '../utils/errors.js';

export interface ToolInvocation {
  /** Executable name or path. */
  command: string;
  args: readonly string[];
  cwd: string;
  /** Complete environment for the child; nothing is inherited implicitly. */
  env: Readonly<Record<string, string>>;
  /** Absolute timeout; exceeded ⇒ `Timeout`. */
  timeoutMs?: number;
  token?: CancellationToken;
  /** Receives stdout and stderr chunks as they arrive. */
  onOutput?: (chunk: string) => void;
}

export interface ToolResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/**
 * Non-zero exits come back as `ok: true` with the exit code; only failures to
 * run the tool at all (missing, timed out, cancelled) are `ok: false`.
 */
export type ToolOutcome = { ok: true; result: ToolResult } | { ok: false; error: StepError };

export interface ToolRunner {
  run(invocation: ToolInvocation): Promise<ToolOutcome>;
}

/** Combined diagnostic text of a finished tool. */
export function diagnosticsOf(result: ToolResult): string {
  const parts: string[] = [];
  if (result.stdout.trim()) parts.push(result.stdout.trimEnd());
  if (result.stderr.trim()) parts.push(result.stderr.trimEnd());
  return parts.join('\n');
}
