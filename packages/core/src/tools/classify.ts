// packages/core/src/tools/classify.ts — Exit status to StepError

import { StepError } from '../utils/errors.js';
import { type ToolResult, diagnosticsOf } from './runner.js';

const NETWORK_PATTERNS = [
  /could not resolve host/i,
  /temporary failure in name resolution/i,
  /unable to access '/i,
  /connection (timed out|refused|reset)/i,
  /network is unreachable/i,
  /early eof/i,
  /\bE(TIMEDOUT|CONNRESET|CONNREFUSED|AI_AGAIN|NOTFOUND)\b/,
  /\bsocket hang up\b/i,
];

export function looksLikeNetworkFailure(diagnostics: string): boolean {
  return NETWORK_PATTERNS.some((p) => p.test(diagnostics));
}

/**
 * Map a finished tool to a StepError, or null on exit code 0.
 * With `network`, failures whose diagnostics match a network pattern are
 * `NetworkFailure` (retried); anything else is `NonZeroExit`.
 */
export function classifyExit(
  label: string,
  result: ToolResult,
  options: { network: boolean },
): StepError | null {
  if (result.exitCode === 0) return null;
  const diagnostics = diagnosticsOf(result);
  if (options.network && looksLikeNetworkFailure(diagnostics)) {
    return new StepError(
      'NetworkFailure',
      `${label} failed with a network error (exit ${result.exitCode})`,
      diagnostics,
      result.exitCode,
    );
  }
  return new StepError('NonZeroExit', `${label} exited with code ${result.exitCode}`, diagnostics, result.exitCode);
}
