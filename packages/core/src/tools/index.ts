// packages/core/src/tools -- External tool invocation

export { ProcessRunner, TRUNCATION_MARKER, signalProcessTree } from './process-runner.js';
export type { ProcessRunnerOptions } from './process-runner.js';
export { diagnosticsOf } from './runner.js';
export type { ToolInvocation, ToolResult, ToolOutcome, ToolRunner } from './runner.js';
export { classifyExit, looksLikeNetworkFailure } from './classify.js';
export { buildBaseEnv, buildFilteredEnv } from './env.js';
export { detectTool, detectToolchain } from './detector.js';
export type { ToolDetection } from './detector.js';
