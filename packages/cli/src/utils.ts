import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  CycleError,
  LockContentionError,
  PlanError,
  ProcessRunner,
  RunStore,
  createLogger,
  errorMessage,
  loadConfig,
  openDatabase,
} from '@kiln/core';
import type { BuildConfig, ConfigOverrides, Logger, RunReport, ToolRunner } from '@kiln/core';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_VERIFICATION = 2;
export const EXIT_TOOL_MISSING = 3;

export const RUNS_DB = 'runs.db';

/** Options every command inherits from the program. */
export type GlobalOptions = {
  verbose?: boolean;
  config?: string;
};

/** What commands need from the outside world; tests swap these out. */
export interface CliContext {
  projectDir: string;
  runner: ToolRunner;
  env: Readonly<Record<string, string | undefined>>;
  templatesDir: string;
}

/** Bundled plan templates at the repository root. */
export function templatesDir(): string {
  return fileURLToPath(new URL('../../../templates', import.meta.url));
}

export function defaultContext(): CliContext {
  return {
    projectDir: process.cwd(),
    runner: new ProcessRunner(),
    env: process.env,
    templatesDir: templatesDir(),
  };
}

export function loadCliConfig(globals: GlobalOptions, ctx: CliContext, overrides: ConfigOverrides = {}): BuildConfig {
  return loadConfig({
    projectDir: ctx.projectDir,
    configPath: globals.config,
    env: ctx.env,
    overrides: { ...overrides, logLevel: globals.verbose ? 'debug' : overrides.logLevel },
  });
}

export function cliLogger(config: BuildConfig): Logger {
  return createLogger(config.logLevel);
}

/**
 * Run `fn` with the run history database, closing it on every path.
 */
export async function withRunStore<T>(config: BuildConfig, fn: (runs: RunStore) => Promise<T>): Promise<T> {
  mkdirSync(config.paths.cacheDir, { recursive: true });
  const db = openDatabase(join(config.paths.cacheDir, RUNS_DB));
  try {
    return await fn(new RunStore(db));
  } finally {
    db.close();
  }
}

/** Exit code for a finished run. */
export function exitCodeFor(report: RunReport): number {
  if (report.status === 'succeeded') return EXIT_OK;
  const kinds = report.steps.flatMap((step) => (step.error ? [step.error.kind] : []));
  if (kinds.includes('ToolMissing')) return EXIT_TOOL_MISSING;
  if (kinds.some((kind) => kind === 'VerificationFailed' || kind === 'ChecksumMismatch')) return EXIT_VERIFICATION;
  return EXIT_FAILURE;
}

/** Print an error thrown out of a command and map it to an exit code. */
export function handleError(error: unknown): number {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  if (error instanceof ConfigError && error.field) {
    console.error(chalk.gray(`  field: ${error.field}`));
  } else if (error instanceof CycleError) {
    console.error(chalk.gray(`  cycle: ${error.cycle.join(' -> ')}`));
  } else if (error instanceof PlanError && error.stepId) {
    console.error(chalk.gray(`  step: ${error.stepId}`));
  } else if (error instanceof LockContentionError) {
    console.error(chalk.gray('  another kiln process holds the work directory'));
  }
  return EXIT_FAILURE;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

export function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return n;
}
