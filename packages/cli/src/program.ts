// packages/cli/src/program.ts — The kiln command tree

import { VERSION } from '@kiln/core';
import { Command } from 'commander';
import { buildCommand, type BuildOptions } from './commands/build.js';
import { cleanCommand, type CleanOptions } from './commands/clean.js';
import { doctorCommand, type DoctorOptions } from './commands/doctor.js';
import { planCommand, type PlanOptions } from './commands/plan.js';
import { runsCommand, type RunsOptions } from './commands/runs.js';
import { verifyCommand, type VerifyCommandOptions } from './commands/verify.js';
import {
  type CliContext,
  type GlobalOptions,
  defaultContext,
  handleError,
  parsePositiveInt,
  parsePositiveNumber,
} from './utils.js';

export type ExitHandler = (code: number) => void;

function setProcessExitCode(code: number): void {
  process.exitCode = code;
}

/**
 * Build the program. Actions report their exit code through `onExit`
 * instead of exiting, so callers decide what happens next.
 */
export function createProgram(ctx: CliContext = defaultContext(), onExit: ExitHandler = setProcessExitCode): Command {
  async function run(action: () => Promise<number>): Promise<void> {
    try {
      onExit(await action());
    } catch (error) {
      onExit(handleError(error));
    }
  }

  const program = new Command();

  program
    .name('kiln')
    .description('Reproducible, cached builds of pinned upstream releases')
    .version(VERSION)
    .enablePositionalOptions()
    .option('--verbose', 'Enable debug logging')
    .option('--config <path>', 'Config file (default: ./.kiln.yml)');

  program
    .command('plan')
    .description('Show the ordered steps with fingerprints and cache status')
    .option('--version <semver>', 'Upstream version to plan for')
    .option('--jobs <n>', 'Parallel steps', parsePositiveInt)
    .option('--json', 'Output as JSON', false)
    .action(async (options: PlanOptions, cmd: Command) => {
      await run(() => planCommand(options, cmd.optsWithGlobals<GlobalOptions>(), ctx));
    });

  program
    .command('build')
    .description('Run the plan, reusing cached step outputs')
    .option('--dry-run', 'Print the plan and execute nothing', false)
    .option('--clean', 'Evict this version from the cache and wipe the work directory first', false)
    .option('--keep-cache', 'With --clean, wipe only the work directory', false)
    .option('--jobs <n>', 'Parallel steps', parsePositiveInt)
    .option('--version <semver>', 'Upstream version to build')
    .option('--revision <sha>', 'Pinned upstream revision')
    .option('--timeout <seconds>', 'Per-step timeout', parsePositiveNumber)
    .option('--json', 'Print the run report as JSON', false)
    .action(async (options: BuildOptions, cmd: Command) => {
      await run(() => buildCommand(options, cmd.optsWithGlobals<GlobalOptions>(), ctx));
    });

  program
    .command('verify')
    .description('Verify a finished artifact')
    .argument('[path]', 'Artifact to check (default: the configured artifact)')
    .option('--min-version <semver>', 'Lowest acceptable self-reported version')
    .option('--sha256 <hex>', 'Expected sha256')
    .option('--sha512 <hex>', 'Expected sha512')
    .option('--no-executable', 'Do not require the executable bit')
    .option('--json', 'Output as JSON', false)
    .action(async (path: string | undefined, options: VerifyCommandOptions, cmd: Command) => {
      await run(() => verifyCommand(path, options, cmd.optsWithGlobals<GlobalOptions>(), ctx));
    });

  program
    .command('clean')
    .description('Evict cached artifacts and wipe the work directory')
    .option('--all', 'Evict every version', false)
    .option('--older-than <days>', 'Evict artifacts and runs older than this many days', parsePositiveNumber)
    .option('--keep-cache', 'Wipe only the work directory', false)
    .option('--json', 'Output as JSON', false)
    .action(async (options: CleanOptions, cmd: Command) => {
      await run(() => cleanCommand(options, cmd.optsWithGlobals<GlobalOptions>(), ctx));
    });

  program
    .command('runs')
    .description('Show run history, or one run in full')
    .argument('[run-id]', 'Run to show')
    .option('--limit <n>', 'Max runs to list', parsePositiveInt, 20)
    .option('--version <semver>', 'Only runs of this version')
    .option('--json', 'Output as JSON', false)
    .action(async (runId: string | undefined, options: RunsOptions, cmd: Command) => {
      await run(() => runsCommand(runId, options, cmd.optsWithGlobals<GlobalOptions>(), ctx));
    });

  program
    .command('doctor')
    .description('Check that every toolchain entry is installed and recent enough')
    .option('--json', 'Output as JSON', false)
    .action(async (options: DoctorOptions, cmd: Command) => {
      await run(() => doctorCommand(options, cmd.optsWithGlobals<GlobalOptions>(), ctx));
    });

  return program;
}
