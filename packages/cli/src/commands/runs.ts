// packages/cli/src/commands/runs.ts — Run history

import chalk from 'chalk';
import { printReport, printRuns } from '../render.js';
import { type CliContext, EXIT_FAILURE, EXIT_OK, type GlobalOptions, loadCliConfig, withRunStore } from '../utils.js';

export interface RunsOptions {
  limit: number;
  version?: string;
  json?: boolean;
}

export async function runsCommand(
  runId: string | undefined,
  options: RunsOptions,
  globals: GlobalOptions,
  ctx: CliContext,
): Promise<number> {
  const config = loadCliConfig(globals, ctx);

  return withRunStore(config, async (runs) => {
    if (runId !== undefined) {
      const report = runs.get(runId);
      if (!report) {
        console.error(chalk.red(`No run found with ID: ${runId}`));
        return EXIT_FAILURE;
      }
      if (options.json) console.log(JSON.stringify(report, null, 2));
      else printReport(report);
      return EXIT_OK;
    }

    const summaries = runs.list({ limit: options.limit, version: options.version });
    if (options.json) console.log(JSON.stringify(summaries, null, 2));
    else printRuns(summaries);
    return EXIT_OK;
  });
}
