// packages/cli/src/commands/doctor.ts — Preflight checks for the configured toolchain

import { accessSync, constants, existsSync } from 'node:fs';
import { VERSION, detectToolchain } from '@kiln/core';
import chalk from 'chalk';
import { printDetections } from '../render.js';
import { type CliContext, EXIT_FAILURE, EXIT_OK, EXIT_TOOL_MISSING, type GlobalOptions, loadCliConfig } from '../utils.js';

export interface DoctorOptions {
  json?: boolean;
}

function writable(dir: string): boolean {
  if (!existsSync(dir)) return true;
  try {
    accessSync(dir, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

export async function doctorCommand(options: DoctorOptions, globals: GlobalOptions, ctx: CliContext): Promise<number> {
  const config = loadCliConfig(globals, ctx);
  const detections = await detectToolchain(ctx.runner, config.toolchain);
  const unwritable = [config.paths.workDir, config.paths.cacheDir].filter((dir) => !writable(dir));

  const toolsOk = detections.every((tool) => tool.available && tool.satisfies);
  const code = !toolsOk ? EXIT_TOOL_MISSING : unwritable.length > 0 ? EXIT_FAILURE : EXIT_OK;

  if (options.json) {
    console.log(JSON.stringify({ ok: code === EXIT_OK, tools: detections, unwritable }, null, 2));
    return code;
  }

  console.error(chalk.cyan(`\n  kiln doctor v${VERSION}\n`));
  printDetections(detections);
  for (const dir of unwritable) {
    console.error(chalk.red(`  FAIL  ${dir} is not writable`));
  }
  const failed = detections.filter((tool) => !tool.available || !tool.satisfies).length + unwritable.length;
  console.error(failed === 0 ? chalk.green('\n  All checks passed.\n') : chalk.red(`\n  ${failed} check(s) failed.\n`));
  return code;
}
