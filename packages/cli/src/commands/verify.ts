// packages/cli/src/commands/verify.ts — Check a finished artifact

import { resolve } from 'node:path';
import { ConfigError, Verifier, buildFilteredEnv, resolveArtifact } from '@kiln/core';
import type { VerifyRequirements } from '@kiln/core';
import { printVerifyReport } from '../render.js';
import { type CliContext, EXIT_OK, EXIT_VERIFICATION, type GlobalOptions, loadCliConfig } from '../utils.js';

export interface VerifyCommandOptions {
  minVersion?: string;
  sha256?: string;
  sha512?: string;
  /** Commander sets this false for `--no-executable`. */
  executable: boolean;
  json?: boolean;
}

/**
 * Flags override the configured artifact. An explicit path is taken relative
 * to the project directory; the configured one to the work directory.
 */
export async function verifyCommand(
  path: string | undefined,
  options: VerifyCommandOptions,
  globals: GlobalOptions,
  ctx: CliContext,
): Promise<number> {
  const config = loadCliConfig(globals, ctx);
  const artifact = resolveArtifact(config);

  let target: string;
  if (path !== undefined) {
    target = resolve(ctx.projectDir, path);
  } else if (artifact) {
    target = resolve(config.paths.workDir, artifact.path);
  } else {
    throw new ConfigError('No artifact path given and none configured', 'artifact.path');
  }

  const requirements: VerifyRequirements = {
    executable: options.executable && (artifact?.executable ?? true),
    minVersion: options.minVersion ?? artifact?.minVersion,
    versionArgs: artifact?.versionArgs ?? ['--version'],
    sha256: options.sha256 ?? artifact?.sha256,
    sha512: options.sha512 ?? artifact?.sha512,
  };

  const report = await new Verifier(ctx.runner).verify(target, requirements, { env: buildFilteredEnv(ctx.env) });
  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printVerifyReport(report);
  }
  return report.ok ? EXIT_OK : EXIT_VERIFICATION;
}
