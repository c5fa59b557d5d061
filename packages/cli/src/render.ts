// packages/cli/src/render.ts — Terminal rendering for engine events and reports

import type { EngineEvent, RunReport, RunSummary, StepReport, ToolDetection, VerifyReport } from '@kiln/core';
import { formatDuration } from '@kiln/core';
import chalk from 'chalk';
import ora from 'ora';
import type { PlanRow } from './commands/plan.js';

const statusColors: Record<StepReport['status'], (text: string) => string> = {
  succeeded: chalk.green,
  skipped: chalk.cyan,
  failed: chalk.red,
  blocked: chalk.yellow,
};

const statusMarks: Record<StepReport['status'], string> = {
  succeeded: '✓',
  skipped: '↷',
  failed: '✗',
  blocked: '⊘',
};

export interface EventRenderer {
  render(event: EngineEvent): void;
  stop(): void;
}

/**
 * One spinner listing the steps in flight; finished steps print a line
 * above it. Everything goes to stderr.
 */
export function createEventRenderer(): EventRenderer {
  const spinner = ora({ stream: process.stderr });
  const running = new Set<string>();

  function refresh(): void {
    if (running.size === 0) {
      spinner.stop();
      return;
    }
    spinner.text = `Running ${[...running].join(', ')}`;
    if (!spinner.isSpinning) spinner.start();
  }

  function line(text: string): void {
    spinner.clear();
    console.error(text);
    refresh();
  }

  return {
    render(event) {
      switch (event.type) {
        case 'run.started':
          console.error(chalk.gray(`\n━━━ Run ${event.runId} ━━━`));
          console.error(chalk.gray(`Version: ${event.version}  Steps: ${event.stepCount}  Jobs: ${event.jobs}\n`));
          break;

        case 'step.started':
          running.add(event.stepId);
          refresh();
          break;

        case 'step.retry':
          line(chalk.yellow(`  ↻ ${event.stepId}: ${event.kind}, attempt ${event.attempt + 1} in ${formatDuration(event.delayMs)}`));
          break;

        case 'step.skipped':
          running.delete(event.stepId);
          line(chalk.cyan(`  ↷ ${event.stepId} (cached${event.restored ? ', restored' : ''})`));
          break;

        case 'step.completed':
          running.delete(event.stepId);
          line(chalk.green(`  ✓ ${event.stepId} (${formatDuration(event.durationMs)})`));
          break;

        case 'step.failed':
          running.delete(event.stepId);
          line(chalk.red(`  ✗ ${event.stepId}: ${event.error}`));
          break;

        case 'run.completed':
          running.clear();
          spinner.stop();
          break;
      }
    },
    stop() {
      running.clear();
      spinner.stop();
    },
  };
}

export function printPlan(rows: readonly PlanRow[]): void {
  for (const row of rows) {
    const cache = row.cache === 'hit' ? chalk.green('cached') : row.cache === 'miss' ? chalk.yellow('build') : chalk.gray('unknown');
    const fp = row.fingerprint ? row.fingerprint.slice(0, 12) : '-'.repeat(12);
    console.log(`  ${chalk.bold(row.id.padEnd(16))} ${chalk.gray(row.kind.padEnd(7))} ${chalk.gray(fp)}  ${cache}`);
    if (row.needs.length > 0) {
      console.log(chalk.gray(`    needs: ${row.needs.join(', ')}`));
    }
  }
}

export function printReport(report: RunReport): void {
  const color = report.status === 'succeeded' ? chalk.green : chalk.red;
  console.log(color(`\n━━━ Run ${report.status} ━━━`));
  console.log(chalk.gray(`  ${report.name} ${report.version} (${report.runId}) in ${formatDuration(report.durationMs)}`));
  for (const step of report.steps) {
    const paint = statusColors[step.status];
    let detail = '';
    if (step.error) detail = `: ${step.error.message}`;
    else if (step.reason) detail = `: ${step.reason}`;
    console.log(paint(`  ${statusMarks[step.status]} ${step.stepId}${detail}`));
    if (step.error && step.logPath) {
      console.log(chalk.gray(`    log: ${step.logPath}`));
    }
  }
}

export function printVerifyReport(report: VerifyReport): void {
  console.log(report.ok ? chalk.green(`PASS ${report.path}`) : chalk.red(`FAIL ${report.path}`));
  if (report.version) console.log(chalk.gray(`  version: ${report.version}`));
  if (report.checksums) {
    console.log(chalk.gray(`  sha256:  ${report.checksums.sha256}`));
    console.log(chalk.gray(`  sha512:  ${report.checksums.sha512}`));
  }
  for (const failure of report.failures) {
    console.log(chalk.red(`  ${failure.code}: ${failure.message}`));
  }
}

export function printRuns(runs: readonly RunSummary[]): void {
  if (runs.length === 0) {
    console.log(chalk.gray('No runs recorded.'));
    return;
  }
  for (const run of runs) {
    const color = run.status === 'succeeded' ? chalk.green : chalk.red;
    const counts = `${run.succeeded} built, ${run.skipped} cached, ${run.failed} failed, ${run.blocked} blocked`;
    console.log(
      `${chalk.gray(run.startedAt)}  ${run.runId}  ${color(run.status.padEnd(9))} ${run.version.padEnd(10)} ${chalk.gray(counts)}`,
    );
  }
}

export function printDetections(detections: readonly ToolDetection[]): void {
  for (const tool of detections) {
    const version = tool.version ? ` ${tool.version}` : '';
    if (tool.available && tool.satisfies) {
      console.error(chalk.green(`  PASS  ${tool.name}: ${tool.command}${version}`));
    } else {
      console.error(chalk.red(`  FAIL  ${tool.name}: ${tool.command}${version}`));
      if (tool.error) console.error(chalk.gray(`        ${tool.error}`));
    }
  }
}
