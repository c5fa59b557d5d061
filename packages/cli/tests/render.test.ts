import type { RunReport } from '@kiln/core';
import chalk from 'chalk';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { printPlan, printReport, printVerifyReport } from '../src/render.js';

let lines: string[];

beforeEach(() => {
  chalk.level = 0;
  lines = [];
  vi.spyOn(console, 'log').mockImplementation((text: unknown) => {
    lines.push(String(text));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('printReport', () => {
  it('shows each step with its error, block reason and log path', () => {
    const report: RunReport = {
      runId: 'run_render',
      name: 'demo',
      version: '1.2.3',
      status: 'failed',
      startedAt: '2026-01-01T00:00:00.000Z',
      finishedAt: '2026-01-01T00:00:02.500Z',
      durationMs: 2500,
      steps: [
        { stepId: 'fetch', status: 'skipped', fingerprint: 'f', attempts: 0, startedAt: null, finishedAt: null, durationMs: 0, logPath: null },
        {
          stepId: 'compile',
          status: 'failed',
          fingerprint: 'c',
          attempts: 1,
          startedAt: null,
          finishedAt: null,
          durationMs: 10,
          logPath: '/work/.kiln/logs/run_render/compile.log',
          error: { kind: 'NonZeroExit', message: 'compile: make exited with code 2', exitCode: 2, diagnostics: '' },
        },
        {
          stepId: 'package',
          status: 'blocked',
          fingerprint: null,
          attempts: 0,
          startedAt: null,
          finishedAt: null,
          durationMs: 0,
          logPath: null,
          reason: 'dependency compile failed',
        },
      ],
    };

    printReport(report);

    expect(lines).toEqual([
      '\n━━━ Run failed ━━━',
      '  demo 1.2.3 (run_render) in 2.5s',
      '  ↷ fetch',
      '  ✗ compile: compile: make exited with code 2',
      '    log: /work/.kiln/logs/run_render/compile.log',
      '  ⊘ package: dependency compile failed',
    ]);
  });
});

describe('printPlan', () => {
  it('prints one line per step and its dependencies', () => {
    printPlan([
      { id: 'fetch', kind: 'fetch', needs: [], fingerprint: 'a'.repeat(64), cache: 'hit' },
      { id: 'compile', kind: 'run', needs: ['fetch'], fingerprint: null, cache: 'unknown' },
    ]);

    expect(lines).toEqual([
      `  ${'fetch'.padEnd(16)} ${'fetch'.padEnd(7)} ${'a'.repeat(12)}  cached`,
      `  ${'compile'.padEnd(16)} ${'run'.padEnd(7)} ${'-'.repeat(12)}  unknown`,
      '    needs: fetch',
    ]);
  });
});

describe('printVerifyReport', () => {
  it('lists every failure', () => {
    printVerifyReport({
      path: '/work/out/demo',
      ok: false,
      exists: true,
      executable: false,
      checksums: null,
      version: '1.2.3',
      failures: [
        { code: 'NotExecutable', message: '/work/out/demo is not executable' },
        { code: 'VersionTooLow', message: 'version 1.2.3 is below required 2.0.0' },
      ],
    });

    expect(lines).toEqual([
      'FAIL /work/out/demo',
      '  version: 1.2.3',
      '  NotExecutable: /work/out/demo is not executable',
      '  VersionTooLow: version 1.2.3 is below required 2.0.0',
    ]);
  });
});
