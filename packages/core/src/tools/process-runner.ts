// packages/core/src/tools/process-runner.ts — Child process adapter

import { spawn } from 'node:child_process';
import { KILL_GRACE_MS, MAX_CAPTURE_BYTES } from '../utils/constants.js';
import { StepError } from '../utils/errors.js';
import { isErrno } from '../utils/fs.js';
import type { ToolInvocation, ToolOutcome, ToolRunner } from './runner.js';

export const TRUNCATION_MARKER = '\n[TRUNCATED: output exceeded capture limit]';

export interface ProcessRunnerOptions {
  /** Per-stream capture limit. */
  maxCaptureBytes?: number;
  /** Delay between SIGTERM and SIGKILL when stopping a tool. */
  killGraceMs?: number;
}

class Capture {
  text = '';
  private bytes = 0;
  private truncated = false;

  constructor(private readonly limit: number) {}

  append(chunk: string): void {
    const size = Buffer.byteLength(chunk);
    if (this.bytes + size <= this.limit) {
      this.text += chunk;
      this.bytes += size;
    } else if (!this.truncated) {
      this.truncated = true;
      this.text += TRUNCATION_MARKER;
    }
  }
}

export class ProcessRunner implements ToolRunner {
  private readonly maxCaptureBytes: number;
  private readonly killGraceMs: number;

  constructor(options: ProcessRunnerOptions = {}) {
    this.maxCaptureBytes = options.maxCaptureBytes ?? MAX_CAPTURE_BYTES;
    this.killGraceMs = options.killGraceMs ?? KILL_GRACE_MS;
  }

  run(invocation: ToolInvocation): Promise<ToolOutcome> {
    const { command, args, cwd, env, timeoutMs, token, onOutput } = invocation;

    return new Promise((resolve) => {
      if (token?.isCancelled) {
        resolve({ ok: false, error: new StepError('Cancelled', `${command} not started: run cancelled`) });
        return;
      }

      const startTime = Date.now();
      const child = spawn(command, [...args], {
        cwd,
        env: { ...env },
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
        // Own process group so the whole tree can be signalled.
        detached: process.platform !== 'win32',
      });

      const stdout = new Capture(this.maxCaptureBytes);
      const stderr = new Capture(this.maxCaptureBytes);
      let settled = false;
      // Set once the tool is being stopped; reported when the child has exited.
      let stopping: StepError | undefined;
      const timers: ReturnType<typeof setTimeout>[] = [];

      const diagnostics = () => [stdout.text, stderr.text].filter(Boolean).join('\n');

      const settle = (outcome: ToolOutcome) => {
        if (settled) return;
        settled = true;
        for (const t of timers) clearTimeout(t);
        token?.offCancel(onCancel);
        resolve(outcome);
      };

      const fail = (error: StepError) => settle({ ok: false, error });

      const stop = (kind: 'Timeout' | 'Cancelled', message: string) => {
        if (settled || stopping) return;
        stopping = new StepError(kind, message);
        token?.offCancel(onCancel);
        signalProcessTree(child.pid, 'SIGTERM');
        timers.push(
          setTimeout(() => {
            signalProcessTree(child.pid, 'SIGKILL');
            // A descendant that left the group can hold the pipes open past SIGKILL.
            timers.push(setTimeout(() => finishStop(), this.killGraceMs));
          }, this.killGraceMs),
        );
      };

      const finishStop = () => {
        if (stopping) fail(new StepError(stopping.kind, stopping.message, diagnostics()));
      };

      const onCancel = () => stop('Cancelled', `${command} terminated: run cancelled`);

      if (timeoutMs !== undefined) {
        timers.push(setTimeout(() => stop('Timeout', `${command} timed out after ${timeoutMs}ms`), timeoutMs));
      }
      token?.onCancel(onCancel);

      // Decoded as a stream so a multibyte character split across chunks survives.
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout.append(chunk);
        onOutput?.(chunk);
      });
      child.stderr.on('data', (chunk: string) => {
        stderr.append(chunk);
        onOutput?.(chunk);
      });

      child.on('error', (err) => {
        if (isErrno(err, 'ENOENT') || isErrno(err, 'EACCES')) {
          fail(new StepError('ToolMissing', `${command} is required but not installed or not executable`, err.message));
          return;
        }
        fail(new StepError('NonZeroExit', `${command} could not be started: ${err.message}`, err.message));
      });

      child.on('close', (code, signal) => {
        if (stopping) {
          finishStop();
          return;
        }
        settle({
          ok: true,
          result: {
            // null code means the child died from a signal
            exitCode: code ?? (signal ? 128 : 1),
            stdout: stdout.text,
            stderr: stderr.text,
            durationMs: Date.now() - startTime,
          },
        });
      });
    });
  }
}

/** Signal the process group led by `pid`; on Windows the tree is force-killed. */
export function signalProcessTree(pid: number | undefined, signal: NodeJS.Signals): void {
  if (pid === undefined) return;
  try {
    if (process.platform === 'win32') {
      spawn('taskkill', ['/pid', String(pid), '/T', '/F'], { stdio: 'ignore' });
    } else {
      process.kill(-pid, signal);
    }
  } catch {
    // Process may already be dead
  }
}
