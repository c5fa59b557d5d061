// packages/core/src/engine/cancellation.ts — Plan-level cancellation

/**
 * Shared by every step of one run. SIGINT, SIGTERM and the plan deadline
 * cancel it; running tools are stopped through `onCancel` and backoff sleeps
 * end early through `sleep`.
 */
export class CancellationToken {
  private cancelled = false;
  private cancelReason: string | undefined;
  private callbacks = new Set<() => void>();
  private deadline: ReturnType<typeof setTimeout> | undefined;

  /** Later calls keep the first reason. */
  cancel(reason = 'cancelled'): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.cancelReason = reason;
    if (this.deadline !== undefined) clearTimeout(this.deadline);
    for (const cb of this.callbacks) {
      try {
        cb();
      } catch {
        // a failing listener must not stop the others
      }
    }
    this.callbacks.clear();
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get reason(): string | undefined {
    return this.cancelReason;
  }

  /** Cancel automatically after `ms`; cleared by `clearDeadline()` or an earlier cancel. */
  cancelAfter(ms: number, reason = `timed out after ${ms}ms`): void {
    if (this.cancelled) return;
    if (this.deadline !== undefined) clearTimeout(this.deadline);
    this.deadline = setTimeout(() => this.cancel(reason), ms);
    this.deadline.unref();
  }

  clearDeadline(): void {
    if (this.deadline !== undefined) clearTimeout(this.deadline);
    this.deadline = undefined;
  }

  /** Runs `callback` on cancellation, or at once if already cancelled. */
  onCancel(callback: () => void): void {
    if (this.cancelled) {
      callback();
      return;
    }
    this.callbacks.add(callback);
  }

  offCancel(callback: () => void): void {
    this.callbacks.delete(callback);
  }

  /** Resolves true after `ms`, or false as soon as the token is cancelled. */
  sleep(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      if (this.cancelled) {
        resolve(false);
        return;
      }

      const onCancelHandler = () => {
        clearTimeout(timer);
        resolve(false);
      };

      const timer = setTimeout(() => {
        this.callbacks.delete(onCancelHandler);
        resolve(true);
      }, ms);

      this.onCancel(onCancelHandler);
    });
  }
}
