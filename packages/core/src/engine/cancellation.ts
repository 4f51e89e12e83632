// packages/core/src/engine/cancellation.ts

export class CancellationToken {
  private cancelled = false;
  private reasonText: string | undefined;
  private callbacks = new Set<() => void>();

  /** Signal cancellation. Idempotent. */
  cancel(reason?: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.reasonText = reason;
    const errors: unknown[] = [];
    for (const cb of this.callbacks) {
      try {
        cb();
      } catch (err) {
        errors.push(err);
      }
    }
    this.callbacks.clear();
    if (errors.length > 0) {
      throw new AggregateError(errors, 'One or more cancellation callbacks failed');
    }
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get reason(): string | undefined {
    return this.reasonText;
  }

  /** Throw if already cancelled. Call before starting expensive work. */
  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancellationError(this.reasonText ?? 'Operation was cancelled');
    }
  }

  /**
   * Register a callback to run on cancellation.
   * Deduplicated by reference.
   * If already cancelled, callback fires immediately.
   */
  onCancel(callback: () => void): void {
    if (this.cancelled) {
      callback();
      return;
    }
    this.callbacks.add(callback);
  }

  /** Remove a previously registered callback. */
  offCancel(callback: () => void): void {
    this.callbacks.delete(callback);
  }

  /**
   * Abort `controller` when this token is cancelled.
   * Returns a function that detaches the link.
   */
  link(controller: AbortController): () => void {
    const abort = (): void => controller.abort(new CancellationError(this.reasonText ?? 'Operation was cancelled'));
    this.onCancel(abort);
    return () => this.offCancel(abort);
  }
}

export class CancellationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CancellationError';
  }
}
