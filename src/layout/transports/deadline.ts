/**
 * Per-call deadline merged with an optional caller signal
 */

import type { TransportKind } from '../../shared/config.js';
import { EngineTimeoutError, LayoutCancelledError } from '../../shared/errors.js';
import type { LayoutTransportError } from '../../shared/errors.js';

export class Deadline {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private expired = false;
  private readonly onParentAbort = (): void => this.controller.abort();

  constructor(
    public readonly timeoutMs: number,
    private readonly parent?: AbortSignal
  ) {
    this.timer = setTimeout(() => {
      this.expired = true;
      this.controller.abort();
    }, timeoutMs);

    if (parent?.aborted) {
      this.controller.abort();
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Error for an aborted call: timeout if the timer fired, cancellation otherwise
   */
  toError(transport: TransportKind): LayoutTransportError {
    return this.expired
      ? new EngineTimeoutError(this.timeoutMs, transport)
      : new LayoutCancelledError(transport);
  }

  /**
   * Run `onAbort` once when the deadline passes or the caller aborts
   *
   * @returns Function removing the listener
   */
  onAbort(onAbort: () => void): () => void {
    if (this.aborted) {
      onAbort();
      return () => undefined;
    }
    this.signal.addEventListener('abort', onAbort, { once: true });
    return () => this.signal.removeEventListener('abort', onAbort);
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }
}

/**
 * Settle with `work`, or with the deadline's error if it passes first
 */
export function raceDeadline<T>(work: Promise<T>, deadline: Deadline, transport: TransportKind): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const detach = deadline.onAbort(() => reject(deadline.toError(transport)));
    work.then(
      (value) => {
        detach();
        resolve(value);
      },
      (error: unknown) => {
        detach();
        reject(error);
      }
    );
  });
}
