// Shared cancellation token primitives for async operations.
//
// Used by the protocol session to bound the decision task started on `go`:
//   - the session owns a CancellationSource per search;
//   - the search receives only the read-only token and checks it at its own
//     boundaries (token.throwIfCanceled());
//   - `newgame`, a timeout or dispose() cancel the source.

export type CancellationReason = unknown;

/**
 * Error thrown by {@link CancellationToken.throwIfCanceled}. Carries the
 * canceller's reason so that runWithTimeout can map it to `kind: 'canceled'`.
 */
export class CancellationError extends Error {
  readonly cancellationReason: CancellationReason;

  constructor(message: string, reason: CancellationReason) {
    super(message);
    this.name = 'CancellationError';
    this.cancellationReason = reason;
    Object.setPrototypeOf(this, CancellationError.prototype);
  }
}

export function isCancellationError(error: unknown): error is CancellationError {
  return error instanceof CancellationError;
}

/**
 * Read-only view of a cancellation token.
 */
export interface CancellationToken {
  /** True once cancel() has been invoked on the associated source. */
  readonly isCanceled: boolean;
  /** Optional reason supplied by the canceller (for logging/diagnostics). */
  readonly reason?: CancellationReason;

  /**
   * Throws a CancellationError if the token has been canceled.
   *
   *   token.throwIfCanceled('before scoring candidates');
   */
  throwIfCanceled(contextMessage?: string): void;

  /**
   * Register a listener invoked once when the token is canceled. If the
   * token is already canceled the listener runs synchronously. Returns a
   * function that unregisters the listener.
   */
  onCanceled(listener: (reason: CancellationReason) => void): () => void;
}

/**
 * Mutable source for a {@link CancellationToken}.
 *
 *   const source = createCancellationSource();
 *   agent.search(snapshot, source.token).catch(handleError);
 *   // later, from a timeout or a newgame:
 *   source.cancel('newgame');
 */
export interface CancellationSource {
  readonly token: CancellationToken;
  /**
   * Marks the token as canceled. Subsequent calls are no-ops.
   */
  cancel(reason?: CancellationReason): void;
}

export function createCancellationSource(): CancellationSource {
  let canceled = false;
  let reason: CancellationReason | undefined;
  const listeners = new Set<(reason: CancellationReason) => void>();

  const token: CancellationToken = {
    get isCanceled() {
      return canceled;
    },
    get reason() {
      return reason;
    },
    throwIfCanceled(contextMessage?: string): void {
      if (!canceled) return;
      const detail = contextMessage ? ` (${contextMessage})` : '';
      throw new CancellationError(`Operation canceled${detail}`, reason);
    },
    onCanceled(listener: (reason: CancellationReason) => void): () => void {
      if (canceled) {
        listener(reason);
        return () => undefined;
      }
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };

  return {
    token,
    cancel(nextReason?: CancellationReason): void {
      if (canceled) return;
      canceled = true;
      reason = nextReason;
      const pending = [...listeners];
      listeners.clear();
      for (const listener of pending) {
        listener(nextReason);
      }
    },
  };
}
