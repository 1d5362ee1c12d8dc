// Shared timeout helper for the bounded decision task.
//
// Wraps a Promise-based operation so that callers can:
//   - enforce an explicit time budget;
//   - record the duration in milliseconds;
//   - tell success, timeout and cancellation apart without try/catch.

import {
  isCancellationError,
  type CancellationReason,
  type CancellationToken,
} from './cancellation';

export type TimedOperationResult<T> =
  | { kind: 'ok'; durationMs: number; value: T }
  | { kind: 'timeout'; durationMs: number }
  | { kind: 'canceled'; durationMs: number; cancellationReason: CancellationReason };

export interface TimedOperationOptions {
  /** Maximum allowed duration in milliseconds. */
  timeoutMs: number;
  /** Optional cancellation token for cooperative cancellation. */
  token?: CancellationToken;
  /** Clock dependency (overridable for tests). Defaults to Date.now. */
  now?: () => number;
}

type RaceOutcome<T> =
  | { kind: 'value'; value: T }
  | { kind: 'timeout' }
  | { kind: 'canceled'; reason: CancellationReason };

/**
 * Run an async operation with an upper time bound, returning a structured
 * result instead of throwing on timeout.
 *
 * - A token that is already canceled yields `kind: 'canceled'` without
 *   starting the operation.
 * - Canceling the token while the operation runs resolves immediately with
 *   `kind: 'canceled'`.
 * - A CancellationError thrown by the operation maps to `kind: 'canceled'`.
 * - The operation is not aborted on timeout; it should observe the token.
 * - Any other error is rethrown.
 */
export async function runWithTimeout<T>(
  operation: () => Promise<T>,
  options: TimedOperationOptions
): Promise<TimedOperationResult<T>> {
  const { timeoutMs, token, now = Date.now } = options;
  const start = now();

  if (token?.isCanceled) {
    return { kind: 'canceled', durationMs: 0, cancellationReason: token.reason };
  }

  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  let unsubscribe: (() => void) | undefined;

  const timeoutPromise = new Promise<RaceOutcome<T>>((resolve) => {
    timeoutHandle = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  const cancelPromise = new Promise<RaceOutcome<T>>((resolve) => {
    unsubscribe = token?.onCanceled((reason) => resolve({ kind: 'canceled', reason }));
  });

  const valuePromise = Promise.resolve()
    .then(operation)
    .then((value): RaceOutcome<T> => ({ kind: 'value', value }));

  let outcome: RaceOutcome<T>;
  try {
    outcome = await Promise.race([valuePromise, timeoutPromise, cancelPromise]);
  } catch (error) {
    if (isCancellationError(error)) {
      return {
        kind: 'canceled',
        durationMs: now() - start,
        cancellationReason: error.cancellationReason,
      };
    }
    throw error;
  } finally {
    if (timeoutHandle !== undefined) {
      clearTimeout(timeoutHandle);
    }
    unsubscribe?.();
    // A late rejection after a timeout or cancel has nobody awaiting it.
    valuePromise.catch(() => undefined);
  }

  const durationMs = now() - start;
  if (outcome.kind === 'value') {
    return { kind: 'ok', durationMs, value: outcome.value };
  }
  if (outcome.kind === 'timeout') {
    return { kind: 'timeout', durationMs };
  }
  return { kind: 'canceled', durationMs, cancellationReason: outcome.reason };
}
