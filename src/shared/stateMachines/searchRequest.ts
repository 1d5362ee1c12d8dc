/**
 * Explicit state model for a single decision task (one `go` → one
 * `bestmove`). The protocol session keeps one of these per search for
 * diagnostics; it never decides protocol phase.
 *
 * State transitions:
 *   idle → in_flight → completed   (agent move, or a fallback for a missing
 *                                   or illegal answer)
 *        → in_flight → timed_out   (fallback move committed)
 *        → in_flight → failed      (fallback move committed)
 *        → canceled (from in_flight)
 */

import type { FallbackReason } from '../ai/AIFallbackHandler';

export type SearchCancelReason = 'newgame' | 'session_disposed';

export type SearchRequestState =
  | { kind: 'idle' }
  | {
      kind: 'in_flight';
      searchId: number;
      startedAt: number;
      /** Deadline (epoch ms) derived from the clock model. */
      deadlineAt: number;
    }
  | {
      kind: 'completed';
      searchId: number;
      completedAt: number;
      latencyMs: number;
      /** Set when the committed move replaced the agent's answer. */
      fallbackReason?: FallbackReason;
    }
  | {
      kind: 'timed_out';
      searchId: number;
      completedAt: number;
      /** Duration from start to timeout */
      durationMs: number;
    }
  | {
      kind: 'failed';
      searchId: number;
      completedAt: number;
      message: string;
      durationMs: number;
    }
  | {
      kind: 'canceled';
      searchId: number;
      completedAt: number;
      reason: SearchCancelReason;
      durationMs: number;
    };

export const idleSearchRequest: SearchRequestState = { kind: 'idle' };

export function markInFlight(
  searchId: number,
  deadlineAt: number,
  now: number = Date.now()
): SearchRequestState {
  return { kind: 'in_flight', searchId, startedAt: now, deadlineAt };
}

function startedAt(previous: SearchRequestState, now: number): number {
  return previous.kind === 'in_flight' ? previous.startedAt : now;
}

function searchIdOf(previous: SearchRequestState): number {
  return previous.kind === 'idle' ? 0 : previous.searchId;
}

export function markCompleted(
  previous: SearchRequestState,
  now: number = Date.now()
): SearchRequestState {
  return {
    kind: 'completed',
    searchId: searchIdOf(previous),
    completedAt: now,
    latencyMs: now - startedAt(previous, now),
  };
}

/**
 * The agent answered, but with nothing usable; a fallback move was committed.
 */
export function markFellBack(
  reason: FallbackReason,
  previous: SearchRequestState,
  now: number = Date.now()
): SearchRequestState {
  return {
    kind: 'completed',
    searchId: searchIdOf(previous),
    completedAt: now,
    latencyMs: now - startedAt(previous, now),
    fallbackReason: reason,
  };
}

export function markTimedOut(
  previous: SearchRequestState,
  now: number = Date.now()
): SearchRequestState {
  return {
    kind: 'timed_out',
    searchId: searchIdOf(previous),
    completedAt: now,
    durationMs: now - startedAt(previous, now),
  };
}

export function markFailed(
  message: string,
  previous: SearchRequestState,
  now: number = Date.now()
): SearchRequestState {
  return {
    kind: 'failed',
    searchId: searchIdOf(previous),
    completedAt: now,
    message,
    durationMs: now - startedAt(previous, now),
  };
}

/**
 * Mark a search as canceled (newgame during search, session disposal).
 * Only in-flight searches can be canceled; other states are returned as-is.
 */
export function markCanceled(
  reason: SearchCancelReason,
  previous: SearchRequestState,
  now: number = Date.now()
): SearchRequestState {
  if (previous.kind !== 'in_flight') {
    return previous;
  }
  return {
    kind: 'canceled',
    searchId: previous.searchId,
    completedAt: now,
    reason,
    durationMs: now - previous.startedAt,
  };
}
