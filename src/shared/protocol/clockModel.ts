import type { Color } from '../types/game';
import type { ClockModel, GoFields } from '../types/protocol';

/**
 * Clock model helpers. The UI is the timing authority: each `go` carries
 * both clocks and increments, and the engine turns the entry for the side
 * it searches for into a budget and a deadline.
 */

export interface SearchBudgetPolicy {
  /** Assumed number of own moves still to play; remaining time is spread over them. */
  movesToGo: number;
  /** Reserved for transport latency and the bestmove write. */
  safetyMarginMs: number;
  /** Lower bound so that a nearly flagged clock still gets a fallback move out. */
  minBudgetMs: number;
  /** Upper bound on a single search. */
  maxBudgetMs: number;
}

export const DEFAULT_SEARCH_BUDGET_POLICY: SearchBudgetPolicy = {
  movesToGo: 20,
  safetyMarginMs: 50,
  minBudgetMs: 10,
  maxBudgetMs: 5000,
};

export function clockFromGo(fields: GoFields): ClockModel {
  return {
    black: { remainingMs: fields.btime, incrementMs: fields.binc },
    white: { remainingMs: fields.wtime, incrementMs: fields.winc },
  };
}

export function timeFor(clock: ClockModel, color: Color): number {
  return clock[color].remainingMs;
}

export function incrementFor(clock: ClockModel, color: Color): number {
  return clock[color].incrementMs;
}

/**
 * Milliseconds the decision task may spend for `color`:
 *
 *   remaining / movesToGo + increment - safetyMargin
 *
 * clamped to [minBudget, min(maxBudget, remaining - safetyMargin)], where
 * the upper bound never drops below minBudget.
 */
export function computeSearchBudget(
  clock: ClockModel,
  color: Color,
  policy: SearchBudgetPolicy = DEFAULT_SEARCH_BUDGET_POLICY
): number {
  const remaining = timeFor(clock, color);
  const increment = incrementFor(clock, color);
  const movesToGo = Math.max(1, policy.movesToGo);

  const target = Math.floor(remaining / movesToGo) + increment - policy.safetyMarginMs;
  const ceiling = Math.max(
    policy.minBudgetMs,
    Math.min(policy.maxBudgetMs, remaining - policy.safetyMarginMs)
  );

  return Math.min(ceiling, Math.max(policy.minBudgetMs, target));
}

export function computeDeadline(now: number, budgetMs: number): number {
  return now + budgetMs;
}
