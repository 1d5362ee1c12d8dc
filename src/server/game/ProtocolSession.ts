/**
 * ProtocolSession - host for one reversi_v1 conversation.
 *
 * The session owns the protocol state (see shared/stateMachines/
 * protocolSession.ts) and carries out the effects the pure transition
 * function asks for:
 *
 * - `send`: format and write a line through the injected sink;
 * - `start_search`: run the AI player on an immutable snapshot, bounded by
 *   the clock-derived budget, then feed the result back as a
 *   `search_completed` event;
 * - `cancel_search`: cancel the running decision task (newgame);
 * - `report`: log the error and pass it to `onError`.
 *
 * Inbound lines are handled one at a time and synchronously. The decision
 * task is the only asynchronous work, so `isready` is answered while a
 * search runs. Nothing the session receives can crash it: every failure is
 * reported and the session stays responsive.
 */

import type { Move } from '../../shared/types/game';
import type { EngineIdentity, SearchSnapshot } from '../../shared/types/protocol';
import {
  EngineError,
  EngineErrorCode,
  isEngineError,
  ProtocolMismatchError,
  SearchTimeoutError,
  wrapError,
} from '../../shared/errors';
import {
  initialSessionState,
  transition,
  type ProtocolSessionState,
  type SessionEffect,
  type SessionEvent,
  type SessionPhase,
} from '../../shared/stateMachines/protocolSession';
import {
  idleSearchRequest,
  markCanceled,
  markCompleted,
  markFailed,
  markFellBack,
  markInFlight,
  markTimedOut,
  type SearchCancelReason,
  type SearchRequestState,
} from '../../shared/stateMachines/searchRequest';
import {
  formatOutboundMessage,
  isBlankLine,
  parseInboundMessage,
} from '../../shared/protocol/messageGrammar';
import {
  DEFAULT_SEARCH_BUDGET_POLICY,
  type SearchBudgetPolicy,
} from '../../shared/protocol/clockModel';
import {
  createLocalAIRng,
  deriveFallbackSeed,
  isAcceptableMove,
  selectFallbackMove,
  type FallbackReason,
} from '../../shared/ai';
import { formatMove } from '../../shared/engine';
import { createCancellationSource, type CancellationSource } from '../../shared/utils/cancellation';
import { runWithTimeout } from '../../shared/utils/timeout';
import type { AIPlayer, AIPlayerFactory } from './ai/AIPlayer';
import { engineLogger } from '../utils/logger';

const logger = engineLogger('session');

export interface ProtocolSessionOptions {
  identity: EngineIdentity;
  playerFactory: AIPlayerFactory;
  /** Receives each outbound line without its newline. */
  send: (line: string) => void;
  budgetPolicy?: SearchBudgetPolicy;
  /** Base seed for fallback move selection. */
  fallbackSeed?: number;
  onError?: (error: EngineError) => void;
  /** Clock dependency (overridable for tests). Defaults to Date.now. */
  now?: () => number;
}

interface ActiveSearch {
  readonly searchId: number;
  readonly source: CancellationSource;
}

export class ProtocolSession {
  private state: ProtocolSessionState = initialSessionState;
  private searchRequest: SearchRequestState = idleSearchRequest;
  private nextSearchId = 1;
  private player: AIPlayer | null = null;
  private activeSearch: ActiveSearch | null = null;
  private readonly pendingSearches = new Set<Promise<void>>();
  private readonly budgetPolicy: SearchBudgetPolicy;
  private readonly now: () => number;

  constructor(private readonly options: ProtocolSessionOptions) {
    this.budgetPolicy = options.budgetPolicy ?? DEFAULT_SEARCH_BUDGET_POLICY;
    this.now = options.now ?? Date.now;
  }

  get phase(): SessionPhase {
    return this.state.phase;
  }

  getState(): ProtocolSessionState {
    return this.state;
  }

  getSearchRequestState(): SearchRequestState {
    return this.searchRequest;
  }

  /**
   * Handle one inbound line. Never throws.
   */
  receive(line: string): void {
    if (isBlankLine(line)) {
      return;
    }
    logger.debug('recv', { line: line.trim() });

    try {
      const parsed = parseInboundMessage(line);
      if (!parsed.ok) {
        this.report(parsed.error);
        return;
      }
      this.dispatch(parsed.message);
    } catch (error) {
      this.report(wrapError(error, { line: line.trim(), phase: this.state.phase }));
    }
  }

  /**
   * Resolves once no decision task is pending.
   */
  async whenIdle(): Promise<void> {
    while (this.pendingSearches.size > 0) {
      await Promise.all([...this.pendingSearches]);
    }
  }

  /**
   * Cancel a running search. Its result, if any, is discarded.
   */
  dispose(): void {
    this.cancelActiveSearch('session_disposed');
  }

  private dispatch(event: SessionEvent): void {
    const result = transition(this.state, event, {
      identity: this.options.identity,
      nextSearchId: this.nextSearchId,
      now: this.now(),
      budgetPolicy: this.budgetPolicy,
    });

    if (!result.ok) {
      this.report(result.error);
      return;
    }

    const previousPhase = this.state.phase;
    this.state = result.state;

    if (event.kind === 'newgame') {
      this.player = this.options.playerFactory(event.color);
    }

    if (previousPhase !== this.state.phase) {
      logger.debug('Session phase changed', { from: previousPhase, to: this.state.phase });
    }

    for (const effect of result.effects) {
      this.execute(effect);
    }
  }

  private execute(effect: SessionEffect): void {
    switch (effect.type) {
      case 'send': {
        const line = formatOutboundMessage(effect.message);
        logger.debug('send', { line });
        this.options.send(line);
        return;
      }
      case 'start_search':
        this.startSearch(effect.snapshot);
        return;
      case 'cancel_search':
        if (this.activeSearch?.searchId === effect.searchId) {
          this.cancelActiveSearch('newgame');
        }
        return;
      case 'report':
        this.report(effect.error);
        return;
    }
  }

  private startSearch(snapshot: SearchSnapshot): void {
    this.nextSearchId = snapshot.searchId + 1;

    const source = createCancellationSource();
    this.activeSearch = { searchId: snapshot.searchId, source };

    const task = this.runSearch(snapshot, source).finally(() => {
      this.pendingSearches.delete(task);
      if (this.activeSearch?.searchId === snapshot.searchId) {
        this.activeSearch = null;
      }
    });
    this.pendingSearches.add(task);
  }

  private cancelActiveSearch(reason: SearchCancelReason): void {
    if (!this.activeSearch) {
      return;
    }
    logger.info('Canceling search', { searchId: this.activeSearch.searchId, reason });
    this.searchRequest = markCanceled(reason, this.searchRequest, this.now());
    this.activeSearch.source.cancel(reason);
    this.activeSearch = null;
  }

  private async runSearch(snapshot: SearchSnapshot, source: CancellationSource): Promise<void> {
    const { searchId, color, budgetMs } = snapshot;
    this.searchRequest = markInFlight(searchId, snapshot.deadlineAt, this.now());

    logger.info('Starting search', {
      searchId,
      color,
      budgetMs,
      deadlineAt: snapshot.deadlineAt,
      historyLength: snapshot.position.history.length,
    });

    try {
      const player = this.player;
      if (!player || player.color !== color) {
        const mismatch = new ProtocolMismatchError('No AI player for the searching colour', {
          searchId,
          color,
        });
        this.searchRequest = markFailed(mismatch.message, this.searchRequest, this.now());
        this.report(mismatch);
        this.complete(searchId, this.fallbackMove(snapshot, 'search_error'));
        return;
      }

      const result = await runWithTimeout(() => player.search(snapshot, source.token), {
        timeoutMs: budgetMs,
        token: source.token,
        now: this.now,
      });

      switch (result.kind) {
        case 'canceled':
          logger.info('Search canceled', {
            searchId,
            reason: String(result.cancellationReason),
            durationMs: result.durationMs,
          });
          return;

        case 'timeout':
          source.cancel('timeout');
          this.searchRequest = markTimedOut(this.searchRequest, this.now());
          this.report(new SearchTimeoutError(budgetMs, { searchId, color }));
          this.complete(searchId, this.fallbackMove(snapshot, 'search_timeout'));
          return;

        case 'ok':
          this.complete(searchId, this.acceptOrFallback(snapshot, result.value));
          return;
      }
    } catch (error) {
      if (this.activeSearch?.searchId !== searchId) {
        return;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.searchRequest = markFailed(message, this.searchRequest, this.now());
      this.report(
        isEngineError(error)
          ? error
          : new EngineError(EngineErrorCode.SEARCH_FAILED, `Search failed: ${message}`, {
              searchId,
              color,
            })
      );
      this.complete(searchId, this.fallbackMove(snapshot, 'search_error'));
    }
  }

  private acceptOrFallback(snapshot: SearchSnapshot, move: Move | null): Move | null {
    if (move !== null && isAcceptableMove(snapshot.position, snapshot.color, move)) {
      this.searchRequest = markCompleted(this.searchRequest, this.now());
      return move;
    }
    if (move !== null) {
      logger.warn('AI player returned an illegal move', {
        searchId: snapshot.searchId,
        move: formatMove(move),
      });
    }
    const reason: FallbackReason = move === null ? 'no_move_returned' : 'move_rejected';
    this.searchRequest = markFellBack(reason, this.searchRequest, this.now());
    return this.fallbackMove(snapshot, reason);
  }

  private fallbackMove(snapshot: SearchSnapshot, reason: FallbackReason): Move | null {
    const seed = deriveFallbackSeed(snapshot.position, snapshot.color, this.options.fallbackSeed);
    const fallback = selectFallbackMove({
      reason,
      color: snapshot.color,
      position: snapshot.position,
      rng: createLocalAIRng(seed),
    });
    logger.warn('Using fallback move', {
      searchId: snapshot.searchId,
      reason,
      move: fallback.move ? formatMove(fallback.move) : null,
      validMoveCount: fallback.validMoveCount,
    });
    return fallback.move;
  }

  private complete(searchId: number, move: Move | null): void {
    this.dispatch({ kind: 'search_completed', searchId, move });
  }

  private report(error: EngineError): void {
    const level = error instanceof ProtocolMismatchError ? 'info' : 'warn';
    logger.log(level, error.message, { code: error.code, context: error.context });
    this.options.onError?.(error);
  }
}
