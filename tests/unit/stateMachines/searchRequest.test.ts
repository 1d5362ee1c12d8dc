import {
  idleSearchRequest,
  markCanceled,
  markCompleted,
  markFailed,
  markFellBack,
  markInFlight,
  markTimedOut,
  type SearchRequestState,
} from '../../../src/shared/stateMachines/searchRequest';

describe('searchRequest state helpers', () => {
  const inFlight = markInFlight(3, 1250, 1000);

  it('starts idle', () => {
    expect(idleSearchRequest).toEqual({ kind: 'idle' });
  });

  it('records the start time and deadline', () => {
    expect(inFlight).toEqual({ kind: 'in_flight', searchId: 3, startedAt: 1000, deadlineAt: 1250 });
  });

  it('records latency on completion', () => {
    expect(markCompleted(inFlight, 1040)).toEqual({
      kind: 'completed',
      searchId: 3,
      completedAt: 1040,
      latencyMs: 40,
    });
  });

  it('records the reason when a fallback move replaced the answer', () => {
    expect(markFellBack('move_rejected', inFlight, 1030)).toEqual({
      kind: 'completed',
      searchId: 3,
      completedAt: 1030,
      latencyMs: 30,
      fallbackReason: 'move_rejected',
    });
  });

  it('records duration on timeout and failure', () => {
    expect(markTimedOut(inFlight, 1300)).toEqual({
      kind: 'timed_out',
      searchId: 3,
      completedAt: 1300,
      durationMs: 300,
    });
    expect(markFailed('boom', inFlight, 1010)).toEqual({
      kind: 'failed',
      searchId: 3,
      completedAt: 1010,
      message: 'boom',
      durationMs: 10,
    });
  });

  it('cancels only in-flight searches', () => {
    const canceled = markCanceled('newgame', inFlight, 1100);
    expect(canceled).toEqual({
      kind: 'canceled',
      searchId: 3,
      completedAt: 1100,
      reason: 'newgame',
      durationMs: 100,
    });

    const completed = markCompleted(inFlight, 1040);
    expect(markCanceled('session_disposed', completed, 1200)).toBe(completed);
    expect(markCanceled('session_disposed', idleSearchRequest, 1200)).toBe(idleSearchRequest);
  });

  it('never cancels a search that already ended', () => {
    const outcomes: SearchRequestState[] = [
      markTimedOut(inFlight, 1001),
      markFailed('x', inFlight, 1001),
      markCanceled('session_disposed', inFlight, 1001),
    ];
    for (const outcome of outcomes) {
      expect(markCanceled('newgame', outcome, 2000)).toBe(outcome);
    }
  });

  it('uses zero duration when finishing a search that never started', () => {
    expect(markCompleted(idleSearchRequest, 500)).toEqual({
      kind: 'completed',
      searchId: 0,
      completedAt: 500,
      latencyMs: 0,
    });
  });
});
