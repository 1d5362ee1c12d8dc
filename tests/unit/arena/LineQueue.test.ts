import { LineQueue } from '../../../src/server/arena';
import { EngineErrorCode, PeerError } from '../../../src/shared/errors';

describe('LineQueue', () => {
  it('returns buffered lines in order', async () => {
    const queue = new LineQueue('p1');
    queue.push('id name A');
    queue.push('reversi_v1_ok');
    await expect(queue.next(10)).resolves.toBe('id name A');
    await expect(queue.next(10)).resolves.toBe('reversi_v1_ok');
  });

  it('hands a later line to a waiting reader', async () => {
    const queue = new LineQueue('p1');
    const pending = queue.next(1000);
    queue.push('readyok');
    await expect(pending).resolves.toBe('readyok');
  });

  it('rejects a read that times out', async () => {
    const queue = new LineQueue('p1');
    const error = await queue.next(10).catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(PeerError);
    expect(error).toMatchObject({
      code: EngineErrorCode.PEER_TIMEOUT,
      message: '[p1] No response within 10ms',
    });

    // The timed-out reader must not swallow the next line.
    queue.push('readyok');
    await expect(queue.next(10)).resolves.toBe('readyok');
  });

  it('rejects waiting and later reads once closed, after draining the buffer', async () => {
    const queue = new LineQueue('p2');
    const waiting = queue.next(1000);
    queue.close('process exited');
    await expect(waiting).rejects.toMatchObject({
      code: EngineErrorCode.PEER_CLOSED,
      message: '[p2] process exited',
    });

    const drained = new LineQueue('p2');
    drained.push('bestmove e3b');
    drained.close('process exited');
    await expect(drained.next(10)).resolves.toBe('bestmove e3b');
    await expect(drained.next(10)).rejects.toBeInstanceOf(PeerError);
  });
});
