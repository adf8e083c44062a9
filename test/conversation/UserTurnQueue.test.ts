import { UserTurnQueue } from '../../src/application/conversation/UserTurnQueue';
import { waitFor } from '../helpers';

function deferred() {
  let release: () => void = () => undefined;
  const promise = new Promise<void>(resolve => {
    release = () => resolve();
  });
  return { promise, release: () => release() };
}

describe('UserTurnQueue', () => {
  it('should run one user\'s work in order while other users proceed', async () => {
    const queue = new UserTurnQueue();
    const events: string[] = [];
    const gate = deferred();

    const first = queue.run('u1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = queue.run('u1', async () => {
      events.push('second');
      return 2;
    });
    const other = queue.run('u2', async () => {
      events.push('other');
      return 3;
    });

    expect(queue.activeUsers()).toBe(2);
    await expect(other).resolves.toBe(3);
    expect(events).toEqual(['first:start', 'other']);

    gate.release();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(events).toEqual(['first:start', 'other', 'first:end', 'second']);

    await waitFor(() => queue.activeUsers() === 0);
  });

  it('should keep going after a failed item', async () => {
    const queue = new UserTurnQueue();

    const failed = queue.run('u1', async () => {
      throw new Error('boom');
    });
    const next = queue.run('u1', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
