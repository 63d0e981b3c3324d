import { KeyedLock } from './keyedLock';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedLock', () => {
  it('runs operations on the same key one at a time, in order', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('k', async () => {
        events.push('a:start');
        await delay(10);
        events.push('a:end');
      }),
      lock.run('k', async () => {
        events.push('b:start');
        events.push('b:end');
      }),
    ]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('lets different keys run concurrently', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        events.push('a:start');
        await delay(10);
        events.push('a:end');
      }),
      lock.run('b', async () => {
        events.push('b:start');
      }),
    ]);

    expect(events).toEqual(['a:start', 'b:start', 'a:end']);
  });

  it('releases the key after a failure', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('k', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(lock.run('k', async () => 'next')).resolves.toBe('next');
    expect(lock.size).toBe(0);
  });
});
