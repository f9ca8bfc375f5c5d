import { PathLock, lockFor } from '../../src/ledger/path-lock.js';

describe('PathLock', () => {
  it('runs critical sections one at a time in arrival order', async () => {
    const lock = new PathLock();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = lock.runExclusive(async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
      return 1;
    });
    const second = lock.runExclusive(async () => {
      order.push('second');
      return 2;
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(lock.isLocked).toBe(true);
    expect(order).toEqual(['first:start']);

    release();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.isLocked).toBe(false);
  });

  it('releases the lock when the critical section throws', async () => {
    const lock = new PathLock();

    await expect(
      lock.runExclusive(async () => {
        throw new Error('write failed');
      }),
    ).rejects.toThrow('write failed');
    expect(lock.isLocked).toBe(false);
    await expect(lock.runExclusive(async () => 'next')).resolves.toBe('next');
  });

  it('hands out one lock per resolved path', () => {
    expect(lockFor('data/../book.xlsx')).toBe(lockFor('book.xlsx'));
    expect(lockFor('a.xlsx')).not.toBe(lockFor('b.xlsx'));
  });
});
