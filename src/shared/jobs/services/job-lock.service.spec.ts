import { JobLockService } from './job-lock.service';

describe('JobLockService', () => {
  it('serializes tasks on the same key', async () => {
    const locks = new JobLockService();
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = locks.runExclusive('job', async () => {
      events.push('first:start');
      await gate;
      events.push('first:end');
    });
    const second = locks.runExclusive('job', async () => {
      events.push('second');
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(events).toEqual(['first:start']);
    expect(locks.isLocked('job')).toBe(true);

    release();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(locks.isLocked('job')).toBe(false);
  });

  it('releases the key after a failing task', async () => {
    const locks = new JobLockService();

    await expect(
      locks.runExclusive('job', async () => {
        throw new Error('nope');
      }),
    ).rejects.toThrow('nope');
    await expect(locks.runExclusive('job', async () => 42)).resolves.toBe(42);
  });

  it('does not block other keys', async () => {
    const locks = new JobLockService();
    const blocked = locks.runExclusive('a', () => new Promise<void>(() => {}));

    await expect(locks.runExclusive('b', async () => 'free')).resolves.toBe(
      'free',
    );
    expect(locks.isLocked('a')).toBe(true);
    void blocked;
  });
});
