import { describe, expect, it } from 'vitest';
import { Mutex, ReadWriteLock } from './lock.js';

const tick = () => new Promise(resolve => setImmediate(resolve));

function gate() {
  let open: () => void = () => undefined;
  const wait = new Promise<void>(resolve => {
    open = resolve;
  });
  return { wait, open: () => open() };
}

describe('ReadWriteLock', () => {
  it('lets readers share the lock', async () => {
    const lock = new ReadWriteLock();
    const first = gate();
    const second = gate();

    const reads = Promise.all([lock.read(() => first.wait), lock.read(() => second.wait)]);
    await tick();
    expect(lock.activeReaders).toBe(2);

    first.open();
    second.open();
    await reads;
    expect(lock.activeReaders).toBe(0);
  });

  it('blocks new readers behind a waiting writer', async () => {
    const lock = new ReadWriteLock();
    const events: string[] = [];
    const reader = gate();

    const reading = lock.read(async () => {
      events.push('read:start');
      await reader.wait;
      events.push('read:end');
    });
    const writing = lock.write(async () => {
      events.push('write');
    });
    const lateRead = lock.read(async () => {
      events.push('late-read');
    });

    await tick();
    expect(events).toEqual(['read:start']);
    expect(lock.isWriteLocked).toBe(false);

    reader.open();
    await Promise.all([reading, writing, lateRead]);
    expect(events).toEqual(['read:start', 'read:end', 'write', 'late-read']);
  });

  it('releases the lock when the callback throws', async () => {
    const lock = new ReadWriteLock();
    await expect(lock.write(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(lock.isWriteLocked).toBe(false);
    await expect(lock.read(async () => 'free')).resolves.toBe('free');
  });
});

describe('Mutex', () => {
  it('runs callbacks one at a time in order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    const first = gate();

    const a = mutex.runExclusive(async () => {
      events.push('a:start');
      await first.wait;
      events.push('a:end');
    });
    const b = mutex.runExclusive(async () => {
      events.push('b');
    });

    await tick();
    expect(mutex.isLocked).toBe(true);
    expect(events).toEqual(['a:start']);

    first.open();
    await Promise.all([a, b]);
    expect(events).toEqual(['a:start', 'a:end', 'b']);
    expect(mutex.isLocked).toBe(false);
  });
});
