// =============================================================================
// Keyed Mutex Tests
// =============================================================================

import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../src/lib/keyedMutex.js';

describe('KeyedMutex', () => {
  it('should run sections for the same key one at a time, in arrival order', async () => {
    const mutex = new KeyedMutex('test');
    const events: string[] = [];

    const section = (name: string) =>
      mutex.runExclusive('k', async () => {
        events.push(`${name}:start`);
        await Promise.resolve();
        await Promise.resolve();
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([section('a'), section('b'), section('c')]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('should let different keys proceed independently', async () => {
    const mutex = new KeyedMutex('test');
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive('x', async () => {
        events.push('x:start');
        await Promise.resolve();
        events.push('x:end');
      }),
      mutex.runExclusive('y', async () => {
        events.push('y:start');
        await Promise.resolve();
        events.push('y:end');
      }),
    ]);

    expect(events.indexOf('y:start')).toBeLessThan(events.indexOf('x:end'));
  });

  it('should release the lock when the section throws', async () => {
    const mutex = new KeyedMutex('test');

    await expect(
      mutex.runExclusive('k', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(mutex.isLocked('k')).toBe(false);
    await expect(mutex.runExclusive('k', () => 42)).resolves.toBe(42);
  });

  it('should report queued waiters', async () => {
    const mutex = new KeyedMutex('ticket');
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const holder = mutex.runExclusive('k', () => gate);
    const waiter = mutex.runExclusive('k', () => 'second');
    await Promise.resolve();

    expect(mutex.isLocked('k')).toBe(true);
    expect(mutex.queueLength('k')).toBe(1);
    expect(mutex.toString()).toBe('KeyedMutex(ticket, 1 held)');

    release();
    await holder;
    await expect(waiter).resolves.toBe('second');
    expect(mutex.isLocked('k')).toBe(false);
  });
});
