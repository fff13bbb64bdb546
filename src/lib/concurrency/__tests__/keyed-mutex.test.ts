/**
 * Tests for KeyedMutex and DocumentWriteGuard
 */

import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../keyed-mutex';
import { DocumentWriteGuard } from '../write-guard';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// =============================================================================
// KeyedMutex Tests
// =============================================================================

describe('KeyedMutex', () => {
  it('should run callers with the same key one at a time in order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('doc', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = mutex.runExclusive('doc', async () => {
      events.push('second');
    });

    await new Promise((r) => setTimeout(r, 0));
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should not block different keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const held = mutex.runExclusive('a', () => gate.promise);

    await expect(mutex.runExclusive('b', async () => 'free')).resolves.toBe('free');

    gate.resolve();
    await held;
  });

  it('should release the key when the holder throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('doc', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive('doc', async () => 42)).resolves.toBe(42);
    expect(mutex.isLocked('doc')).toBe(false);
  });

  it('should forget idle keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const held = mutex.runExclusive('doc', () => gate.promise);

    expect(mutex.isLocked('doc')).toBe(true);
    expect(mutex.size).toBe(1);

    gate.resolve();
    await held;
    expect(mutex.size).toBe(0);
  });
});

// =============================================================================
// DocumentWriteGuard Tests
// =============================================================================

describe('DocumentWriteGuard', () => {
  it('should treat untouched documents as stable', () => {
    const guard = new DocumentWriteGuard();
    expect(guard.isStable('doc', guard.snapshot())).toBe(true);
  });

  it('should report a document as unstable while it is being written', async () => {
    const guard = new DocumentWriteGuard();
    const since = guard.snapshot();
    let during = true;

    await guard.runExclusive('doc', async () => {
      during = guard.isStable('doc', since);
    });

    expect(during).toBe(false);
  });

  it('should report a document written after the snapshot as unstable', async () => {
    const guard = new DocumentWriteGuard();
    const since = guard.snapshot();

    await guard.runExclusive('doc', async () => undefined);

    expect(guard.isStable('doc', since)).toBe(false);
    expect(guard.isStable('other', since)).toBe(true);
    expect(guard.isStable('doc', guard.snapshot())).toBe(true);
  });

  it('should return the result of the exclusive section', async () => {
    const guard = new DocumentWriteGuard();
    await expect(guard.runExclusive('doc', async () => 'written')).resolves.toBe('written');
    expect(guard.isLocked('doc')).toBe(false);
  });
});
