import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, readFileSync, readdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { makeTempDir, removeTempDir } from '../coordinator/src/testHelpers.js';
import {
  LockTimeoutError,
  acquireLock,
  atomicWrite,
  isLockStale,
  isProcessRunning,
  modifyFileWithLock,
  releaseLock,
  withFileLock,
} from './fileLock.js';

// Larger than any pid the kernel hands out
const DEAD_PID = 2_147_483_646;

describe('fileLock', () => {
  let dir: string;
  let target: string;
  let lockPath: string;

  beforeEach(() => {
    dir = makeTempDir();
    target = join(dir, 'registry.json');
    lockPath = join(dir, '.registry.json.lock');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  const writeLock = (pid: number, acquiredAt: number): void => {
    writeFileSync(lockPath, JSON.stringify({ id: 'other', owner: 'other', file: target, acquiredAt, pid }));
  };

  it('detects live and dead processes', () => {
    expect(isProcessRunning(process.pid)).toBe(true);
    expect(isProcessRunning(DEAD_PID)).toBe(false);
  });

  it('holds the lock exclusively until released', async () => {
    const handle = await acquireLock(target, { owner: 'first' });
    expect(existsSync(lockPath)).toBe(true);

    await expect(acquireLock(target, { owner: 'second', maxWaitMs: 60 })).rejects.toThrow(LockTimeoutError);

    releaseLock(handle);
    expect(existsSync(lockPath)).toBe(false);
    releaseLock(await acquireLock(target, { maxWaitMs: 60 }));
  });

  it('does not release a lock that belongs to someone else', async () => {
    const handle = await acquireLock(target);
    writeLock(process.pid, Date.now());

    releaseLock(handle);
    expect(existsSync(lockPath)).toBe(true);
  });

  it('takes over locks left by dead processes', async () => {
    writeLock(DEAD_PID, Date.now());
    expect(isLockStale(lockPath)).toBe(true);

    const handle = await acquireLock(target, { maxWaitMs: 60 });
    releaseLock(handle);
  });

  it('takes over locks older than the timeout', async () => {
    writeLock(process.pid, Date.now() - 60_000);
    expect(isLockStale(lockPath, 30_000)).toBe(true);
    expect(isLockStale(lockPath, 120_000)).toBe(false);
  });

  it('treats unreadable lock files as stale', () => {
    writeFileSync(lockPath, 'not json');
    expect(isLockStale(lockPath)).toBe(true);
  });

  it('releases the lock when the critical section throws', async () => {
    await expect(
      withFileLock(target, () => {
        throw new Error('inside');
      })
    ).rejects.toThrow('inside');
    expect(existsSync(lockPath)).toBe(false);
  });

  it('serialises async critical sections', async () => {
    const events: string[] = [];
    const section = (name: string) => async (): Promise<void> => {
      events.push(`${name}:start`);
      await new Promise((resolve) => setTimeout(resolve, 20));
      events.push(`${name}:end`);
    };

    await Promise.all([withFileLock(target, section('a')), withFileLock(target, section('b'))]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('modifies a file under its lock', async () => {
    const first = await modifyFileWithLock(target, (content) => ({ content: `${content}one\n`, result: content.length }));
    const second = await modifyFileWithLock(target, (content) => ({ content: `${content}two\n`, result: content.length }));

    expect([first, second]).toEqual([0, 4]);
    expect(readFileSync(target, 'utf-8')).toBe('one\ntwo\n');
  });

  it('writes atomically without leaving temporary files', () => {
    atomicWrite(target, '{"a":1}');
    atomicWrite(target, '{"a":2}');

    expect(readFileSync(target, 'utf-8')).toBe('{"a":2}');
    expect(readdirSync(dir)).toEqual(['registry.json']);
  });
});
