/**
 * File Locking Utility for Multi-Process Safety
 *
 * Serialises read-modify-write cycles on shared JSON files (the broker
 * registry) between independent processes on the same host.
 *
 * Usage:
 *   const lock = await acquireLock(registryPath, { owner: 'mcp-1234' });
 *   try {
 *     atomicWrite(registryPath, content);
 *   } finally {
 *     releaseLock(lock);
 *   }
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  unlinkSync,
  writeSync,
} from 'fs';
import { basename, dirname, join } from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { AgentLogger } from '../agents/shared/src/logger.js';

const logger = new AgentLogger('FileLock');

// A lock older than this is considered abandoned
const LOCK_TIMEOUT_MS = 30_000;

// Retry interval when waiting for lock
const LOCK_RETRY_MS = 25;

// Maximum wait time for lock
const MAX_WAIT_MS = 10_000;

const LockInfoSchema = z.object({
  id: z.string(),
  owner: z.string(),
  file: z.string(),
  acquiredAt: z.number(),
  pid: z.number().int(),
});
export type LockInfo = z.infer<typeof LockInfoSchema>;

export interface LockHandle {
  id: string;
  file: string;
  lockPath: string;
}

export interface LockOptions {
  owner?: string;
  /** Directory for lock files; defaults to the directory of the locked file */
  lockDir?: string;
  timeoutMs?: number;
  maxWaitMs?: number;
}

export class LockTimeoutError extends Error {
  constructor(file: string, waitedMs: number, holder: LockInfo | null) {
    const held = holder ? ` Held by "${holder.owner}" (PID: ${holder.pid})` : '';
    super(`Failed to acquire lock on ${file} after ${waitedMs}ms.${held}`);
    this.name = 'LockTimeoutError';
  }
}

export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

function getLockPath(file: string, lockDir?: string): string {
  const dir = lockDir ?? dirname(file);
  return join(dir, `.${basename(file)}.lock`);
}

function readLockInfo(lockPath: string): LockInfo | null {
  try {
    return LockInfoSchema.parse(JSON.parse(readFileSync(lockPath, 'utf-8')));
  } catch {
    return null;
  }
}

/**
 * A lock is stale when it is older than the timeout, its owner process is
 * gone, or the lock file cannot be read.
 */
export function isLockStale(lockPath: string, timeoutMs: number = LOCK_TIMEOUT_MS): boolean {
  if (!existsSync(lockPath)) return true;

  const info = readLockInfo(lockPath);
  if (!info) return true;

  const age = Date.now() - info.acquiredAt;
  if (age > timeoutMs) {
    logger.warn('Stale lock detected', { path: lockPath, ageMs: age });
    return true;
  }
  if (!isProcessRunning(info.pid)) {
    logger.warn('Lock owner is gone', { path: lockPath, pid: info.pid });
    return true;
  }
  return false;
}

function tryCreateLock(lockPath: string, info: LockInfo): boolean {
  let fd: number;
  try {
    fd = openSync(lockPath, 'wx');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  }
  try {
    writeSync(fd, JSON.stringify(info));
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
  return true;
}

/**
 * Acquire a lock on a file. Creation of the lock file is exclusive (`wx`),
 * so two processes can never both believe they hold it.
 */
export async function acquireLock(file: string, options: LockOptions = {}): Promise<LockHandle> {
  const lockPath = getLockPath(file, options.lockDir);
  mkdirSync(dirname(lockPath), { recursive: true });

  const timeoutMs = options.timeoutMs ?? LOCK_TIMEOUT_MS;
  const maxWaitMs = options.maxWaitMs ?? MAX_WAIT_MS;
  const lockId = randomUUID();
  const startTime = Date.now();

  while (true) {
    const info: LockInfo = {
      id: lockId,
      owner: options.owner ?? `pid-${process.pid}`,
      file,
      acquiredAt: Date.now(),
      pid: process.pid,
    };

    if (tryCreateLock(lockPath, info)) {
      logger.debug('Acquired lock', { path: file });
      return { id: lockId, file, lockPath };
    }

    if (isLockStale(lockPath, timeoutMs)) {
      // Another waiter may have removed it first
      try {
        unlinkSync(lockPath);
      } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
          throw error;
        }
      }
      continue;
    }

    const elapsed = Date.now() - startTime;
    if (elapsed > maxWaitMs) {
      throw new LockTimeoutError(file, elapsed, readLockInfo(lockPath));
    }

    await new Promise((resolve) => setTimeout(resolve, LOCK_RETRY_MS));
  }
}

/**
 * Release a lock. A lock file that now belongs to someone else is left alone.
 */
export function releaseLock(handle: LockHandle): void {
  const info = readLockInfo(handle.lockPath);
  if (!info) return;

  if (info.id !== handle.id) {
    logger.warn('Lock owned by a different holder, not releasing', { path: handle.file });
    return;
  }
  unlinkSync(handle.lockPath);
  logger.debug('Released lock', { path: handle.file });
}

/**
 * Perform an atomic write to a file
 * Writes and fsyncs a temporary file in the same directory, then renames it
 * over the target.
 */
export function atomicWrite(filePath: string, content: string): void {
  const dir = dirname(filePath);
  mkdirSync(dir, { recursive: true });
  const tempPath = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  try {
    const fd = openSync(tempPath, 'w');
    try {
      writeSync(fd, content);
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, filePath);
  } catch (error) {
    if (existsSync(tempPath)) {
      unlinkSync(tempPath);
    }
    throw error;
  }

  // Persist the rename itself
  try {
    const dirFd = openSync(dir, 'r');
    try {
      fsyncSync(dirFd);
    } finally {
      closeSync(dirFd);
    }
  } catch (error) {
    logger.debug('Directory fsync not supported', { path: dir, error });
  }
}

/**
 * Run `fn` while holding the lock on `file`.
 */
export async function withFileLock<T>(file: string, fn: () => Promise<T> | T, options: LockOptions = {}): Promise<T> {
  const lock = await acquireLock(file, options);
  try {
    return await fn();
  } finally {
    releaseLock(lock);
  }
}

/**
 * Read-modify-write a file under its lock. The modifier receives the current
 * content ('' when the file does not exist) and returns the new content.
 */
export async function modifyFileWithLock<T>(
  filePath: string,
  modifier: (content: string) => { content: string; result: T },
  options: LockOptions = {}
): Promise<T> {
  return withFileLock(
    filePath,
    () => {
      const currentContent = existsSync(filePath) ? readFileSync(filePath, 'utf-8') : '';
      const { content, result } = modifier(currentContent);
      if (content !== currentContent) {
        atomicWrite(filePath, content);
      }
      return result;
    },
    options
  );
}
