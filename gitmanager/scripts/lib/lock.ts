import fs from 'fs-extra';
import path from 'node:path';

import { isErrnoException, toPosixRelative } from './io.js';

export interface KeyLock {
  path: string;
  release(): Promise<void>;
}

function lockContent(): string {
  return `${JSON.stringify({ pid: process.pid, started_at: new Date().toISOString() })}\n`;
}

async function tryCreateLock(lockPath: string): Promise<boolean> {
  try {
    await fs.writeFile(lockPath, lockContent(), { encoding: 'utf8', flag: 'wx' });
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  }
}

/** Pid recorded in the lock, or `null` when the file cannot be read as one. */
export async function readLockPid(lockPath: string): Promise<number | null> {
  let content: unknown;
  try {
    content = await fs.readJson(lockPath);
  } catch {
    return null;
  }

  if (
    content &&
    typeof content === 'object' &&
    'pid' in content &&
    typeof content.pid === 'number' &&
    Number.isInteger(content.pid) &&
    content.pid > 0
  ) {
    return content.pid;
  }
  return null;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return !(isErrnoException(error) && error.code === 'ESRCH');
  }
}

export async function acquireKeyLock(lockPath: string): Promise<KeyLock> {
  await fs.ensureDir(path.dirname(lockPath));

  let acquired = await tryCreateLock(lockPath);
  if (!acquired) {
    const holder = await readLockPid(lockPath);
    if (holder !== null && !isProcessAlive(holder)) {
      console.error(`Removing stale lock ${toPosixRelative(lockPath)} left by pid ${holder}`);
      await fs.remove(lockPath);
      acquired = await tryCreateLock(lockPath);
    }
  }

  if (!acquired) {
    throw new Error(
      `Another sync holds ${toPosixRelative(lockPath)}; remove it if no sync is running`
    );
  }

  return {
    path: lockPath,
    async release() {
      await fs.remove(lockPath);
    }
  };
}

/** Releases `lock`, reporting a failure instead of throwing it. */
export async function releaseKeyLock(lock: KeyLock): Promise<void> {
  try {
    await lock.release();
  } catch (error) {
    console.error(
      `Could not remove ${toPosixRelative(lock.path)}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export async function withKeyLock<T>(lockPath: string, run: () => Promise<T>): Promise<T> {
  const lock = await acquireKeyLock(lockPath);
  try {
    return await run();
  } finally {
    await releaseKeyLock(lock);
  }
}
