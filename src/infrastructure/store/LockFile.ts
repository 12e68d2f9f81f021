import { mkdir, open, readFile, rm, stat, type FileHandle } from 'node:fs/promises';
import path from 'node:path';

import { AppError } from '../../shared/errors/AppError.js';
import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';

type LockPayload = {
  pid: number;
  createdAt: string;
};

export type ReleaseLock = () => Promise<void>;

// A guard or an empty lock this old belongs to a holder that crashed mid-write.
const ABANDONED_AFTER_MS = 10_000;

const sleep = async (ms: number): Promise<void> => {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
};

const isProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
};

const isLockPayload = (value: unknown): value is LockPayload =>
  typeof value === 'object' &&
  value !== null &&
  'pid' in value &&
  typeof value.pid === 'number' &&
  Number.isInteger(value.pid);

const readIfPresent = async (filePath: string): Promise<string | null> => {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
};

const ageOf = async (filePath: string): Promise<number | null> => {
  try {
    return Date.now() - (await stat(filePath)).mtimeMs;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
};

/**
 * Exclusive lock backed by `open(path, 'wx')`. A lock left behind by a dead
 * process, or one whose payload is not a lock payload, is removed and retried.
 *
 * Removal happens under a second `wx` guard file and only if the lock still
 * holds the content that was judged stale, so an evictor never deletes a lock
 * another process has taken in the meantime.
 */
export class LockFile {
  private readonly guardPath: string;

  public constructor(private readonly filePath: string) {
    this.guardPath = `${filePath}.evict`;
  }

  public async acquire(timeoutMs = 2000): Promise<ReleaseLock> {
    const startedAt = Date.now();

    await mkdir(path.dirname(this.filePath), { recursive: true });

    while (Date.now() - startedAt < timeoutMs) {
      try {
        const handle = await open(this.filePath, 'wx');
        try {
          await handle.writeFile(
            `${JSON.stringify({ pid: process.pid, createdAt: new Date().toISOString() } satisfies LockPayload)}\n`
          );
        } finally {
          await handle.close();
        }

        return async () => {
          await rm(this.filePath, { force: true });
        };
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== 'EEXIST') {
          throw error;
        }

        await this.cleanupIfStale();
        await sleep(50);
      }
    }

    throw new AppError('Registry lock acquisition timed out.', {
      code: ERROR_CODE.REGISTRY_LOCK_TIMEOUT,
      details: { filePath: this.filePath, timeoutMs },
      suggestions: ['Retry this command.', 'If contention persists, check for a stuck nlr process.']
    });
  }

  public async withLock<T>(task: () => Promise<T>, timeoutMs?: number): Promise<T> {
    const release = await this.acquire(timeoutMs);
    try {
      return await task();
    } finally {
      await release();
    }
  }

  /**
   * Removes the lock file if it still contains `observed`. Returns false when
   * the lock changed, vanished, or another process is evicting right now.
   */
  public async removeIfUnchanged(observed: string): Promise<boolean> {
    let guard: FileHandle;
    try {
      guard = await open(this.guardPath, 'wx');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'EEXIST') {
        throw error;
      }
      await this.clearAbandonedGuard();
      return false;
    }

    try {
      // New locks are only created once this file is gone, and only guard holders remove stale ones.
      if ((await readIfPresent(this.filePath)) !== observed) {
        return false;
      }
      await rm(this.filePath, { force: true });
      return true;
    } finally {
      await guard.close();
      await rm(this.guardPath, { force: true });
    }
  }

  private async cleanupIfStale(): Promise<void> {
    const text = await readIfPresent(this.filePath);
    if (text === null) {
      return;
    }

    if (text.trim().length === 0) {
      // Still being written by its holder, unless it has been empty for too long.
      const age = await ageOf(this.filePath);
      if (age !== null && age > ABANDONED_AFTER_MS) {
        await this.removeIfUnchanged(text);
      }
      return;
    }

    let payload: unknown = null;
    try {
      payload = JSON.parse(text);
    } catch {
      payload = null;
    }

    if (!isLockPayload(payload) || !isProcessAlive(payload.pid)) {
      await this.removeIfUnchanged(text);
    }
  }

  private async clearAbandonedGuard(): Promise<void> {
    const age = await ageOf(this.guardPath);
    if (age !== null && age > ABANDONED_AFTER_MS) {
      await rm(this.guardPath, { force: true });
    }
  }
}
