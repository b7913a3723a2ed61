/**
 * Scoped locks guarding reconciliation.
 *
 * Two layers, taken in order and released in reverse:
 * - an in-process keyed mutex, so concurrent fan-out inside one invocation
 *   queues in FIFO order without touching the disk;
 * - an exclusive lock file per scope under the state root, so separate CLI
 *   or server processes on the same machine exclude each other.
 *
 * Stale lock files (holder process gone) are moved aside and retaken.
 */

import { link, mkdir, open, readFile, rename, rm } from 'fs/promises';
import { join } from 'path';
import { CancelledError, LockTimeoutError } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface LockHandle {
  readonly scope: string;
  release(): Promise<void>;
}

export interface LockManagerOptions {
  lockDir: string;
  timeoutMs?: number;
  pollIntervalMs?: number;
}

export interface AcquireOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface LockData {
  pid: number;
  scope: string;
  acquired_at: string;
}

interface ScopeState {
  locked: boolean;
  waiters: Array<() => void>;
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: exists but belongs to someone else
    return !isErrno(err, 'ESRCH');
  }
}

function parseLockData(text: string): LockData | null {
  const parsed: unknown = JSON.parse(text);
  if (
    parsed &&
    typeof parsed === 'object' &&
    'pid' in parsed &&
    typeof parsed.pid === 'number'
  ) {
    const scope = 'scope' in parsed && typeof parsed.scope === 'string' ? parsed.scope : '';
    const acquiredAt = 'acquired_at' in parsed && typeof parsed.acquired_at === 'string' ? parsed.acquired_at : '';
    return { pid: parsed.pid, scope, acquired_at: acquiredAt };
  }
  return null;
}

let takeoverCounter = 0;

/**
 * Remove the lock file at `path` only if it is still the one `expected`
 * describes. The file is renamed to a name unique to this attempt first, so
 * of several processes racing over one stale file exactly one moves it; a
 * file that turns out to be someone else's fresh lock is linked back.
 */
export async function takeOverStaleLock(path: string, expected: LockData): Promise<boolean> {
  takeoverCounter += 1;
  const aside = `${path}.stale-${process.pid}-${takeoverCounter}`;
  try {
    await rename(path, aside);
  } catch (err) {
    if (isErrno(err, 'ENOENT')) {
      // Someone else moved or released it
      return false;
    }
    throw err;
  }

  let moved: LockData | null = null;
  try {
    moved = parseLockData(await readFile(aside, 'utf-8'));
  } catch (err) {
    logger.debug('Unreadable lock file moved aside', { path, error: err instanceof Error ? err.message : err });
  }

  if (moved && (moved.pid !== expected.pid || moved.acquired_at !== expected.acquired_at)) {
    try {
      await link(aside, path);
    } catch (err) {
      if (!isErrno(err, 'EEXIST')) {
        throw err;
      }
      logger.warn('Lock file replaced while restoring it', { path, pid: moved.pid });
    }
    await rm(aside, { force: true });
    return false;
  }

  await rm(aside, { force: true });
  return true;
}

/**
 * FIFO mutex per scope string.
 */
class KeyedMutex {
  private scopes: Map<string, ScopeState> = new Map();

  async acquire(scope: string, deadline: number, signal: AbortSignal | undefined, onTimeout: () => Error): Promise<void> {
    const state = this.scopes.get(scope) ?? { locked: false, waiters: [] };
    this.scopes.set(scope, state);

    if (!state.locked) {
      state.locked = true;
      return;
    }

    return new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = state.waiters.indexOf(grant);
        if (index !== -1) {
          state.waiters.splice(index, 1);
        }
      };
      const grant = () => {
        cleanup();
        resolve();
      };
      const onAbort = () => {
        cleanup();
        reject(new CancelledError(`acquiring lock '${scope}'`));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(onTimeout());
      }, Math.max(0, deadline - Date.now()));

      signal?.addEventListener('abort', onAbort, { once: true });
      state.waiters.push(grant);
    });
  }

  release(scope: string): void {
    const state = this.scopes.get(scope);
    if (!state) {
      return;
    }
    const next = state.waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter
      next();
    } else {
      state.locked = false;
      this.scopes.delete(scope);
    }
  }

  isLocked(scope: string): boolean {
    return this.scopes.get(scope)?.locked ?? false;
  }
}

export class LockManager {
  private readonly lockDir: string;
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly mutex = new KeyedMutex();

  constructor(options: LockManagerOptions) {
    this.lockDir = options.lockDir;
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.pollIntervalMs = options.pollIntervalMs ?? 200;
  }

  lockFilePath(scope: string): string {
    return join(this.lockDir, `${encodeURIComponent(scope)}.lock`);
  }

  /**
   * Block until `scope` is held, or fail with LockTimeoutError.
   */
  async acquire(scope: string, options: AcquireOptions = {}): Promise<LockHandle> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const deadline = Date.now() + timeoutMs;
    const { signal } = options;

    if (signal?.aborted) {
      throw new CancelledError(`acquiring lock '${scope}'`);
    }

    await this.mutex.acquire(scope, deadline, signal, () => new LockTimeoutError(scope, timeoutMs));

    try {
      await this.acquireFile(scope, deadline, timeoutMs, signal);
    } catch (err) {
      this.mutex.release(scope);
      throw err;
    }

    logger.debug('Lock acquired', { scope });

    let released = false;
    return {
      scope,
      release: async () => {
        if (released) {
          return;
        }
        released = true;
        try {
          await rm(this.lockFilePath(scope), { force: true });
        } finally {
          this.mutex.release(scope);
          logger.debug('Lock released', { scope });
        }
      },
    };
  }

  /**
   * Run `fn` while holding `scope`; the lock is released on every exit path.
   */
  async withLock<T>(scope: string, fn: () => Promise<T>, options: AcquireOptions = {}): Promise<T> {
    const handle = await this.acquire(scope, options);
    try {
      return await fn();
    } finally {
      await handle.release();
    }
  }

  isHeld(scope: string): boolean {
    return this.mutex.isLocked(scope);
  }

  private async acquireFile(
    scope: string,
    deadline: number,
    timeoutMs: number,
    signal: AbortSignal | undefined
  ): Promise<void> {
    await mkdir(this.lockDir, { recursive: true });
    const path = this.lockFilePath(scope);
    const data: LockData = { pid: process.pid, scope, acquired_at: new Date().toISOString() };

    for (;;) {
      try {
        const file = await open(path, 'wx');
        try {
          await file.writeFile(JSON.stringify(data));
        } finally {
          await file.close();
        }
        return;
      } catch (err) {
        if (!isErrno(err, 'EEXIST')) {
          throw err;
        }
      }

      if (await this.removeIfStale(path)) {
        continue;
      }
      if (signal?.aborted) {
        throw new CancelledError(`acquiring lock '${scope}'`);
      }
      if (Date.now() >= deadline) {
        throw new LockTimeoutError(scope, timeoutMs);
      }
      await new Promise((resolve) => setTimeout(resolve, Math.min(this.pollIntervalMs, Math.max(0, deadline - Date.now()))));
    }
  }

  private async removeIfStale(path: string): Promise<boolean> {
    let holder: LockData | null = null;
    try {
      holder = parseLockData(await readFile(path, 'utf-8'));
    } catch (err) {
      if (isErrno(err, 'ENOENT')) {
        // Released between our open and read
        return true;
      }
      // Half-written by a holder that is still creating it
      return false;
    }

    if (holder && holder.pid !== process.pid && !processAlive(holder.pid)) {
      logger.warn('Removing stale lock file', { path, pid: holder.pid });
      await takeOverStaleLock(path, holder);
      return true;
    }
    return false;
  }
}
