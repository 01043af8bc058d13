/**
 * Lock Service
 *
 * Single-flight deployment lock. The presence of the marker is the only
 * record that a deployment is in progress; nothing about the lock is
 * cached in memory, so a restarted gate sees the same state. A marker
 * left behind by a crashed deployment is never expired automatically:
 * status() flags it as stale and an operator releases it.
 */

import { readFile, unlink, writeFile } from 'fs/promises';
import { hostname } from 'os';
import { z } from 'zod';
import { LOCK_STALE_THRESHOLD_MINUTES } from '../constants';
import { getErrorCode } from '../utils/errors';

/**
 * Lock information stored in the marker
 */
export interface LockData {
  performer: string;
  started_at: string;
  timestamp: number;
  message?: string;
}

/**
 * Lock status with computed fields
 */
export interface LockStatus {
  locked: boolean;
  data?: LockData;
  durationMinutes?: number;
  isStale?: boolean;
}

export interface AcquireOptions {
  message?: string;
}

/**
 * Non-blocking try-lock contract
 */
export interface Locker {
  /** True iff the marker exists */
  isLocked(): Promise<boolean>;
  /** Create the marker if absent; false when already held */
  acquire(options?: AcquireOptions): Promise<boolean>;
  /** Delete the marker if present; false when not held */
  release(): Promise<boolean>;
  status(): Promise<LockStatus>;
}

export interface LockerOptions {
  staleAfterMinutes?: number;
  now?: () => Date;
}

const LockDataSchema = z.object({
  performer: z.string(),
  started_at: z.string().datetime(),
  timestamp: z.number(),
  message: z.string().optional(),
});

/**
 * Runs tasks one at a time, in call order.
 * Guards the check-then-act sequences of a locker against
 * interleaving within this process.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // Failures reach the caller through `result`; the chain keeps going
    this.tail = result.catch(() => undefined);
    return result;
  }
}

function createLockData(now: Date, message?: string): LockData {
  return {
    performer: `${process.env.USER || 'cli'}@${process.env.HOSTNAME || hostname()}`,
    started_at: now.toISOString(),
    timestamp: Math.floor(now.getTime() / 1000),
    message: message || 'Deployment in progress',
  };
}

function parseLockData(content: string): LockData | null {
  try {
    const parsed = LockDataSchema.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function describeLock(data: LockData, now: Date, staleAfterMinutes: number): LockStatus {
  const startedAt = new Date(data.started_at);
  const durationMinutes = Math.floor((now.getTime() - startedAt.getTime()) / 60000);
  return { locked: true, data, durationMinutes, isStale: durationMinutes > staleAfterMinutes };
}

/**
 * Lock backed by a marker file.
 *
 * The marker is created with the exclusive flag, so creation is also
 * atomic against another process. The in-process queue keeps concurrent
 * callers of this instance strictly ordered.
 */
export class FileLocker implements Locker {
  private readonly queue = new SerialQueue();
  private readonly staleAfterMinutes: number;
  private readonly now: () => Date;

  constructor(
    private readonly lockFile: string,
    options: LockerOptions = {}
  ) {
    this.staleAfterMinutes = options.staleAfterMinutes ?? LOCK_STALE_THRESHOLD_MINUTES;
    this.now = options.now ?? (() => new Date());
  }

  isLocked(): Promise<boolean> {
    return this.queue.run(async () => (await this.read()) !== null);
  }

  acquire(options?: AcquireOptions): Promise<boolean> {
    return this.queue.run(async () => {
      const content = JSON.stringify(createLockData(this.now(), options?.message), null, 2);
      try {
        await writeFile(this.lockFile, content, { flag: 'wx' });
        return true;
      } catch (error) {
        if (getErrorCode(error) === 'EEXIST') {
          return false;
        }
        throw error;
      }
    });
  }

  release(): Promise<boolean> {
    return this.queue.run(async () => {
      try {
        await unlink(this.lockFile);
        return true;
      } catch (error) {
        if (getErrorCode(error) === 'ENOENT') {
          return false;
        }
        throw error;
      }
    });
  }

  status(): Promise<LockStatus> {
    return this.queue.run(async () => {
      const content = await this.read();
      if (content === null) {
        return { locked: false };
      }

      const data = parseLockData(content);
      return data
        ? describeLock(data, this.now(), this.staleAfterMinutes)
        : { locked: true, isStale: true };
    });
  }

  /**
   * Marker content, or null when there is no marker
   */
  private async read(): Promise<string | null> {
    try {
      return await readFile(this.lockFile, 'utf-8');
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}

/**
 * In-memory lock for tests and dry runs
 */
export class MemoryLocker implements Locker {
  private data: LockData | null = null;
  private readonly staleAfterMinutes: number;
  private readonly now: () => Date;

  constructor(options: LockerOptions = {}) {
    this.staleAfterMinutes = options.staleAfterMinutes ?? LOCK_STALE_THRESHOLD_MINUTES;
    this.now = options.now ?? (() => new Date());
  }

  async isLocked(): Promise<boolean> {
    return this.data !== null;
  }

  async acquire(options?: AcquireOptions): Promise<boolean> {
    if (this.data !== null) {
      return false;
    }
    this.data = createLockData(this.now(), options?.message);
    return true;
  }

  async release(): Promise<boolean> {
    if (this.data === null) {
      return false;
    }
    this.data = null;
    return true;
  }

  async status(): Promise<LockStatus> {
    if (this.data === null) {
      return { locked: false };
    }
    return describeLock(this.data, this.now(), this.staleAfterMinutes);
  }
}

