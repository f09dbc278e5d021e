import lockfile from 'proper-lockfile';
import { LockTimeout, StorageFailure } from '@otp-relay/domain';
import type { Logger } from '../logger.js';

export interface LockServiceOptions {
  timeoutMs: number;
  retryIntervalMs?: number;
  staleMs?: number;
  logger: Logger;
}

function isLockedError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ELOCKED';
}

/**
 * Advisory lock on `<target>.lock`, shared by every caller in this process and
 * by other processes working on the same file.
 */
export class LockService {
  readonly lockPath: string;

  constructor(private readonly targetPath: string, private readonly options: LockServiceOptions) {
    this.lockPath = `${targetPath}.lock`;
  }

  async acquire(): Promise<() => Promise<void>> {
    const interval = this.options.retryIntervalMs ?? 50;

    try {
      return await lockfile.lock(this.targetPath, {
        realpath: false,
        lockfilePath: this.lockPath,
        stale: this.options.staleMs ?? 10_000,
        retries: {
          retries: Math.max(0, Math.ceil(this.options.timeoutMs / interval)),
          factor: 1,
          minTimeout: interval,
          maxTimeout: interval
        },
        onCompromised: (error) => {
          this.options.logger.error({ err: error, lockPath: this.lockPath }, 'lock_compromised');
        }
      });
    } catch (error) {
      if (isLockedError(error)) {
        throw new LockTimeout(this.lockPath, this.options.timeoutMs);
      }
      throw new StorageFailure('lock_failed', { cause: error });
    }
  }

  async withLock<T>(work: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await work();
    } finally {
      await this.release(release);
    }
  }

  // A failed release must not replace the outcome of work that already ran.
  private async release(release: () => Promise<void>): Promise<void> {
    try {
      await release();
    } catch (error) {
      this.options.logger.warn({ err: error, lockPath: this.lockPath }, 'lock_release_failed');
    }
  }
}
