import { readFile, rename, writeFile } from 'node:fs/promises';
import {
  StorageFailure,
  ValidationFailure,
  isRecord,
  normalizeNumber,
  type MappingSnapshot,
  type MappingStore,
  type SubscriberId
} from '@otp-relay/domain';
import type { Logger } from '../logger.js';
import { LockService } from './lock-service.js';

export interface FileMappingStoreOptions {
  lockTimeoutMs?: number;
  lockRetryIntervalMs?: number;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Number → chat mappings persisted as one JSON object. Reads and writes go
 * through the sidecar lock; the in-memory snapshot keeps serving routes when
 * the file cannot be read or written, and entries that failed to persist are
 * written again with the next successful write.
 */
export class FileMappingStore implements MappingStore {
  private snapshot = new Map<string, SubscriberId>();
  private readonly unpersisted = new Map<string, SubscriberId>();
  private readonly lock: LockService;

  constructor(
    readonly filePath: string,
    private readonly logger: Logger,
    options: FileMappingStoreOptions = {}
  ) {
    this.lock = new LockService(filePath, {
      timeoutMs: options.lockTimeoutMs ?? 5000,
      retryIntervalMs: options.lockRetryIntervalMs,
      logger
    });
  }

  get size(): number {
    return this.snapshot.size;
  }

  async load(): Promise<Map<string, SubscriberId>> {
    try {
      await this.lock.withLock(async () => {
        this.snapshot = this.withPending(await this.read());
      });
    } catch (error) {
      this.logger.error({ err: error, file: this.filePath }, 'mapping_load_failed');
    }

    return new Map(this.snapshot);
  }

  async save(mappings: MappingSnapshot): Promise<void> {
    const replaced = new Map(this.unpersisted);
    const next = new Map(mappings);

    try {
      await this.lock.withLock(async () => {
        await this.write(next);
        // Pending entries queued before the save are superseded by it.
        this.settle(replaced);
        this.settle(next);
        this.snapshot = this.withPending(next);
      });
    } catch (error) {
      for (const [number, subscriberId] of next) {
        this.unpersisted.set(number, subscriberId);
      }
      this.snapshot = this.withPending(next);
      this.logger.error({ err: error, file: this.filePath }, 'mapping_save_failed');
    }
  }

  async put(number: string, subscriberId: SubscriberId): Promise<{ persisted: boolean }> {
    const key = normalizeNumber(number);
    if (!key) {
      throw new ValidationFailure('invalid_number', `cannot map "${number}"`);
    }

    try {
      await this.lock.withLock(async () => {
        const mappings = await this.read();
        for (const [pending, owner] of this.unpersisted) {
          mappings.set(pending, owner);
        }
        mappings.set(key, subscriberId);
        await this.write(mappings);
        this.settle(mappings);
        this.snapshot = this.withPending(mappings);
      });
      return { persisted: true };
    } catch (error) {
      this.unpersisted.set(key, subscriberId);
      this.snapshot.set(key, subscriberId);
      this.logger.error({ err: error, file: this.filePath, number: key, subscriberId }, 'mapping_put_failed');
      return { persisted: false };
    }
  }

  /** Drops pending entries whose current owner matches what was just written. */
  private settle(written: MappingSnapshot): void {
    for (const [number, subscriberId] of written) {
      if (this.unpersisted.get(number) === subscriberId) {
        this.unpersisted.delete(number);
      }
    }
  }

  private withPending(mappings: Map<string, SubscriberId>): Map<string, SubscriberId> {
    for (const [number, subscriberId] of this.unpersisted) {
      mappings.set(number, subscriberId);
    }
    return mappings;
  }

  private async read(): Promise<Map<string, SubscriberId>> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return new Map();
      }
      throw new StorageFailure('mapping_read_failed', { cause: error });
    }

    if (!text.trim()) {
      return new Map();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new StorageFailure('mapping_file_corrupt', { cause: error });
    }

    if (!isRecord(parsed)) {
      throw new StorageFailure('mapping_file_corrupt');
    }

    const mappings = new Map<string, SubscriberId>();
    const skipped: string[] = [];
    for (const [rawNumber, subscriberId] of Object.entries(parsed)) {
      const number = normalizeNumber(rawNumber);
      if (number && typeof subscriberId === 'number' && Number.isInteger(subscriberId)) {
        mappings.set(number, subscriberId);
      } else {
        skipped.push(rawNumber);
      }
    }

    if (skipped.length > 0) {
      this.logger.warn({ file: this.filePath, skipped }, 'mapping_entries_skipped');
    }

    return mappings;
  }

  private async write(mappings: MappingSnapshot): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await writeFile(tmpPath, `${JSON.stringify(Object.fromEntries(mappings), null, 2)}\n`, 'utf8');
      await rename(tmpPath, this.filePath);
    } catch (error) {
      throw new StorageFailure('mapping_write_failed', { cause: error });
    }
  }
}
