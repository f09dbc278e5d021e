import { setTimeout as delay } from 'node:timers/promises';
import type { TelegramUpdate } from '@otp-relay/clients';
import type { Logger } from '../logger.js';
import type { CommandRouter } from './command-router.js';

export interface UpdateSource {
  getUpdates(offset: number | undefined, pollSeconds?: number): Promise<TelegramUpdate[]>;
}

export interface UpdatePollerOptions {
  pollSeconds?: number;
  errorDelayMs?: number;
}

export class UpdatePoller {
  private offset: number | undefined;
  private running = false;
  private readonly stopController = new AbortController();

  constructor(
    private readonly source: UpdateSource,
    private readonly router: Pick<CommandRouter, 'dispatch'>,
    private readonly logger: Logger,
    private readonly options: UpdatePollerOptions = {}
  ) {}

  async pollOnce(): Promise<number> {
    const updates = await this.source.getUpdates(this.offset, this.options.pollSeconds ?? 25);
    if (updates.length === 0) {
      return 0;
    }

    this.offset = Math.max(...updates.map((update) => update.update_id)) + 1;
    await Promise.all(
      updates.map(async (update) => {
        try {
          await this.router.dispatch(update);
        } catch (error) {
          this.logger.error({ err: error, updateId: update.update_id }, 'bot_update_failed');
        }
      })
    );

    return updates.length;
  }

  async run(): Promise<void> {
    this.running = true;
    this.logger.info('bot_polling_started');

    while (this.running) {
      try {
        await this.pollOnce();
      } catch (error) {
        this.logger.error({ err: error }, 'bot_poll_failed');
        await delay(this.options.errorDelayMs ?? 3000, undefined, { signal: this.stopController.signal }).catch(
          (delayError: unknown) => {
            if (!this.stopController.signal.aborted) {
              throw delayError;
            }
          }
        );
      }
    }

    this.logger.info('bot_polling_stopped');
  }

  stop(): void {
    this.running = false;
    this.stopController.abort();
  }
}
