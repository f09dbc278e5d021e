import { describe, expect, it, vi } from 'vitest';
import type { TelegramUpdate } from '@otp-relay/clients';
import { UpdatePoller } from '../services/update-poller.js';
import { silentLogger } from './helpers.js';

describe('update poller', () => {
  it('dispatches updates and advances the offset', async () => {
    const batches: TelegramUpdate[][] = [[{ update_id: 7 }, { update_id: 9 }], []];
    const getUpdates = vi.fn(async (_offset: number | undefined, _pollSeconds?: number) => batches.shift() ?? []);
    const dispatch = vi.fn(async (_update: unknown) => undefined);
    const poller = new UpdatePoller({ getUpdates }, { dispatch }, silentLogger, { pollSeconds: 1 });

    expect(await poller.pollOnce()).toBe(2);
    expect(await poller.pollOnce()).toBe(0);

    expect(getUpdates.mock.calls).toEqual([
      [undefined, 1],
      [10, 1]
    ]);
    expect(dispatch).toHaveBeenCalledTimes(2);
  });

  it('keeps going when one update fails', async () => {
    const first: TelegramUpdate = { update_id: 1 };
    const second: TelegramUpdate = { update_id: 2 };
    const dispatch = vi.fn(async (update: unknown) => {
      if (update === first) {
        throw new Error('boom');
      }
    });
    const poller = new UpdatePoller({ getUpdates: async () => [first, second] }, { dispatch }, silentLogger);

    await expect(poller.pollOnce()).resolves.toBe(2);
    expect(dispatch).toHaveBeenCalledWith(second);
  });

  it('stops the loop when asked', async () => {
    let poller: UpdatePoller | undefined;
    poller = new UpdatePoller(
      {
        getUpdates: async () => {
          poller?.stop();
          throw new Error('network down');
        }
      },
      { dispatch: async () => undefined },
      silentLogger,
      { errorDelayMs: 60_000 }
    );

    await expect(poller.run()).resolves.toBeUndefined();
  });
});
