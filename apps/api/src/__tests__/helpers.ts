import type { Notifier, SubscriberId } from '@otp-relay/domain';
import { createLogger } from '../logger.js';

export const silentLogger = createLogger('silent');

export class RecordingNotifier implements Notifier {
  readonly sent: Array<{ chatId: SubscriberId; text: string }> = [];
  failWith?: Error;

  async sendMessage(chatId: SubscriberId, text: string): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push({ chatId, text });
  }
}

export function memoryStore(entries: Array<[string, SubscriberId]> = []) {
  const mappings = new Map(entries);
  return {
    mappings,
    async load() {
      return new Map(mappings);
    },
    async put(number: string, subscriberId: SubscriberId) {
      mappings.set(number, subscriberId);
      return { persisted: true };
    }
  };
}
