import type { Logger } from 'pino';
import { ParseFailure, UpstreamFailure, errorMessage, isRecord } from '@otp-relay/domain';

export interface TelegramClientOptions {
  timeoutMs?: number;
  logger?: Logger;
  apiBaseUrl?: string;
}

export interface TelegramUpdate {
  update_id: number;
  [field: string]: unknown;
}

export class TelegramClient {
  private readonly timeoutMs: number;
  private readonly apiBaseUrl: string;

  constructor(
    private readonly botToken?: string,
    private readonly webhookSecret?: string,
    private readonly options: TelegramClientOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.apiBaseUrl = options.apiBaseUrl ?? 'https://api.telegram.org';
  }

  isConfigured(): boolean {
    return Boolean(this.botToken);
  }

  validateSecret(secret?: string): boolean {
    if (!this.webhookSecret) {
      return true;
    }
    return secret === this.webhookSecret;
  }

  async sendMessage(chatId: number, text: string): Promise<void> {
    if (!this.botToken) {
      this.options.logger?.info({ chatId, text }, 'telegram_dev_send');
      return;
    }

    await this.call('sendMessage', { chat_id: chatId, text }, this.timeoutMs);
  }

  async getUpdates(offset: number | undefined, pollSeconds = 25): Promise<TelegramUpdate[]> {
    if (!this.botToken) {
      return [];
    }

    const result = await this.call(
      'getUpdates',
      { offset, timeout: pollSeconds, allowed_updates: ['message', 'edited_message'] },
      this.timeoutMs + pollSeconds * 1000
    );

    if (!Array.isArray(result)) {
      return [];
    }

    return result.filter(
      (update): update is TelegramUpdate => isRecord(update) && typeof update.update_id === 'number'
    );
  }

  private async call(method: string, payload: Record<string, unknown>, timeoutMs: number): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(`${this.apiBaseUrl}/bot${this.botToken}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(timeoutMs)
      });
    } catch (error) {
      throw new UpstreamFailure(`telegram_${method}_unreachable`, errorMessage(error), undefined, { cause: error });
    }

    if (!res.ok) {
      const body = await res.text();
      throw new UpstreamFailure(`telegram_${method}_failed`, `${res.status}:${body.slice(0, 500)}`, res.status);
    }

    const text = await res.text();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new ParseFailure(`telegram_${method}_invalid_json`, 'response is not JSON', text.slice(0, 500));
    }
    return isRecord(body) ? body.result : undefined;
  }
}
