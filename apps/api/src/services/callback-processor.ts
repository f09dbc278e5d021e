import {
  AuthFailure,
  MESSAGE_FIELDS,
  NUMBER_FIELDS,
  OTP_FIELDS,
  ValidationFailure,
  extractOtp,
  formatNumber,
  isRecord,
  normalizeNumber,
  pickField,
  type CallbackInput,
  type CallbackOutcome,
  type InboundNotification,
  type Notifier,
  type SubscriberId,
  type SubscriberMatch
} from '@otp-relay/domain';
import type { Logger } from '../logger.js';
import { safeEqual } from '../utils/hash.js';

export interface CallbackProcessorOptions {
  apiKey: string;
  callbackSecret?: string;
  adminChatId?: SubscriberId;
}

export interface SubscriberResolver {
  resolve(rawNumber: string): Promise<SubscriberMatch | undefined>;
}

const PAYLOAD_PREVIEW_LENGTH = 1000;

export function parsePayload(rawBody?: string): InboundNotification {
  if (!rawBody?.trim()) {
    throw new ValidationFailure('missing_payload', 'callback body is empty');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch {
    throw new ValidationFailure('invalid_json', 'callback body is not JSON');
  }

  if (!isRecord(parsed) || Object.keys(parsed).length === 0) {
    throw new ValidationFailure('invalid_payload', 'callback body must be a non-empty JSON object');
  }

  return parsed;
}

export function formatOtpMessage(number: string, otp?: string, body?: string): string {
  if (otp) {
    return `OTP for ${formatNumber(number)}: ${otp}`;
  }
  return `⚠️ OTP not detected for ${formatNumber(number)}\n${body ?? '(empty message)'}`;
}

function preview(payload: InboundNotification): string {
  return JSON.stringify(payload).slice(0, PAYLOAD_PREVIEW_LENGTH);
}

export class CallbackProcessor {
  constructor(
    private readonly matcher: SubscriberResolver,
    private readonly notifier: Notifier,
    private readonly options: CallbackProcessorOptions,
    private readonly logger: Logger
  ) {}

  async process(input: CallbackInput): Promise<CallbackOutcome> {
    this.authenticate(input);
    const payload = parsePayload(input.rawBody);

    const rawNumber = pickField(payload, NUMBER_FIELDS);
    const body = pickField(payload, MESSAGE_FIELDS);
    const otp = pickField(payload, OTP_FIELDS) ?? extractOtp(body);
    const number = normalizeNumber(rawNumber);

    if (!number) {
      this.logger.warn({ payload: preview(payload) }, 'callback_missing_number');
      await this.escalate(`UNMAPPED: callback without a destination number\npayload: ${preview(payload)}`);
      throw new ValidationFailure('missing_number', 'no destination number in payload');
    }

    const text = formatOtpMessage(number, otp, body);
    const match = await this.matcher.resolve(number);

    if (match) {
      const delivered = await this.deliver(match.subscriberId, text);
      this.logger.info({ number, subscriberId: match.subscriberId, strategy: match.strategy, delivered }, 'otp_forwarded');
      return { outcome: 'forwarded', subscriberId: match.subscriberId, number, otp, delivered };
    }

    if (this.options.adminChatId === undefined) {
      this.logger.info({ number }, 'otp_dropped_no_admin');
      return { outcome: 'dropped', number, delivered: false };
    }

    const delivered = await this.escalate(`UNMAPPED: ${text}\npayload: ${preview(payload)}`);
    this.logger.info({ number, delivered }, 'otp_escalated');
    return { outcome: 'escalated', number, delivered };
  }

  private authenticate(input: CallbackInput): void {
    const { callbackSecret, apiKey } = this.options;
    const accepted = callbackSecret
      ? safeEqual(input.secret, callbackSecret)
      : safeEqual(input.apiKey, apiKey);

    if (!accepted) {
      this.logger.warn({ method: callbackSecret ? 'secret' : 'mapikey' }, 'callback_auth_failed');
      throw new AuthFailure();
    }
  }

  private async escalate(text: string): Promise<boolean> {
    if (this.options.adminChatId === undefined) {
      return false;
    }
    return await this.deliver(this.options.adminChatId, text);
  }

  private async deliver(chatId: SubscriberId, text: string): Promise<boolean> {
    try {
      await this.notifier.sendMessage(chatId, text);
      return true;
    } catch (error) {
      this.logger.error({ err: error, chatId }, 'notification_send_failed');
      return false;
    }
  }
}
