import { isRecord, type InboundChatMessage, type Notifier } from '@otp-relay/domain';

export interface ChatGateway {
  receiveInbound(payload: unknown): InboundChatMessage | undefined;
  sendOutbound(message: InboundChatMessage): Promise<void>;
}

export class TelegramGateway implements ChatGateway {
  constructor(private readonly telegram: Notifier) {}

  receiveInbound(payload: unknown): InboundChatMessage | undefined {
    if (!isRecord(payload)) {
      return;
    }

    const message = isRecord(payload.message)
      ? payload.message
      : isRecord(payload.edited_message)
        ? payload.edited_message
        : undefined;
    const chat = isRecord(message?.chat) ? message.chat : undefined;
    const chatId = chat?.id;
    const text = message?.text;

    if (typeof chatId !== 'number' || typeof text !== 'string') {
      return;
    }

    return {
      chatId,
      text,
      updateId: typeof payload.update_id === 'number' ? payload.update_id : undefined
    };
  }

  async sendOutbound(message: InboundChatMessage): Promise<void> {
    await this.telegram.sendMessage(message.chatId, message.text);
  }
}
