import {
  ParseFailure,
  UpstreamFailure,
  ValidationFailure,
  errorMessage,
  formatNumber,
  parseCommand,
  type AllocationInfoQuery,
  type AllocationResult,
  type InboundChatMessage,
  type MappingStore,
  type SubscriberId
} from '@otp-relay/domain';
import type { ChatGateway } from '../adapters/channel-gateway.js';
import type { Logger } from '../logger.js';
import type { AllocationService } from './allocation-service.js';

export const HELP_TEXT =
  'OTP bot ready. Use /range <prefix> to allocate a number (e.g. /range 88017XXX). /my lists your numbers.';
export const RANGE_USAGE = 'Usage: /range <prefix>  e.g. /range 88017XXX';
export const INFO_DISPLAY_LIMIT = 4000;

export interface AllocationInfoSource {
  fetchInfo(query: AllocationInfoQuery): Promise<string>;
}

export interface CommandRouterDeps {
  allocation: Pick<AllocationService, 'allocate'>;
  store: Pick<MappingStore, 'load'>;
  infoSource: AllocationInfoSource;
  gateway: ChatGateway;
  logger: Logger;
  adminChatId?: SubscriberId;
  botUsername?: string;
}

export function formatAllocation(result: AllocationResult): string {
  const lines = [`Allocated: ${formatNumber(result.number)}`];
  if (result.country) {
    lines.push(`Country: ${result.country}`);
  }
  if (result.operator) {
    lines.push(`Operator: ${result.operator}`);
  }
  if (!result.persisted) {
    lines.push('Note: the number is active but could not be saved to disk yet.');
  }
  return lines.join('\n');
}

export class CommandRouter {
  constructor(private readonly deps: CommandRouterDeps) {}

  /** Parses a raw chat update, runs the command and sends the reply. */
  async dispatch(update: unknown): Promise<void> {
    const inbound = this.deps.gateway.receiveInbound(update);
    if (!inbound) {
      return;
    }

    const reply = await this.handle(inbound);
    if (!reply) {
      return;
    }

    try {
      await this.deps.gateway.sendOutbound({ chatId: inbound.chatId, text: reply });
    } catch (error) {
      this.deps.logger.error({ err: error, chatId: inbound.chatId }, 'bot_reply_failed');
    }
  }

  async handle(message: InboundChatMessage): Promise<string | undefined> {
    const command = parseCommand(message.text, this.deps.botUsername);
    if (!command) {
      return;
    }

    switch (command.name) {
      case 'start':
      case 'help':
        return HELP_TEXT;
      case 'range':
        return await this.range(message.chatId, command.args);
      case 'my':
        return await this.my(message.chatId);
      case 'allocations':
        return await this.allocations(message.chatId, command.args);
      default:
        return `Unknown command /${command.name}. Try /range, /my or /help.`;
    }
  }

  private async range(chatId: SubscriberId, args: string[]): Promise<string> {
    const prefix = args[0];
    if (!prefix) {
      return RANGE_USAGE;
    }

    try {
      return formatAllocation(await this.deps.allocation.allocate(chatId, prefix));
    } catch (error) {
      if (error instanceof ValidationFailure) {
        return `Invalid range "${prefix}". ${RANGE_USAGE}`;
      }
      if (error instanceof ParseFailure) {
        const body = error.responseBody ? `\n${error.responseBody}` : '';
        return `Allocation failed: number not found in response${body}`;
      }
      if (error instanceof UpstreamFailure) {
        this.deps.logger.error({ err: error, chatId, prefix }, 'allocation_upstream_failed');
        return `Allocation failed: ${error.message}`;
      }
      this.deps.logger.error({ err: error, chatId, prefix }, 'allocation_failed');
      return `Allocation error: ${errorMessage(error)}`;
    }
  }

  private async my(chatId: SubscriberId): Promise<string> {
    const mappings = await this.deps.store.load();
    const numbers = [...mappings]
      .filter(([, owner]) => owner === chatId)
      .map(([number]) => formatNumber(number));

    if (numbers.length === 0) {
      return 'No numbers allocated to you.';
    }
    return `Your numbers:\n${numbers.join('\n')}`;
  }

  private async allocations(chatId: SubscriberId, args: string[]): Promise<string> {
    if (this.deps.adminChatId === undefined || chatId !== this.deps.adminChatId) {
      return 'Not authorized.';
    }

    const query: AllocationInfoQuery = {
      date: args[0] ?? '',
      page: args[1] ?? '1',
      search: '',
      status: args[2] ?? 'success'
    };

    try {
      const text = await this.deps.infoSource.fetchInfo(query);
      return text.slice(0, INFO_DISPLAY_LIMIT) || '(empty response)';
    } catch (error) {
      this.deps.logger.error({ err: error, query }, 'allocation_info_failed');
      return 'Fetch failed; check server logs.';
    }
  }
}
