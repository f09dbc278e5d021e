export type SubscriberId = number;

export type MappingSnapshot = ReadonlyMap<string, SubscriberId>;

export type MatchStrategy = 'exact' | 'suffix' | 'loose';

export interface SubscriberMatch {
  subscriberId: SubscriberId;
  key: string;
  strategy: MatchStrategy;
  suffixLength?: number;
  collisions: string[];
}

export type InboundNotification = Record<string, unknown>;

export interface BotCommand {
  name: string;
  args: string[];
}

export interface InboundChatMessage {
  chatId: SubscriberId;
  text: string;
  updateId?: number;
}

export interface MappingStore {
  load(): Promise<Map<string, SubscriberId>>;
  save(mappings: MappingSnapshot): Promise<void>;
  put(number: string, subscriberId: SubscriberId): Promise<{ persisted: boolean }>;
}

export interface Notifier {
  sendMessage(chatId: SubscriberId, text: string): Promise<void>;
}

export interface AllocationRequest {
  range: string;
  is_national: boolean | null;
  remove_plus: boolean | null;
}

export interface AllocationInfoQuery {
  date: string;
  page: string;
  search: string;
  status: string;
}

export interface AllocationResult {
  number: string;
  range: string;
  country?: string;
  operator?: string;
  status?: string;
  message?: string;
  persisted: boolean;
}

export type CallbackOutcome =
  | { outcome: 'forwarded'; subscriberId: SubscriberId; number: string; otp?: string; delivered: boolean }
  | { outcome: 'escalated'; number: string; delivered: boolean }
  | { outcome: 'dropped'; number: string; delivered: false };

export interface CallbackInput {
  secret?: string;
  apiKey?: string;
  rawBody?: string;
}
