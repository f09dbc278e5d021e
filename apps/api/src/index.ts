import { NumberApiClient, TelegramClient } from '@otp-relay/clients';
import { TelegramGateway } from './adapters/channel-gateway.js';
import { loadEnv } from './config/env.js';
import { createLogger } from './logger.js';
import { buildServer } from './server.js';
import { AllocationService } from './services/allocation-service.js';
import { CallbackProcessor } from './services/callback-processor.js';
import { CommandRouter } from './services/command-router.js';
import { InboundMatcher } from './services/inbound-matcher.js';
import { FileMappingStore } from './services/mapping-store.js';
import { UpdatePoller } from './services/update-poller.js';

const env = loadEnv();
const logger = createLogger(env.LOG_LEVEL);

const telegram = new TelegramClient(env.TELEGRAM_BOT_TOKEN, env.TELEGRAM_WEBHOOK_SECRET, {
  timeoutMs: env.HTTP_TIMEOUT_MS,
  logger
});
const numberApi = new NumberApiClient(env.NUMBER_API_BASE_URL, env.NUMBER_API_KEY, {
  timeoutMs: env.HTTP_TIMEOUT_MS
});
const store = new FileMappingStore(env.MAPPINGS_FILE, logger, { lockTimeoutMs: env.LOCK_TIMEOUT_MS });
const mappings = await store.load();
logger.info({ file: store.filePath, mappings: mappings.size }, 'mappings_loaded');

const router = new CommandRouter({
  allocation: new AllocationService(numberApi, store, logger),
  store,
  infoSource: numberApi,
  gateway: new TelegramGateway(telegram),
  logger,
  adminChatId: env.ADMIN_CHAT_ID,
  botUsername: env.TELEGRAM_BOT_USERNAME
});
const processor = new CallbackProcessor(
  new InboundMatcher(store, logger),
  telegram,
  { apiKey: env.NUMBER_API_KEY, callbackSecret: env.CALLBACK_SECRET, adminChatId: env.ADMIN_CHAT_ID },
  logger
);

const app = await buildServer({
  logger,
  processor,
  mappingCount: () => store.size,
  telegramWebhook:
    env.TELEGRAM_MODE === 'webhook'
      ? { router, validateSecret: (secret) => telegram.validateSecret(secret) }
      : undefined
});
await app.listen({ port: env.PORT, host: '0.0.0.0' });

const poller =
  env.TELEGRAM_MODE === 'polling' && telegram.isConfigured()
    ? new UpdatePoller(telegram, router, logger)
    : undefined;

if (!telegram.isConfigured()) {
  logger.warn('telegram_bot_token_missing');
}

poller?.run().catch((error: unknown) => {
  logger.fatal({ err: error }, 'bot_polling_fatal');
  process.exit(1);
});

const shutdown = async (signal: string) => {
  logger.info({ signal }, 'shutdown');
  poller?.stop();
  await app.close();
  process.exit(0);
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, 'shutdown_failed');
      process.exit(1);
    });
  });
}
