import Fastify, { type FastifyBaseLogger } from 'fastify';
import { isRelayError } from '@otp-relay/domain';
import type { Logger } from './logger.js';
import { callbackRoutes, type CallbackRouteOptions } from './routes/callback.js';
import { healthRoutes } from './routes/health.js';
import { webhookRoutes, type WebhookRouteOptions } from './routes/webhooks.js';

export interface ServerDeps {
  logger: Logger;
  processor: CallbackRouteOptions['processor'];
  mappingCount(): number;
  telegramWebhook?: WebhookRouteOptions;
}

function clientErrorStatus(error: unknown): number | undefined {
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode >= 400 && error.statusCode < 500 ? error.statusCode : undefined;
  }
  return;
}

export async function buildServer(deps: ServerDeps) {
  const loggerInstance: FastifyBaseLogger = deps.logger;
  const app = Fastify({ loggerInstance });

  app.setErrorHandler((error, req, reply) => {
    if (isRelayError(error)) {
      return reply.status(error.statusCode).send({ error: error.code });
    }

    const status = clientErrorStatus(error);
    if (status !== undefined) {
      return reply.status(status).send({ error: error instanceof Error ? error.message : 'bad_request' });
    }

    req.log.error({ err: error }, 'request_failed');
    return reply.status(500).send({ error: 'internal_error' });
  });

  await app.register(healthRoutes, { mappingCount: deps.mappingCount });
  await app.register(callbackRoutes, { processor: deps.processor });
  if (deps.telegramWebhook) {
    await app.register(webhookRoutes, deps.telegramWebhook);
  }

  return app;
}
