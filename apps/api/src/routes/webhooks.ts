import type { FastifyInstance } from 'fastify';
import type { CommandRouter } from '../services/command-router.js';

export interface WebhookRouteOptions {
  router: Pick<CommandRouter, 'dispatch'>;
  validateSecret(secret?: string): boolean;
}

export async function webhookRoutes(app: FastifyInstance, opts: WebhookRouteOptions): Promise<void> {
  app.post('/webhooks/telegram', async (req, reply) => {
    const secret = req.headers['x-telegram-bot-api-secret-token'];
    if (!opts.validateSecret(Array.isArray(secret) ? secret[0] : secret)) {
      return reply.status(403).send({ error: 'invalid_telegram_secret' });
    }

    await opts.router.dispatch(req.body);
    return reply.send({ ok: true });
  });
}
