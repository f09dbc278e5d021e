import type { FastifyInstance } from 'fastify';
import type { CallbackProcessor } from '../services/callback-processor.js';

export interface CallbackRouteOptions {
  processor: Pick<CallbackProcessor, 'process'>;
}

export async function callbackRoutes(app: FastifyInstance, opts: CallbackRouteOptions): Promise<void> {
  // Keep the body raw so the processor authenticates before parsing, whatever the content type.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_req, body, done) => {
    done(null, body);
  });

  app.post('/callback', async (req, reply) => {
    const secret = req.headers['x-callback-secret'];
    const apiKey = req.headers.mapikey;

    const result = await opts.processor.process({
      secret: Array.isArray(secret) ? secret[0] : secret,
      apiKey: Array.isArray(apiKey) ? apiKey[0] : apiKey,
      rawBody: typeof req.body === 'string' ? req.body : undefined
    });

    return reply.send({ ok: true, outcome: result.outcome, delivered: result.delivered });
  });
}
