import type { FastifyInstance } from 'fastify';

export interface HealthRouteOptions {
  mappingCount(): number;
}

export async function healthRoutes(app: FastifyInstance, opts: HealthRouteOptions): Promise<void> {
  app.get('/healthz', async () => ({ ok: true, service: 'otp-relay', mappings: opts.mappingCount() }));
}
