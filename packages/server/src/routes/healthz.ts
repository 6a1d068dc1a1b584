import type { FastifyInstance } from 'fastify';

export async function registerHealthzRoute(app: FastifyInstance) {
  app.get('/healthz', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });
}
