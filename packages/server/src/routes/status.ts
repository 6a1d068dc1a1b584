import type { FastifyInstance } from 'fastify';
import type { TraderHandle } from './context.js';

export async function registerStatusRoute(app: FastifyInstance, trader: TraderHandle) {
  app.get('/api/status', async () => {
    return trader.status();
  });
}
