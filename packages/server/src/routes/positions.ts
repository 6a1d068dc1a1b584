import type { FastifyInstance } from 'fastify';
import { replyWithError, type TraderHandle } from './context.js';

export async function registerPositionsRoute(app: FastifyInstance, trader: TraderHandle) {
  app.get('/api/positions', async (_request, reply) => {
    try {
      const positions = await trader.broker.getPositions();
      return { positions: [...positions.values()] };
    } catch (error) {
      return replyWithError(reply, error);
    }
  });
}
