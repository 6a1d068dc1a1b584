import type { FastifyInstance } from 'fastify';
import type { TraderHandle } from './context.js';

interface ControlsBody {
  action?: string;
}

export async function registerControlsRoute(app: FastifyInstance, trader: TraderHandle) {
  app.post<{ Body: ControlsBody }>('/controls', async (request, reply) => {
    if (request.body?.action === 'stop') {
      trader.stop();
      const status = trader.status();
      return { state: status.state, stopRequested: status.stopRequested };
    }

    reply.code(400);
    return { error: 'No valid control action provided' };
  });
}
