import type { FastifyInstance } from 'fastify';
import { isRecord } from '../core/http.js';
import { replyWithError, type TraderHandle } from './context.js';

interface OrderParams {
  id: string;
}

/** Ids to cancel; an absent body or field means every open order. Null when malformed. */
function readOrderIds(body: unknown): string[] | null {
  if (body === undefined || body === null) return [];
  if (!isRecord(body)) return null;
  const ids = body['orderIds'];
  if (ids === undefined) return [];
  if (!Array.isArray(ids)) return null;
  const orderIds: string[] = [];
  for (const id of ids) {
    if (typeof id !== 'string') return null;
    orderIds.push(id);
  }
  return orderIds;
}

export async function registerOrderRoutes(app: FastifyInstance, trader: TraderHandle) {
  app.get<{ Params: OrderParams }>('/api/orders/:id', async (request, reply) => {
    const orderId = request.params.id;
    try {
      const state = await trader.orders.status(orderId);
      return { orderId, state };
    } catch (error) {
      return replyWithError(reply, error);
    }
  });

  app.post<{ Body: unknown }>('/api/orders/cancel', async (request, reply) => {
    const orderIds = readOrderIds(request.body);
    if (!orderIds) {
      reply.code(400);
      return { error: 'orderIds must be an array of strings' };
    }
    try {
      const cancelled = await trader.orders.cancel(orderIds);
      return { cancelled };
    } catch (error) {
      return replyWithError(reply, error);
    }
  });
}
