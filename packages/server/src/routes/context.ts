import type { FastifyReply } from 'fastify';
import type { TradingLoopController } from '../botRunner/tradingLoop.js';
import { describeError, isTradingError } from '../core/errors.js';

export type TraderHandle = Pick<TradingLoopController, 'status' | 'stop' | 'orders' | 'broker'>;

/** Maps trading errors onto HTTP status codes. */
export function replyWithError(reply: FastifyReply, error: unknown) {
  if (isTradingError(error, 'ORDER_NOT_FOUND')) {
    reply.code(404);
  } else if (isTradingError(error, 'SETUP_ERROR')) {
    reply.code(503);
  } else if (isTradingError(error, 'CONNECTION_ERROR')) {
    reply.code(502);
  } else {
    reply.code(500);
  }
  return { error: describeError(error) };
}
