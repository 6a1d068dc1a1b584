import Fastify, { type FastifyInstance } from 'fastify';
import type { TraderHandle } from './context.js';
import { registerControlsRoute } from './controls.js';
import { registerHealthzRoute } from './healthz.js';
import { registerOrderRoutes } from './orders.js';
import { registerPositionsRoute } from './positions.js';
import { registerStatusRoute } from './status.js';

export interface ApiOptions {
  /** Fastify's own request logging. */
  logRequests?: boolean;
}

export async function registerApiRoutes(app: FastifyInstance, trader: TraderHandle) {
  await registerHealthzRoute(app);
  await registerStatusRoute(app, trader);
  await registerOrderRoutes(app, trader);
  await registerPositionsRoute(app, trader);
  await registerControlsRoute(app, trader);
}

export async function buildApi(trader: TraderHandle, options: ApiOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logRequests ?? false });
  await registerApiRoutes(app, trader);
  return app;
}
