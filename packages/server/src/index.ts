import type { FastifyInstance } from 'fastify';
import type { ScheduledTask } from 'node-cron';
import { TradingLoopController } from './botRunner/tradingLoop.js';
import { SystemClock, type ClockSource } from './core/clock.js';
import { describeError } from './core/errors.js';
import { AlpacaBroker, SimBroker, type Broker } from './execution/index.js';
import { AlpacaBarsGrabber } from './feeds/alpacaBars.js';
import type { DataGrabber } from './feeds/interface.js';
import { PolygonBarsGrabber } from './feeds/polygonBars.js';
import { buildApi } from './routes/index.js';
import { initHeartbeat } from './services/heartbeat.js';
import type { Strategy } from './strategies/interface.js';
import { MomentumWilliamsR } from './strategies/williamsR.js';
import { DataSyncCoordinator } from './sync/dataSyncCoordinator.js';
import { Feed } from './sync/feed.js';
import { DataFreshnessTracker } from './sync/freshnessTracker.js';
import type { TraderConfig } from './config.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('server');

export interface TraderOverrides {
  broker?: Broker;
  grabber?: DataGrabber;
  strategy?: Strategy;
  clock?: ClockSource;
}

export interface Trader {
  controller: TradingLoopController;
  broker: Broker;
  grabber: DataGrabber;
  coordinator: DataSyncCoordinator;
  strategy: Strategy;
}

export interface RunningTrader extends Trader {
  api: FastifyInstance | null;
  heartbeat: ScheduledTask;
  /** Settles when the loop reaches Stopped. */
  done: Promise<void>;
}

function createGrabber(config: TraderConfig, clock: ClockSource): DataGrabber {
  if (config.dataSource === 'polygon') {
    return new PolygonBarsGrabber({
      apiKey: config.polygon.apiKey,
      baseUrl: config.polygon.baseUrl,
      clock,
      logger: createLogger('polygon-bars'),
    });
  }
  return new AlpacaBarsGrabber({
    apiKey: config.alpaca.apiKey,
    apiSecret: config.alpaca.apiSecret,
    dataUrl: config.alpaca.dataUrl,
    feed: config.alpaca.feed,
    now: () => clock.now(),
    logger: createLogger('alpaca-bars'),
  });
}

/**
 * Wires feeds, broker, strategy and the loop controller from configuration.
 */
export function createTrader(config: TraderConfig, overrides: TraderOverrides = {}): Trader {
  const clock = overrides.clock ?? new SystemClock();
  const feeds = [config.quoteSymbol, config.hedgeSymbol].map(
    (symbol) => new Feed({ symbol, interval: config.interval, period: config.period })
  );
  const grabber = overrides.grabber ?? createGrabber(config, clock);
  const coordinator = new DataSyncCoordinator(feeds, new DataFreshnessTracker(grabber, createLogger('freshness')), {
    retryDelayMs: config.syncRetryDelayMs,
    staleBackoffMs: config.staleBackoffMs,
    maxRetries: config.maxSyncRetries,
    clock,
    logger: createLogger('data-sync'),
  });

  const broker =
    overrides.broker ??
    (config.broker === 'alpaca'
      ? new AlpacaBroker({
          apiKey: config.alpaca.apiKey,
          apiSecret: config.alpaca.apiSecret,
          baseUrl: config.alpaca.tradingUrl,
          now: () => clock.now(),
        })
      : new SimBroker({
          cash: config.simCash,
          currency: config.currency,
          priceSource: (symbol) => coordinator.lastClose(symbol),
          clock,
        }));

  const strategy =
    overrides.strategy ??
    new MomentumWilliamsR({
      quote: config.quoteSymbol,
      hedge: config.hedgeSymbol,
      currency: config.currency,
      ...config.strategy,
    });

  const controller = new TradingLoopController(
    { broker, strategy, coordinator },
    {
      pollIntervalMs: config.pollIntervalMs,
      actionWindowSeconds: config.actionWindowSeconds,
      endOfDay: config.endOfDay,
      connectAttempts: config.connectAttempts,
      connectRetryDelayMs: config.connectRetryDelayMs,
      cancelDelayMs: config.cancelDelayMs,
      clock,
    }
  );

  return { controller, broker, grabber, coordinator, strategy };
}

/**
 * Sets the trader up, starts the status API and heartbeat, and runs the loop in
 * the background. Setup failures reject before anything is started.
 */
export async function startTrader(config: TraderConfig, overrides: TraderOverrides = {}): Promise<RunningTrader> {
  const trader = createTrader(config, overrides);
  await trader.controller.setup();

  let api: FastifyInstance | null = null;
  if (config.api.enabled) {
    api = await buildApi(trader.controller, { logRequests: config.api.logRequests });
    await api.listen({ port: config.api.port, host: config.api.host });
    logger.info(`Status API listening on ${config.api.host}:${config.api.port}`);
  }

  const heartbeat = initHeartbeat(trader.controller, { logger: createLogger('heartbeat') });

  const done = trader.controller
    .run()
    .catch((error: unknown) => {
      logger.error(`Trading loop crashed: ${describeError(error)}`);
      throw error;
    })
    .finally(async () => {
      heartbeat.stop();
      if (api) await api.close();
    });

  return { ...trader, api, heartbeat, done };
}

export { loadConfig } from './config.js';
export type { TraderConfig } from './config.js';
