import type { FeedData, OrderInstruction } from '../core/types.js';
import type { Broker } from '../execution/interface.js';
import type { TraderLogger } from '../utils/logger.js';

export interface StrategyContext {
  broker: Broker;
  /** Close of the newest cached bar for a symbol, if any feed carries it. */
  lastClose(symbol: string): number | undefined;
  logger: TraderLogger;
}

/**
 * Pluggable decision function. `decide` sees each feed's cached table keyed by feed
 * name and returns the orders to submit, in order.
 */
export interface Strategy {
  readonly name: string;
  init?(ctx: StrategyContext): Promise<void>;
  decide(feedData: FeedData): Promise<OrderInstruction[]>;
}
