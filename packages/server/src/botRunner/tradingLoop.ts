import { DelegatingClock, type ClockSource } from '../core/clock.js';
import { SetupError, describeError } from '../core/errors.js';
import type { OrderInstruction } from '../core/types.js';
import { connectWithRetry } from '../execution/connect.js';
import type { Broker } from '../execution/interface.js';
import { OrderLifecycleManager } from '../orders/orderLifecycleManager.js';
import type { Strategy } from '../strategies/interface.js';
import type { DataSyncCoordinator, SyncOutcomeKind } from '../sync/dataSyncCoordinator.js';
import { createLogger, type TraderLogger } from '../utils/logger.js';

export type LoopState =
  | 'Idle'
  | 'AwaitingWindow'
  | 'Syncing'
  | 'Deciding'
  | 'Submitting'
  | 'EndOfDayLiquidation'
  | 'Stopped';

export interface TradingLoopDeps {
  broker?: Broker | null;
  strategy?: Strategy | null;
  coordinator?: DataSyncCoordinator | null;
}

export interface TradingLoopOptions {
  pollIntervalMs?: number;
  /** Seconds after each wall-clock minute during which the loop may act. */
  actionWindowSeconds?: number;
  /** UTC minute that triggers liquidation and shutdown. */
  endOfDay?: { hour: number; minute: number };
  connectAttempts?: number;
  connectRetryDelayMs?: number;
  cancelDelayMs?: number;
  /** Run one sync before the strategy is initialised. */
  initialSync?: boolean;
  /** Symbols liquidated at end of day. Defaults to the feed symbols. */
  symbols?: string[];
  clock?: ClockSource;
  logger?: TraderLogger;
}

export interface TickReport {
  at: Date;
  state: LoopState;
  outcome?: SyncOutcomeKind;
  instructions: number;
  submitted: string[];
  failed: number;
  sleepMs: number;
}

export interface LoopStatus {
  state: LoopState;
  tickCount: number;
  lastTickAt: string | null;
  lastOutcome: SyncOutcomeKind | null;
  submittedOrders: number;
  failedSubmissions: number;
  stopRequested: boolean;
}

interface Ready {
  broker: Broker;
  strategy: Strategy;
  coordinator: DataSyncCoordinator;
  orders: OrderLifecycleManager;
  clock: ClockSource;
}

export function inActionWindow(now: Date, windowSeconds: number): boolean {
  const seconds = now.getUTCSeconds() + now.getUTCMilliseconds() / 1000;
  return seconds > 0 && seconds <= windowSeconds;
}

export function isEndOfDay(now: Date, endOfDay: { hour: number; minute: number }): boolean {
  return now.getUTCHours() === endOfDay.hour && now.getUTCMinutes() === endOfDay.minute;
}

/**
 * Tick scheduler: gates on the action window, syncs feeds, runs the strategy and
 * submits its orders. Ends with liquidation at the end-of-day minute or when a
 * stop is requested.
 */
export class TradingLoopController {
  private loopState: LoopState = 'Idle';
  private ready: Ready | null = null;
  private readonly deps: TradingLoopDeps;
  private readonly pollIntervalMs: number;
  private readonly actionWindowSeconds: number;
  private readonly endOfDay: { hour: number; minute: number };
  private readonly connectAttempts: number;
  private readonly connectRetryDelayMs: number;
  private readonly cancelDelayMs: number;
  private readonly initialSync: boolean;
  private readonly symbols?: string[];
  private readonly clock?: ClockSource;
  private readonly logger: TraderLogger;
  private readonly abort = new AbortController();
  private tickCount = 0;
  private lastTickAt: Date | null = null;
  private submittedOrders = 0;
  private failedSubmissions = 0;

  constructor(deps: TradingLoopDeps, options: TradingLoopOptions = {}) {
    this.deps = deps;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.actionWindowSeconds = options.actionWindowSeconds ?? 10;
    this.endOfDay = options.endOfDay ?? { hour: 20, minute: 59 };
    this.connectAttempts = options.connectAttempts ?? 5;
    this.connectRetryDelayMs = options.connectRetryDelayMs ?? 1000;
    this.cancelDelayMs = options.cancelDelayMs ?? 1;
    this.initialSync = options.initialSync ?? true;
    this.symbols = options.symbols;
    this.clock = options.clock;
    this.logger = options.logger ?? createLogger('trading-loop');
  }

  get state(): LoopState {
    return this.loopState;
  }

  get stopRequested(): boolean {
    return this.abort.signal.aborted;
  }

  /** Order manager bound to the configured broker. Available after `setup()`. */
  get orders(): OrderLifecycleManager {
    return this.requireReady().orders;
  }

  get broker(): Broker {
    return this.requireReady().broker;
  }

  status(): LoopStatus {
    return {
      state: this.loopState,
      tickCount: this.tickCount,
      lastTickAt: this.lastTickAt ? this.lastTickAt.toISOString() : null,
      lastOutcome: this.ready?.coordinator.lastOutcome?.kind ?? null,
      submittedOrders: this.submittedOrders,
      failedSubmissions: this.failedSubmissions,
      stopRequested: this.stopRequested,
    };
  }

  /**
   * Validates collaborators, connects the broker and initialises the strategy.
   * Throws SetupError when a collaborator is missing.
   */
  async setup(): Promise<void> {
    if (this.ready) return;
    const { broker, strategy, coordinator } = this.deps;
    if (!broker) throw new SetupError('No broker configured.');
    if (!strategy) throw new SetupError('No strategy configured.');
    if (!coordinator || coordinator.feedCount === 0) throw new SetupError('No data feeds configured.');
    try {
      coordinator.checkFeeds();
    } catch (error) {
      throw new SetupError(`Feed configuration rejected: ${describeError(error)}`);
    }

    const clock = this.clock ?? new DelegatingClock(broker);
    await connectWithRetry(broker, {
      attempts: this.connectAttempts,
      retryDelayMs: this.connectRetryDelayMs,
      clock,
      logger: this.logger.child('connect'),
    });

    const orders = new OrderLifecycleManager(broker, {
      cancelDelayMs: this.cancelDelayMs,
      clock,
      logger: this.logger.child('orders'),
    });

    if (this.initialSync) {
      const outcome = await coordinator.syncTick(clock.now());
      this.logger.info(`Initial data sync: ${outcome.kind}`, { feeds: coordinator.feedNames });
    }

    if (strategy.init) {
      await strategy.init({
        broker,
        lastClose: (symbol) => coordinator.lastClose(symbol),
        logger: this.logger.child('strategy'),
      });
    }

    this.ready = { broker, strategy, coordinator, orders, clock };
    this.loopState = 'Idle';
    this.logger.info(`Trading loop ready with ${strategy.name} on ${broker.name}`, {
      feeds: coordinator.feedNames,
      pollIntervalMs: this.pollIntervalMs,
      actionWindowSeconds: this.actionWindowSeconds,
    });
  }

  /** `setup()` followed by `run()`. */
  async start(): Promise<void> {
    await this.setup();
    await this.run();
  }

  /** Ticks until end of day or a stop request. One tick is in flight at a time. */
  async run(): Promise<void> {
    const ready = this.requireReady();
    while (this.loopState !== 'Stopped') {
      if (this.stopRequested) {
        await this.shutdown(ready);
        break;
      }
      const report = await this.tick();
      if (report.state === 'Stopped') break;
      await ready.clock.sleep(report.sleepMs, this.abort.signal);
    }
  }

  /** Requests a graceful stop, observed at the next tick boundary. */
  stop(): void {
    if (!this.stopRequested) {
      this.logger.info('Stop requested');
      this.abort.abort();
    }
  }

  async tick(): Promise<TickReport> {
    const ready = this.requireReady();
    const now = ready.clock.now();
    const report: TickReport = { at: now, state: this.loopState, instructions: 0, submitted: [], failed: 0, sleepMs: 0 };
    if (this.loopState === 'Stopped') return report;

    this.tickCount++;
    this.lastTickAt = now;

    if (isEndOfDay(now, this.endOfDay)) {
      await this.liquidate(ready);
      report.state = this.loopState;
      return report;
    }

    report.sleepMs = this.pollIntervalMs;
    if (!inActionWindow(now, this.actionWindowSeconds)) {
      this.transition('AwaitingWindow', now);
      report.state = this.loopState;
      return report;
    }

    this.transition('Syncing', now);
    const outcome = await ready.coordinator.syncTick(now);
    report.outcome = outcome.kind;
    report.state = this.loopState;

    if (outcome.kind === 'Abort') {
      this.logger.error(`Stale data from ${outcome.staleFeeds.join(', ')}`, { backoffMs: outcome.backoffMs });
      report.sleepMs = outcome.backoffMs + this.pollIntervalMs;
      this.transition('Idle', now);
      return report;
    }
    if (outcome.kind === 'NeedsRetry') {
      this.logger.warn(`Feeds still pending after retries: ${outcome.pendingFeeds.join(', ')}`);
      report.sleepMs = outcome.delayMs;
      this.transition('Idle', now);
      return report;
    }

    this.transition('Deciding', now);
    let instructions: OrderInstruction[];
    try {
      await ready.broker.update();
      instructions = await ready.strategy.decide(ready.coordinator.feedData());
    } catch (error) {
      this.logger.error(`Strategy decision failed: ${describeError(error)}`);
      this.transition('Idle', now);
      report.state = 'Deciding';
      return report;
    }

    this.transition('Submitting', now);
    report.instructions = instructions.length;
    for (const instruction of instructions) {
      this.logger.info('New order instruction', { ...instruction });
      try {
        const orderId = await ready.orders.submit(instruction);
        report.submitted.push(orderId);
        this.submittedOrders++;
      } catch (error) {
        report.failed++;
        this.failedSubmissions++;
        this.logger.error(`Order submission failed for ${instruction.instrument}: ${describeError(error)}`, {
          instrument: instruction.instrument,
          qty: instruction.qty,
        });
      }
    }
    report.state = this.loopState;
    this.transition('Idle', now);
    return report;
  }

  private async liquidate(ready: Ready): Promise<void> {
    this.transition('EndOfDayLiquidation', ready.clock.now());
    const symbols = this.symbols ?? [...new Set(ready.coordinator.feedSymbols)];
    this.logger.info(`End of day: closing positions in ${symbols.join(', ')}`);
    try {
      await ready.orders.closePosition(symbols);
    } catch (error) {
      this.logger.error(`End-of-day liquidation failed: ${describeError(error)}`);
    }
    await this.shutdown(ready);
  }

  private async shutdown(ready: Ready): Promise<void> {
    try {
      await ready.broker.stop();
    } catch (error) {
      this.logger.error(`Broker stop failed: ${describeError(error)}`);
    }
    this.loopState = 'Stopped';
    this.logger.info('Trading loop stopped', { tickCount: this.tickCount });
  }

  private transition(next: LoopState, at: Date): void {
    if (this.loopState === next) return;
    this.logger.logTickPhase(next, { from: this.loopState, at: at.toISOString() });
    this.loopState = next;
  }

  private requireReady(): Ready {
    if (!this.ready) {
      throw new SetupError('Trading loop is not set up; call setup() first.');
    }
    return this.ready;
  }
}
