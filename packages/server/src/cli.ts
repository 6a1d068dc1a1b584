#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError, Option } from 'commander';
import { describeError, isTradingError } from './core/errors.js';
import { parseInterval } from './core/interval.js';
import { loadConfig, type BrokerKind, type DataSourceKind, type TraderConfig } from './config.js';
import { startTrader } from './index.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('cli');

export interface RunOptions {
  quote?: string;
  hedge?: string;
  broker?: BrokerKind;
  dataSource?: DataSourceKind;
  interval?: string;
  pollMs?: number;
  api: boolean;
}

function parsePollMs(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

function parseIntervalOption(value: string): string {
  try {
    parseInterval(value);
  } catch (error) {
    throw new InvalidArgumentError(describeError(error));
  }
  return value;
}

export function applyRunOptions(config: TraderConfig, options: RunOptions): TraderConfig {
  return {
    ...config,
    quoteSymbol: options.quote?.toUpperCase() ?? config.quoteSymbol,
    hedgeSymbol: options.hedge?.toUpperCase() ?? config.hedgeSymbol,
    broker: options.broker ?? config.broker,
    dataSource: options.dataSource ?? config.dataSource,
    interval: options.interval ?? config.interval,
    pollIntervalMs: options.pollMs ?? config.pollIntervalMs,
    api: { ...config.api, enabled: config.api.enabled && options.api },
  };
}

async function run(options: RunOptions): Promise<void> {
  const config = applyRunOptions(loadConfig(), options);
  logger.info(`Starting intraday trader on ${config.quoteSymbol}/${config.hedgeSymbol}`, {
    broker: config.broker,
    dataSource: config.dataSource,
    interval: config.interval,
  });

  const trader = await startTrader(config);
  const stop = () => trader.controller.stop();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  await trader.done;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('intraday-trader')
    .description('Automated intraday trading loop')
    .version('0.1.0');

  program
    .command('run')
    .description('Run the trading loop until end of day or a stop request')
    .option('-q, --quote <symbol>', 'Quote ticker')
    .option('-H, --hedge <symbol>', 'Hedge ticker')
    .addOption(new Option('-b, --broker <kind>', 'Broker to trade through').choices(['sim', 'alpaca']))
    .addOption(new Option('-d, --data-source <kind>', 'Historical bar source').choices(['alpaca', 'polygon']))
    .option('-i, --interval <interval>', 'Bar interval such as 1m or 5m', parseIntervalOption)
    .option('-p, --poll-ms <ms>', 'Sleep between ticks in milliseconds', parsePollMs)
    .option('--no-api', 'Do not start the status API')
    .action(async (options: RunOptions) => {
      await run(options);
    });

  return program;
}

if (require.main === module) {
  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled rejection: ${describeError(reason)}`);
  });

  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught exception: ${describeError(error)}`);
    process.exit(1);
  });

  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logger.error(`Fatal: ${describeError(error)}`, { code: isTradingError(error) ? error.code : undefined });
      process.exit(1);
    });
}
