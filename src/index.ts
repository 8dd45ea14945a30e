#!/usr/bin/env node

import dotenv from 'dotenv';

// Load environment variables
dotenv.config({ path: '.env.local' });
dotenv.config(); // fallback to .env

import chalk from 'chalk';
import { Command, Option } from 'commander';

import { runCycle, type CycleReport } from './scanner';
import { createDeltaApiService, type TradingGateway } from './services/delta-api.service';
import { buildLevelsReport, printLevelsReport } from './trade-levels';
import {
  createDefaultConfigFile,
  loadConfig,
  mergeConfigWithCliOptions,
  resolveCredentials,
  type Config,
} from './utils/config';
import { printBanner, printProductMap, printSleep, printWarning } from './utils/output';
import { sleep } from './utils/retry';

export interface ScanOptions {
  config?: string;
  live?: boolean;
  symbols?: string;
  interval?: string;
  once?: boolean;
}

export interface LevelsOptions {
  config?: string;
  entry: number;
  atr: number;
  side: string;
  balance: number;
}

export interface LoopControl {
  once?: boolean;
  wait?: (ms: number) => Promise<void>;
}

/**
 * Run cycles until stopped. A failing cycle is reported and the loop carries on.
 */
export const runScanLoop = async (
  gateway: TradingGateway,
  productMap: Readonly<Record<string, number>>,
  config: Config,
  control: LoopControl = {}
): Promise<CycleReport[]> => {
  const wait = control.wait ?? sleep;
  const reports: CycleReport[] = [];

  for (;;) {
    try {
      reports.push(await runCycle(gateway, productMap, config));
    } catch (error) {
      printWarning(`Exception: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (control.once) {
      return reports;
    }

    printSleep(config.scheduler.intervalMinutes);
    await wait(config.scheduler.intervalMinutes * 60 * 1000);
  }
};

export const startScanner = async (options: ScanOptions): Promise<void> => {
  const config = mergeConfigWithCliOptions(loadConfig(options.config), options);
  const credentials = resolveCredentials(config.exchange);
  const service = createDeltaApiService(config, credentials);

  printBanner(config.trading.live);

  const productMap = await service.getProductsMap(config.trading.watchlist);
  if (Object.keys(productMap).length === 0) {
    throw new Error('No product map for the configured watchlist');
  }
  printProductMap(productMap);

  await runScanLoop(service, productMap, config, { once: options.once });
};

export const showLevels = (options: LevelsOptions): void => {
  const config = loadConfig(options.config);
  const side = options.side === 'short' ? 'short' : 'long';

  if (!(options.entry > 0) || !(options.atr > 0)) {
    throw new Error('Entry price and ATR must be positive numbers');
  }
  if (!(options.balance >= 0)) {
    throw new Error('Balance must be a non-negative number');
  }

  const report = buildLevelsReport(
    options.entry,
    options.atr,
    side,
    options.balance,
    {
      stopMultiplier: config.strategy.atr.stopMultiplier,
      rewardRisk: config.strategy.rewardRisk,
    },
    config.trading
  );
  printLevelsReport(report, config.trading);
};

export const buildProgram = (): Command => {
  const program = new Command();

  program
    .name('trendbreak')
    .description('Multi-timeframe trend + break-of-structure ATR breakout scanner');

  program
    .command('scan', { isDefault: true })
    .description('Scan the watchlist every interval and place bracket orders on signals')
    .option('-c, --config <path>', 'Path to configuration file (default: trendbreak.config.yaml)')
    .option('--live', 'Send orders to the exchange (default: dry run)')
    .option('--symbols <list>', 'Comma-separated watchlist (overrides config)')
    .option('--interval <minutes>', 'Minutes between cycles (overrides config)')
    .option('--once', 'Run a single cycle and exit')
    .action(async (options: ScanOptions) => {
      try {
        await startScanner(options);
      } catch (error) {
        console.error(chalk.red('Error running scanner:'), error);
        process.exit(1);
      }
    });

  program
    .command('levels')
    .description('Print stop, target and position size for a hypothetical entry')
    .requiredOption('--entry <price>', 'Entry price', parseFloat)
    .requiredOption('--atr <value>', 'ATR at entry', parseFloat)
    .requiredOption('--balance <usd>', 'Account balance in USD', parseFloat)
    .addOption(
      new Option('--side <side>', 'Trade direction').choices(['long', 'short']).default('long')
    )
    .option('-c, --config <path>', 'Path to configuration file (default: trendbreak.config.yaml)')
    .action((options: LevelsOptions) => {
      try {
        showLevels(options);
      } catch (error) {
        console.error(chalk.red('Error calculating trade levels:'), error);
        process.exit(1);
      }
    });

  program
    .command('init')
    .description('Write a default trendbreak.config.yaml in the working directory')
    .action(() => {
      if (!createDefaultConfigFile()) {
        console.log(chalk.yellow('Configuration file already exists, leaving it untouched.'));
      }
    });

  return program;
};

export const main = async (argv: string[] = process.argv): Promise<void> => {
  await buildProgram().parseAsync(argv);
};

// Run only if executed directly (not when imported)
const isMainModule = import.meta.url === `file://${process.argv[1]}`;
if (isMainModule) {
  main().catch(error => {
    console.error(chalk.red('Fatal error:'), error);
    process.exit(1);
  });
}
