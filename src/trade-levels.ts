import chalk from 'chalk';

import type { Side, SizingResult } from './patterns/types';
import type { SizingConfig } from './utils/config';
import { formatPrice, formatQuantity, formatDollar } from './utils/output';
import { sizePosition } from './utils/position-sizing';

export interface TradeLevelOptions {
  stopMultiplier: number;
  rewardRisk: number;
}

export interface TradeLevels {
  stop: number;
  target: number;
}

/**
 * Stop one ATR multiple away from entry, target at the reward:risk multiple of that distance
 */
export const calculateTradeLevels = (
  entry: number,
  atr: number,
  side: Side,
  options: TradeLevelOptions
): TradeLevels => {
  const stop =
    side === 'long' ? entry - options.stopMultiplier * atr : entry + options.stopMultiplier * atr;
  const risk = Math.abs(entry - stop);
  const target =
    side === 'long' ? entry + options.rewardRisk * risk : entry - options.rewardRisk * risk;
  return { stop, target };
};

export interface LevelsReport extends TradeLevels {
  entry: number;
  side: Side;
  sizing: SizingResult;
}

/**
 * Levels and sizing for a hypothetical entry, as the scanner would place it
 */
export const buildLevelsReport = (
  entry: number,
  atr: number,
  side: Side,
  balance: number,
  options: TradeLevelOptions,
  sizing: SizingConfig
): LevelsReport => {
  const levels = calculateTradeLevels(entry, atr, side, options);
  return {
    entry,
    side,
    ...levels,
    sizing: sizePosition({ entry, side, ...levels }, balance, sizing),
  };
};

export const printLevelsReport = (report: LevelsReport, sizing: SizingConfig): void => {
  const stopText = report.side === 'long' ? 'below entry' : 'above entry';
  const title = `Trade Levels for ${report.side.toUpperCase()} at ${formatPrice(report.entry)}`;
  console.log('\n' + chalk.bold.underline(title) + '\n');
  console.log(chalk.cyan('Stop Loss:') + ` ${formatPrice(report.stop)} (${stopText})`);
  console.log(chalk.cyan('Profit Target:') + ` ${formatPrice(report.target)}`);

  if (report.sizing.quantity <= 0) {
    console.log(chalk.red('Quantity: 0 (trade rejected)'));
    return;
  }

  console.log(
    chalk.cyan('Quantity:') +
      ` ${formatQuantity(report.sizing.quantity)} (risk ${formatDollar(sizing.riskUsd)})`
  );
  if (report.sizing.target !== report.target) {
    console.log(
      chalk.yellow(
        `Target widened to ${formatPrice(report.sizing.target)} to reach ${formatDollar(sizing.minTakeProfitUsd)} minimum profit`
      )
    );
  }
};
