import chalk from 'chalk';

import type { NoSignal } from '../patterns/breakout-signal';
import type { NoSignalReason, Signal } from '../patterns/types';

export const formatDollar = (value: number): string => {
  return `$${value.toFixed(2)}`;
};

export const formatPrice = (value: number): string => {
  return value.toFixed(4);
};

export const formatQuantity = (value: number): string => {
  return String(value);
};

const REASON_TEXT: Record<NoSignalReason, string> = {
  'data-unavailable': 'data unavailable',
  'insufficient-history': 'insufficient history',
  'undefined-trend': 'master trend flat',
  'insufficient-agreement': 'timeframe agreement insufficient',
  'no-breakout': 'no ATR breakout',
  'no-bos': 'no break of structure',
};

export const describeNoSignal = (outcome: NoSignal): string => {
  const text = REASON_TEXT[outcome.reason];
  return outcome.detail ? `${text}: ${outcome.detail}` : text;
};

export const printBanner = (live: boolean) => {
  console.log(
    chalk.bold(
      live
        ? '🚀 Multi-TF + Price Action ATR Bot (LIVE)'
        : '🚀 Multi-TF + Price Action ATR Bot (DRY RUN)'
    )
  );
};

export const printProductMap = (productMap: Record<string, number>) => {
  const entries = Object.entries(productMap).map(([symbol, id]) => `${symbol}=${id}`);
  console.log(chalk.dim(`🔗 Product map: ${entries.join(', ')}`));
};

export const printBalance = (balance: number) => {
  console.log(chalk.bold(`💼 Balance: $${balance.toFixed(4)}`));
};

export const printScanning = (symbol: string) => {
  console.log(chalk.dim(`🔎 Scanning ${symbol}…`));
};

export const printNoSignal = (symbol: string, outcome: NoSignal) => {
  console.log(chalk.dim(`⏭ No signal on ${symbol} (${describeNoSignal(outcome)})`));
};

export const printSignal = (signal: Signal) => {
  const directions = Object.entries(signal.directions)
    .map(([timeframe, direction]) => `${timeframe}:${direction ?? '-'}`)
    .join(' ');
  console.log(
    chalk.green.bold(`🔔 Signal ${signal.symbol} ${signal.side.toUpperCase()}`) +
      ` entry=${formatPrice(signal.entry)} stop=${formatPrice(signal.stop)} target=${formatPrice(signal.target)}` +
      ` atr=${formatPrice(signal.atr)} master=${signal.masterTrend} agree=${signal.agreement} [${directions}]`
  );
};

export const printWarning = (message: string) => {
  console.log(chalk.yellow(`⚠️  ${message}`));
};

export const printFailure = (message: string) => {
  console.log(chalk.red(`❌ ${message}`));
};

export interface OrderLine {
  productId: number;
  side: 'buy' | 'sell';
  quantity: number;
  entry: number;
  stop: number;
  target: number;
  live: boolean;
}

export const printOrder = (order: OrderLine) => {
  console.log(
    chalk.cyan(
      `🧾 Order -> pid=${order.productId} side=${order.side} qty=${formatQuantity(order.quantity)}` +
        ` entry≈${formatPrice(order.entry)} SL=${formatPrice(order.stop)} TP=${formatPrice(order.target)}` +
        `  | LIVE=${order.live}`
    )
  );
};

export const printOrderResponse = (label: string, response: unknown) => {
  console.log(chalk.dim(`${label}: ${JSON.stringify(response)}`));
};

export const printSleep = (minutes: number) => {
  console.log(chalk.dim(`⏳ Sleeping ${minutes}m…`));
};
