import {
  agreementGate,
  isNoSignal,
  masterTrendGate,
  synthesizeSignal,
} from './patterns/breakout-signal';
import type { BarSeries, Signal, SignalOutcome, SizingResult } from './patterns/types';
import type {
  DeltaResponse,
  MarketDataSource,
  OrderSide,
  TradingGateway,
} from './services/delta-api.service';
import type { Config, StrategyConfig } from './utils/config';
import {
  formatPrice,
  printBalance,
  printFailure,
  printNoSignal,
  printOrder,
  printOrderResponse,
  printScanning,
  printSignal,
  printWarning,
} from './utils/output';
import { sizePosition } from './utils/position-sizing';
import { buildSeries } from './utils/series-builder';

export interface SymbolEvaluation {
  symbol: string;
  productId: number;
  outcome: SignalOutcome;
}

export interface TradeAttempt {
  symbol: string;
  productId: number;
  signal: Signal;
  sizing: SizingResult;
  entryResponse: DeltaResponse;
  takeProfitResponse?: DeltaResponse;
  stopResponse?: DeltaResponse;
}

export interface CycleReport {
  balance: number;
  aborted: boolean;
  evaluations: SymbolEvaluation[];
  trades: TradeAttempt[];
}

/**
 * Fetch and normalize one series. Failed or empty fetches are unavailable (null).
 */
export const loadSeries = async (
  source: MarketDataSource,
  symbol: string,
  timeframe: string,
  candles: number
): Promise<BarSeries | null> => {
  const raw = await source.fetchCandles(symbol, timeframe, candles);
  if (!raw || raw.length === 0) return null;
  return buildSeries(raw);
};

/**
 * Evaluate one symbol, fetching each series only once the previous gate has passed.
 * Produces the same outcome as `evaluateSignal` over fully fetched data.
 */
export const fetchSignal = async (
  source: MarketDataSource,
  symbol: string,
  strategy: StrategyConfig
): Promise<SignalOutcome> => {
  const macro = await loadSeries(source, symbol, strategy.macro.timeframe, strategy.macro.candles);
  const master = masterTrendGate(macro, strategy);
  if (isNoSignal(master)) return master;

  const entrySeries = await Promise.all(
    strategy.entry.timeframes.map(timeframe =>
      loadSeries(source, symbol, timeframe, strategy.entry.candles)
    )
  );
  const entry: Record<string, BarSeries | null> = {};
  strategy.entry.timeframes.forEach((timeframe, i) => {
    entry[timeframe] = entrySeries[i];
  });

  const agreement = agreementGate(master, entry, strategy);
  if (isNoSignal(agreement)) return agreement;

  const fine = await loadSeries(source, symbol, strategy.fine.timeframe, strategy.fine.candles);
  return synthesizeSignal(symbol, master, agreement, fine, strategy);
};

const entrySide = (signal: Signal): OrderSide => (signal.side === 'long' ? 'buy' : 'sell');

const reduceSide = (side: OrderSide): OrderSide => (side === 'buy' ? 'sell' : 'buy');

/**
 * Size a signal and submit entry, take-profit and stop orders.
 *
 * @returns The attempt, or undefined when the trade was skipped before any order was sent
 */
export const executeSignal = async (
  gateway: TradingGateway,
  productId: number,
  signal: Signal,
  balance: number,
  config: Config
): Promise<TradeAttempt | undefined> => {
  if (await gateway.hasOpenPosition(productId)) {
    printWarning(`Existing position for product ${productId}, skipping`);
    return undefined;
  }

  const sizing = sizePosition(signal, balance, config.trading);
  if (sizing.quantity <= 0) {
    printFailure('Qty=0, skipping');
    return undefined;
  }
  if (!(sizing.target > 0)) {
    printFailure(`Target ${formatPrice(sizing.target)} is not a valid price, skipping`);
    return undefined;
  }

  const side = entrySide(signal);
  printOrder({
    productId,
    side,
    quantity: sizing.quantity,
    entry: signal.entry,
    stop: signal.stop,
    target: sizing.target,
    live: config.trading.live,
  });

  const entryResponse = await gateway.placeMarketOrder(productId, side, sizing.quantity);
  printOrderResponse('Entry resp', entryResponse);

  const attempt: TradeAttempt = { symbol: signal.symbol, productId, signal, sizing, entryResponse };
  if (!entryResponse.success) {
    printFailure(`Entry failed for ${signal.symbol}`);
    return attempt;
  }

  const exitSide = reduceSide(side);
  attempt.takeProfitResponse = await gateway.placeLimitReduceOrder(
    productId,
    exitSide,
    sizing.quantity,
    sizing.target
  );
  attempt.stopResponse = await gateway.placeStopMarketOrder(
    productId,
    exitSide,
    sizing.quantity,
    signal.stop
  );
  printOrderResponse('TP resp', attempt.takeProfitResponse);
  printOrderResponse('SL resp', attempt.stopResponse);

  return attempt;
};

/**
 * One evaluation cycle over the watchlist.
 *
 * Selection policy: symbols are decided in configured watchlist order and the
 * cycle ends after `maxTradesPerCycle` entry attempts. Evaluation may run
 * `maxConcurrentSymbols` symbols at a time without changing which symbol wins.
 */
export const runCycle = async (
  gateway: TradingGateway,
  productMap: Readonly<Record<string, number>>,
  config: Config
): Promise<CycleReport> => {
  const { trading, strategy } = config;
  const balance = await gateway.getBalanceUsd();
  printBalance(balance);

  const report: CycleReport = { balance, aborted: false, evaluations: [], trades: [] };
  if (balance < trading.minBalanceUsd) {
    printFailure('Balance too low.');
    return { ...report, aborted: true };
  }

  const candidates = trading.watchlist
    .map(symbol => symbol.toUpperCase())
    .flatMap(symbol => {
      const productId = productMap[symbol];
      return productId === undefined ? [] : [{ symbol, productId }];
    });

  for (
    let i = 0;
    i < candidates.length && report.trades.length < trading.maxTradesPerCycle;
    i += trading.maxConcurrentSymbols
  ) {
    const batch = candidates.slice(i, i + trading.maxConcurrentSymbols);
    batch.forEach(({ symbol }) => printScanning(symbol));
    const outcomes = await Promise.all(
      batch.map(({ symbol }) => fetchSignal(gateway, symbol, strategy))
    );

    for (let j = 0; j < batch.length; j++) {
      if (report.trades.length >= trading.maxTradesPerCycle) break;

      const { symbol, productId } = batch[j];
      const outcome = outcomes[j];
      report.evaluations.push({ symbol, productId, outcome });

      if (outcome.kind === 'none') {
        printNoSignal(symbol, outcome);
        continue;
      }

      printSignal(outcome.signal);
      const attempt = await executeSignal(gateway, productId, outcome.signal, balance, config);
      if (attempt) {
        report.trades.push(attempt);
      }
    }
  }

  return report;
};
