import { calculateTradeLevels } from '../trade-levels';
import type { StrategyConfig } from '../utils/config';
import { atr, latestValue } from '../utils/indicators';

import { bearishBos, bullishBos, priorSwingWindow } from './structure';
import {
  assessMasterTrend,
  evaluateAgreement,
  timeframeDirection,
  type AgreementResult,
} from './trend-agreement';
import type { BarSeries, NoSignalReason, Side, SignalOutcome, Trend } from './types';

export type NoSignal = Extract<SignalOutcome, { kind: 'none' }>;

/**
 * Series needed for one evaluation. `null` marks data the transport could not deliver.
 */
export interface MarketData {
  macro: BarSeries | null;
  entry: Readonly<Record<string, BarSeries | null>>;
  fine: BarSeries | null;
}

export const noSignal = (reason: NoSignalReason, detail?: string): NoSignal => ({
  kind: 'none',
  reason,
  detail,
});

export const isNoSignal = (value: unknown): value is NoSignal =>
  typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'none';

/**
 * Gate 1: master trend from the macro EMA filter.
 */
export const masterTrendGate = (
  macro: BarSeries | null,
  strategy: StrategyConfig
): Trend | NoSignal => {
  if (!macro) {
    return noSignal('data-unavailable', `${strategy.macro.timeframe} candles`);
  }
  const result = assessMasterTrend(macro, strategy.macro.emaPeriod);
  if (result.trend === undefined) {
    return noSignal(result.reason, `${strategy.macro.timeframe} EMA${strategy.macro.emaPeriod}`);
  }
  return result.trend;
};

/**
 * Gate 2: enough entry timeframes must agree with the master trend.
 * Missing series count as non-agreeing.
 */
export const agreementGate = (
  master: Trend,
  entrySeries: Readonly<Record<string, BarSeries | null>>,
  strategy: StrategyConfig
): AgreementResult | NoSignal => {
  const directions: Record<string, Trend | undefined> = {};
  for (const timeframe of strategy.entry.timeframes) {
    const series = entrySeries[timeframe];
    directions[timeframe] = series
      ? timeframeDirection(series, strategy.entry.fastEma, strategy.entry.slowEma)
      : undefined;
  }

  const result = evaluateAgreement(master, directions, strategy.entry.minAgreement);
  if (!result.passed) {
    return noSignal(
      'insufficient-agreement',
      `${result.agreement}/${strategy.entry.minAgreement} timeframes agree`
    );
  }
  return result;
};

/**
 * Gate 3: ATR breakout beyond the prior swing extreme, confirmed by a break of
 * structure on the same fine series, on the side of the master trend only.
 */
export const synthesizeSignal = (
  symbol: string,
  master: Trend,
  agreement: AgreementResult,
  fine: BarSeries | null,
  strategy: StrategyConfig
): SignalOutcome => {
  if (!fine) {
    return noSignal('data-unavailable', `${strategy.fine.timeframe} candles`);
  }
  if (fine.close.length < strategy.fine.minBars) {
    return noSignal(
      'insufficient-history',
      `${fine.close.length}/${strategy.fine.minBars} ${strategy.fine.timeframe} bars`
    );
  }

  const atrValue = latestValue(atr(fine.high, fine.low, fine.close, strategy.atr.length));
  if (atrValue === undefined) {
    return noSignal('insufficient-history', `ATR${strategy.atr.length}`);
  }

  const swing = priorSwingWindow(fine, strategy.structure.swingLookback);
  if (!swing) {
    return noSignal('insufficient-history', `swing window of ${strategy.structure.swingLookback}`);
  }

  const entry = fine.close[fine.close.length - 1];
  const margin = strategy.atr.entryMultiplier * atrValue;
  const side: Side = master === 'bull' ? 'long' : 'short';

  const breakout = side === 'long' ? entry > swing.high + margin : entry < swing.low - margin;
  if (!breakout) {
    return noSignal('no-breakout');
  }

  const bos =
    side === 'long' ? bullishBos(fine, strategy.structure) : bearishBos(fine, strategy.structure);
  if (!bos) {
    return noSignal('no-bos');
  }

  const { stop, target } = calculateTradeLevels(entry, atrValue, side, {
    stopMultiplier: strategy.atr.stopMultiplier,
    rewardRisk: strategy.rewardRisk,
  });

  return {
    kind: 'signal',
    signal: {
      symbol,
      side,
      entry,
      stop,
      target,
      atr: atrValue,
      agreement: agreement.agreement,
      directions: { ...agreement.directions },
      masterTrend: master,
      swingHigh: swing.high,
      swingLow: swing.low,
    },
  };
};

/**
 * Run every gate over already-fetched data.
 */
export const evaluateSignal = (
  symbol: string,
  data: MarketData,
  strategy: StrategyConfig
): SignalOutcome => {
  const master = masterTrendGate(data.macro, strategy);
  if (isNoSignal(master)) return master;

  const agreement = agreementGate(master, data.entry, strategy);
  if (isNoSignal(agreement)) return agreement;

  return synthesizeSignal(symbol, master, agreement, data.fine, strategy);
};

export const detectSignal = (symbol: string, data: MarketData, strategy: StrategyConfig) => {
  const outcome = evaluateSignal(symbol, data, strategy);
  return outcome.kind === 'signal' ? outcome.signal : null;
};
