import { ema, latestValue } from '../utils/indicators';

import type { BarSeries, Trend } from './types';

export type MasterTrendResult =
  | { trend: Trend; close: number; ema: number }
  | { trend: undefined; reason: 'insufficient-history' | 'undefined-trend' };

export interface AgreementResult {
  agreement: number;
  directions: Record<string, Trend | undefined>;
  passed: boolean;
}

const compare = (a: number, b: number): Trend | undefined => {
  if (a > b) return 'bull';
  if (a < b) return 'bear';
  return undefined;
};

/**
 * Long-horizon trend filter: latest close against the `period` EMA of closes.
 * A close exactly on the EMA, or an EMA still in warm-up, has no trend.
 */
export const assessMasterTrend = (series: BarSeries, period: number): MasterTrendResult => {
  const value = latestValue(ema(series.close, period));
  if (value === undefined) {
    return { trend: undefined, reason: 'insufficient-history' };
  }

  const close = series.close[series.close.length - 1];
  const trend = compare(close, value);
  if (!trend) {
    return { trend: undefined, reason: 'undefined-trend' };
  }
  return { trend, close, ema: value };
};

/**
 * Direction of one entry timeframe from its fast/slow EMA cross.
 * Undefined while either EMA warms up, or when the two are equal.
 */
export const timeframeDirection = (
  series: BarSeries,
  fastPeriod: number,
  slowPeriod: number
): Trend | undefined => {
  const fast = latestValue(ema(series.close, fastPeriod));
  const slow = latestValue(ema(series.close, slowPeriod));
  if (fast === undefined || slow === undefined) return undefined;
  return compare(fast, slow);
};

/**
 * Number of timeframes whose direction matches the master trend.
 */
export const tallyAgreement = (
  master: Trend,
  directions: Readonly<Record<string, Trend | undefined>>
): number => Object.values(directions).filter(direction => direction === master).length;

export const evaluateAgreement = (
  master: Trend,
  directions: Record<string, Trend | undefined>,
  minAgreement: number
): AgreementResult => {
  const agreement = tallyAgreement(master, directions);
  return { agreement, directions, passed: agreement >= minAgreement };
};
