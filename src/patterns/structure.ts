import type { BarSeries, SwingWindow } from './types';

export interface StructureConfig {
  swingLookback: number;
  bodyRatio: number;
  minBars: number;
}

export const DEFAULT_STRUCTURE_CONFIG: StructureConfig = {
  swingLookback: 20,
  bodyRatio: 0.6,
  minBars: 25,
};

// Floor for the candle range so zero-range bars do not divide by zero
const RANGE_EPSILON = 1e-9;

/**
 * Highest high and lowest low over the trailing `lookback` bars.
 * Undefined when fewer than `lookback` bars are available.
 */
export const swingWindow = (
  highs: readonly number[],
  lows: readonly number[],
  lookback: number
): SwingWindow | undefined => {
  if (lookback < 1 || highs.length < lookback || lows.length < lookback) {
    return undefined;
  }
  return {
    high: Math.max(...highs.slice(-lookback)),
    low: Math.min(...lows.slice(-lookback)),
  };
};

/**
 * Swing window over the `lookback` bars that precede the last closed bar.
 * The last bar is the one being tested against the structure, so it never
 * contributes to it.
 */
export const priorSwingWindow = (series: BarSeries, lookback: number): SwingWindow | undefined =>
  swingWindow(series.high.slice(0, -1), series.low.slice(0, -1), lookback);

/**
 * Body of the last candle as a fraction of its range.
 */
export const lastBodyRatio = (series: BarSeries): number | undefined => {
  const i = series.close.length - 1;
  if (i < 0) return undefined;
  const range = Math.max(RANGE_EPSILON, series.high[i] - series.low[i]);
  const body = Math.abs(series.close[i] - series.open[i]);
  return body / range;
};

const strongClose = (series: BarSeries, config: StructureConfig): boolean => {
  const ratio = lastBodyRatio(series);
  return ratio !== undefined && ratio >= config.bodyRatio;
};

/**
 * Bullish break of structure on the just-closed bar: the close clears the
 * prior swing high with a strong body.
 */
export const bullishBos = (
  series: BarSeries,
  config: StructureConfig = DEFAULT_STRUCTURE_CONFIG
): boolean => {
  if (series.close.length < config.minBars) return false;
  const swing = priorSwingWindow(series, config.swingLookback);
  if (!swing) return false;
  const lastClose = series.close[series.close.length - 1];
  return lastClose > swing.high && strongClose(series, config);
};

/**
 * Bearish break of structure: mirror of {@link bullishBos} against the prior swing low.
 */
export const bearishBos = (
  series: BarSeries,
  config: StructureConfig = DEFAULT_STRUCTURE_CONFIG
): boolean => {
  if (series.close.length < config.minBars) return false;
  const swing = priorSwingWindow(series, config.swingLookback);
  if (!swing) return false;
  const lastClose = series.close[series.close.length - 1];
  return lastClose < swing.low && strongClose(series, config);
};
