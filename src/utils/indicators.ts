import type { IndicatorPoint, IndicatorSeries } from '../patterns/types';

const WARMUP: IndicatorPoint = { defined: false };

const point = (value: number): IndicatorPoint => ({ defined: true, value });

/**
 * Exponential moving average, aligned index-for-index with `values`.
 *
 * The first `period - 1` points are warm-up, the `period`-th point is seeded with
 * the simple average of the first `period` values, and every later point follows
 * `prev + (value - prev) * k` with `k = 2 / (period + 1)`.
 *
 * @returns An empty series when there are fewer than `period` values.
 */
export const ema = (values: readonly number[], period: number): IndicatorSeries => {
  if (!Number.isInteger(period) || period < 1 || values.length < period) {
    return [];
  }

  const k = 2 / (period + 1);
  const out: IndicatorPoint[] = Array.from({ length: period - 1 }, () => WARMUP);

  let prev = values.slice(0, period).reduce((sum, v) => sum + v, 0) / period;
  out.push(point(prev));

  for (let i = period; i < values.length; i++) {
    prev = (values[i] - prev) * k + prev;
    out.push(point(prev));
  }

  return out;
};

/**
 * True Range per bar: `high - low` for the first bar, then the largest of
 * `high - low`, `|high - prevClose|` and `|low - prevClose|`.
 */
export const trueRange = (
  high: readonly number[],
  low: readonly number[],
  close: readonly number[]
): number[] => {
  const length = Math.min(high.length, low.length, close.length);
  const out: number[] = [];

  for (let i = 0; i < length; i++) {
    const highLow = high[i] - low[i];
    if (i === 0) {
      out.push(highLow);
      continue;
    }
    const prevClose = close[i - 1];
    out.push(Math.max(highLow, Math.abs(high[i] - prevClose), Math.abs(low[i] - prevClose)));
  }

  return out;
};

/**
 * Average True Range: the EMA of the True Range series.
 */
export const atr = (
  high: readonly number[],
  low: readonly number[],
  close: readonly number[],
  period: number
): IndicatorSeries => ema(trueRange(high, low, close), period);

/**
 * Value of the most recent point, or undefined when the series is empty or still warming up.
 */
export const latestValue = (series: IndicatorSeries): number | undefined => {
  if (series.length === 0) return undefined;
  const last = series[series.length - 1];
  if (!last.defined) return undefined;
  return last.value;
};
