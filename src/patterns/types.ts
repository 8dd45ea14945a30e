/**
 * Parallel OHLCV sequences for one symbol and timeframe, oldest bar first.
 */
export interface BarSeries {
  readonly open: readonly number[];
  readonly high: readonly number[];
  readonly low: readonly number[];
  readonly close: readonly number[];
  readonly volume: readonly number[];
}

/**
 * One point of an indicator series. Warm-up points carry no value.
 */
export type IndicatorPoint =
  | { readonly defined: true; readonly value: number }
  | { readonly defined: false };

export type IndicatorSeries = readonly IndicatorPoint[];

export type Trend = 'bull' | 'bear';

export type Side = 'long' | 'short';

export interface SwingWindow {
  high: number;
  low: number;
}

export interface Signal {
  readonly symbol: string;
  readonly side: Side;
  readonly entry: number;
  readonly stop: number;
  readonly target: number;
  readonly atr: number;
  readonly agreement: number;
  readonly directions: Readonly<Record<string, Trend | undefined>>;
  readonly masterTrend: Trend;
  readonly swingHigh: number;
  readonly swingLow: number;
}

export interface SizingResult {
  readonly quantity: number;
  readonly target: number;
}

export type NoSignalReason =
  | 'data-unavailable'
  | 'insufficient-history'
  | 'undefined-trend'
  | 'insufficient-agreement'
  | 'no-breakout'
  | 'no-bos';

export type SignalOutcome =
  | { readonly kind: 'signal'; readonly signal: Signal }
  | { readonly kind: 'none'; readonly reason: NoSignalReason; readonly detail?: string };
