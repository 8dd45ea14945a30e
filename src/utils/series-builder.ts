import type { BarSeries } from '../patterns/types';

interface ParsedBar {
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Accepts finite numbers and numeric strings (the exchange sends both).
 */
export const toNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

// Absent volume is 0; a present but non-numeric volume rejects the record.
const toVolume = (value: unknown): number | undefined => {
  if (value === undefined || value === null) return 0;
  return toNumber(value);
};

const parseBar = (raw: unknown): ParsedBar | undefined => {
  let fields: unknown[];
  let volume: unknown;

  if (Array.isArray(raw)) {
    fields = [raw[1], raw[2], raw[3], raw[4]];
    volume = raw.length > 5 ? raw[5] : undefined;
  } else if (typeof raw === 'object' && raw !== null) {
    const record = Object.fromEntries(Object.entries(raw));
    fields = [record.open, record.high, record.low, record.close];
    volume = record.volume;
  } else {
    return undefined;
  }

  const [open, high, low, close] = fields.map(toNumber);
  const vol = toVolume(volume);
  if (
    open === undefined ||
    high === undefined ||
    low === undefined ||
    close === undefined ||
    vol === undefined
  ) {
    return undefined;
  }
  if (Math.min(open, high, low, close, vol) < 0 || high < low) {
    return undefined;
  }

  return { open, high, low, close, volume: vol };
};

/**
 * Normalize raw candle records, positional `[timestamp, open, high, low, close, volume?]`
 * or field-named, into aligned OHLCV sequences. Records that fail to parse, carry a
 * negative field or have `high < low` are skipped one by one; the rest keep their order.
 */
export const buildSeries = (rawBars: readonly unknown[]): BarSeries => {
  const open: number[] = [];
  const high: number[] = [];
  const low: number[] = [];
  const close: number[] = [];
  const volume: number[] = [];

  for (const raw of rawBars) {
    const bar = parseBar(raw);
    if (!bar) continue;
    open.push(bar.open);
    high.push(bar.high);
    low.push(bar.low);
    close.push(bar.close);
    volume.push(bar.volume);
  }

  return { open, high, low, close, volume };
};
