import type { Side, Signal, SizingResult } from '../patterns/types';

import type { SizingConfig } from './config';

/**
 * Floor a quantity to the lot step. Steps that are whole fractions (1e-5, 0.01, 0.5)
 * are scaled by their inverse so that e.g. 0.7 stays 0.7 rather than 0.69999.
 */
export const floorToStep = (quantity: number, step: number): number => {
  if (!(step > 0) || !(quantity > 0)) return 0;
  const inverse = Math.round(1 / step);
  if (inverse >= 1 && Math.abs(1 / step - inverse) < 1e-9) {
    return Math.floor(quantity * inverse) / inverse;
  }
  return Math.floor(quantity / step) * step;
};

/**
 * Largest notional the account may carry: balance x leverage x buffer.
 */
export const maxNotional = (balance: number, config: SizingConfig): number =>
  Math.max(0, balance) * config.leverage * config.maxNotionalBuffer;

/**
 * Fixed-dollar-risk quantity. Leverage only caps the notional; it never grows the size.
 * A zero stop distance or a non-finite balance rejects the trade with quantity 0.
 * Flooring may leave the notional one rounding unit above the cap.
 */
export const computeQuantity = (
  entry: number,
  stop: number,
  balance: number,
  config: SizingConfig
): number => {
  const distance = Math.abs(entry - stop);
  if (!(distance > 0) || !(entry > 0)) return 0;

  let quantity = config.riskUsd / distance;

  const cap = maxNotional(balance, config);
  if (!(quantity * entry <= cap)) {
    quantity = cap / entry;
  }

  return Math.max(0, floorToStep(quantity, config.quantityStep));
};

/**
 * Widen the target until the projected profit reaches the minimum dollar floor.
 * Targets already at or above the floor, and rejected (zero) quantities, pass through.
 * A widened short target may land at or below zero; callers must not place it.
 */
export const ensureMinTarget = (
  entry: number,
  target: number,
  quantity: number,
  side: Side,
  minTakeProfitUsd: number
): number => {
  if (quantity <= 0) return target;

  const projected = Math.abs(target - entry) * quantity;
  if (projected >= minTakeProfitUsd) return target;

  const needed = minTakeProfitUsd / quantity;
  return side === 'long' ? entry + needed : entry - needed;
};

export const sizePosition = (
  signal: Pick<Signal, 'entry' | 'stop' | 'target' | 'side'>,
  balance: number,
  config: SizingConfig
): SizingResult => {
  const quantity = computeQuantity(signal.entry, signal.stop, balance, config);
  const target = ensureMinTarget(
    signal.entry,
    signal.target,
    quantity,
    signal.side,
    config.minTakeProfitUsd
  );
  return { quantity, target };
};
