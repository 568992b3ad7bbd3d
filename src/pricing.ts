import type { AmountOverflowError, InvalidPriceError, LineItem, Money, Result } from './types';

export function isMoney(value: number): value is Money {
  return Number.isSafeInteger(value) && value >= 0;
}

export function toMoney(value: number): Result<Money, InvalidPriceError> {
  if (!isMoney(value)) {
    return {
      ok: false,
      error: {
        error: 'INVALID_PRICE',
        message: `Price must be a non-negative integer amount of cents, got ${value}`,
        price: value,
      },
    };
  }
  return { ok: true, value };
}

/**
 * Exact sum of the item prices, in iteration order. Fails rather than lose
 * precision once the running total leaves the safe-integer range.
 */
export function sumPrices(items: readonly LineItem[]): Result<Money, AmountOverflowError> {
  let total: number = 0;
  for (const item of items) {
    total += item.price;
  }

  if (!isMoney(total)) {
    return {
      ok: false,
      error: { error: 'AMOUNT_OVERFLOW', message: 'Order total exceeds the largest exact amount' },
    };
  }
  return { ok: true, value: total };
}

export const ZERO = 0 as Money;
