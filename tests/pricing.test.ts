import { isMoney, sumPrices, toMoney, ZERO } from '../src/pricing';
import type { LineItem } from '../src/types';
import { unwrap, unwrapError } from './helpers';

function item(id: string, cents: number): LineItem {
  return { id, price: unwrap(toMoney(cents)) };
}

// ---------------------------------------------------------------------------
// toMoney / isMoney
// ---------------------------------------------------------------------------

test('non-negative integer cents are money', () => {
  expect(unwrap(toMoney(0))).toBe(0);
  expect(unwrap(toMoney(1999))).toBe(1999);
  expect(isMoney(Number.MAX_SAFE_INTEGER)).toBe(true);
  expect(ZERO).toBe(0);
});

test.each([
  ['negative', -1],
  ['fractional', 19.99],
  ['NaN', Number.NaN],
  ['infinite', Number.POSITIVE_INFINITY],
  ['unsafe', Number.MAX_SAFE_INTEGER + 1],
])('%s amount → INVALID_PRICE', (_label, value) => {
  const error = unwrapError(toMoney(value));

  expect(error.error).toBe('INVALID_PRICE');
  expect(error.price).toBe(value);
});

test('INVALID_PRICE message names the rejected value', () => {
  expect(unwrapError(toMoney(-250)).message).toBe(
    'Price must be a non-negative integer amount of cents, got -250',
  );
});

// ---------------------------------------------------------------------------
// sumPrices
// ---------------------------------------------------------------------------

test('sum of no items is zero', () => {
  expect(unwrap(sumPrices([]))).toBe(0);
});

test('sums every item price', () => {
  // 2000 + 1500 + 499 = 3999
  expect(unwrap(sumPrices([item('a', 2000), item('b', 1500), item('c', 499)]))).toBe(3999);
});

test('sum past the safe-integer range → AMOUNT_OVERFLOW', () => {
  const error = unwrapError(sumPrices([item('a', Number.MAX_SAFE_INTEGER), item('b', 2)]));

  expect(error.error).toBe('AMOUNT_OVERFLOW');
});
