declare const brand: unique symbol;

/** Nominal wrapper: a `Money` can only come out of `toMoney`. */
export type Brand<T, B extends string> = T & { readonly [brand]: B };

export type Money = Brand<number, 'Money'>; // minor units (cents), non-negative safe integer

export type LineItemId = string | number; // compared with ===

export interface LineItemInput {
  id: LineItemId;
  price: number; // cents, validated into Money on the way in
}

export interface LineItem {
  readonly id: LineItemId;
  readonly price: Money;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface InvalidPriceError {
  error: 'INVALID_PRICE';
  message: string;
  price: number;
}

export interface InvalidLineItemIdError {
  error: 'INVALID_LINE_ITEM_ID';
  message: string;
  id: LineItemId;
}

export interface DuplicateLineItemError {
  error: 'DUPLICATE_LINE_ITEM';
  message: string;
  id: LineItemId;
}

export interface LineItemNotFoundError {
  error: 'LINE_ITEM_NOT_FOUND';
  message: string;
  id: LineItemId;
}

export interface AmountOverflowError {
  error: 'AMOUNT_OVERFLOW';
  message: string;
}

export interface ValidationError {
  error: 'VALIDATION_ERROR';
  message: string;
}

export interface VersionConflict {
  error: 'VERSION_CONFLICT';
  message: string;
  orderId: string;
  expectedVersion: number;
  actualVersion: number;
}

export type OrderError =
  | InvalidPriceError
  | InvalidLineItemIdError
  | DuplicateLineItemError
  | LineItemNotFoundError
  | AmountOverflowError;

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

export interface LineItemSnapshot {
  id: LineItemId;
  price: number; // cents
}

export interface OrderSnapshot {
  items: LineItemSnapshot[];
  amountToBill: number; // cents, sum of item prices
}
