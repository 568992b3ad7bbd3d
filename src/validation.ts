import type { LineItemId, LineItemInput, Result, ValidationError } from './types';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function validationError(message: string): { ok: false; error: ValidationError } {
  return { ok: false, error: { error: 'VALIDATION_ERROR', message } };
}

export function isLineItemId(value: unknown): value is LineItemId {
  return (typeof value === 'string' && value !== '') || Number.isSafeInteger(value);
}

// ---------------------------------------------------------------------------
// Line items
// ---------------------------------------------------------------------------

/**
 * Shape check for a line item coming from outside the process. Only the shape
 * is checked here; the price sign is left to the aggregate so that a negative
 * price still surfaces as INVALID_PRICE.
 */
export function parseLineItem(input: unknown): Result<LineItemInput, ValidationError> {
  if (!isRecord(input)) {
    return validationError('Line item must be an object');
  }

  const id = input['id'];
  if (!isLineItemId(id)) {
    return validationError('Line item id must be a non-empty string or an integer');
  }

  const price = input['price'];
  if (typeof price !== 'number' || !Number.isInteger(price)) {
    return validationError('price must be an integer (cents)');
  }

  return { ok: true, value: { id, price } };
}
