import type { OrderError, OrderSnapshot, Result, ValidationError } from './types';
import { addLineItem, empty, totalAmount, type Order } from './order';
import { isRecord, parseLineItem, validationError } from './validation';

export function toSnapshot(order: Order): OrderSnapshot {
  return {
    items: order.lineItems.map(item => ({ id: item.id, price: item.price })),
    amountToBill: totalAmount(order),
  };
}

/**
 * Rebuilds an order from a stored snapshot by replaying `addLineItem` from
 * `empty()`. The stored total is never trusted, only compared.
 */
export function restoreOrder(input: unknown): Result<Order, ValidationError | OrderError> {
  if (!isRecord(input)) {
    return validationError('Order snapshot must be an object');
  }

  const items = input['items'];
  if (!Array.isArray(items)) {
    return validationError('Order snapshot items must be an array');
  }

  const stored = input['amountToBill'];
  if (typeof stored !== 'number') {
    return validationError('Order snapshot amountToBill must be a number');
  }

  let order = empty();
  for (const raw of items) {
    const item = parseLineItem(raw);
    if (!item.ok) {
      return item;
    }
    const next = addLineItem(order, item.value);
    if (!next.ok) {
      return next;
    }
    order = next.value;
  }

  if (totalAmount(order) !== stored) {
    return validationError('amountToBill does not match line items');
  }

  return { ok: true, value: order };
}
