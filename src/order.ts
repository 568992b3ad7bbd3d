import type {
  AmountOverflowError,
  LineItem,
  LineItemId,
  LineItemInput,
  Money,
  OrderError,
  Result,
} from './types';
import { sumPrices, toMoney, ZERO } from './pricing';
import { isLineItemId } from './validation';

/**
 * Order aggregate.
 *
 * Instances are frozen and only ever produced by the functions in this module,
 * so `amountToBill` is always the sum of the item prices and item ids are
 * unique. The class is exported as a type only; the private field makes it
 * nominal, so an object literal cannot pass for an `Order`.
 */
class Order {
  private readonly items: readonly LineItem[];
  readonly amountToBill: Money;

  constructor(items: readonly LineItem[], amountToBill: Money) {
    this.items = Object.freeze([...items]);
    this.amountToBill = amountToBill;
    Object.freeze(this);
  }

  get lineItems(): readonly LineItem[] {
    return this.items;
  }
}

export type { Order };

export type OrderResult = Result<Order, OrderError>;

// Every non-empty Order is built here, from the full item list.
function orderOf(items: readonly LineItem[]): Result<Order, AmountOverflowError> {
  const total = sumPrices(items);
  if (!total.ok) {
    return total;
  }
  return { ok: true, value: new Order(items, total.value) };
}

export function empty(): Order {
  return new Order([], ZERO);
}

export function addLineItem(order: Order, item: LineItemInput): OrderResult {
  const price = toMoney(item.price);
  if (!price.ok) {
    return price;
  }

  if (!isLineItemId(item.id)) {
    return {
      ok: false,
      error: {
        error: 'INVALID_LINE_ITEM_ID',
        message: `Line item id must be a non-empty string or an integer, got ${String(item.id)}`,
        id: item.id,
      },
    };
  }

  if (findLineItem(order, item.id) !== undefined) {
    return {
      ok: false,
      error: {
        error: 'DUPLICATE_LINE_ITEM',
        message: `Line item ${JSON.stringify(item.id)} already exists`,
        id: item.id,
      },
    };
  }

  const added: LineItem = Object.freeze({ id: item.id, price: price.value });
  return orderOf([...order.lineItems, added]);
}

export function changeLineItemPrice(order: Order, id: LineItemId, newPrice: number): OrderResult {
  const price = toMoney(newPrice);
  if (!price.ok) {
    return price;
  }

  const index = order.lineItems.findIndex(item => item.id === id);
  if (index === -1) {
    return {
      ok: false,
      error: {
        error: 'LINE_ITEM_NOT_FOUND',
        message: `Line item ${JSON.stringify(id)} not found`,
        id,
      },
    };
  }

  const amount = price.value;
  return orderOf(
    order.lineItems.map((item, i) => (i === index ? Object.freeze({ id: item.id, price: amount }) : item)),
  );
}

export function totalAmount(order: Order): Money {
  return order.amountToBill;
}

export function lineItems(order: Order): readonly LineItem[] {
  return order.lineItems;
}

export function findLineItem(order: Order, id: LineItemId): LineItem | undefined {
  return order.lineItems.find(item => item.id === id);
}
