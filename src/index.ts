export {
  addLineItem,
  changeLineItemPrice,
  empty,
  findLineItem,
  lineItems,
  totalAmount,
} from './order';
export type { Order, OrderResult } from './order';
export { isMoney, sumPrices, toMoney, ZERO } from './pricing';
export { parseLineItem } from './validation';
export { restoreOrder, toSnapshot } from './snapshot';
export type { OrderRepository, SaveResult, VersionedOrder } from './repository';
export type * from './types';
