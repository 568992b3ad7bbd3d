import type { Order } from './order';
import type { Result, VersionConflict } from './types';

export interface VersionedOrder {
  order: Order;
  version: number;
}

export type SaveResult = Result<{ version: number }, VersionConflict>;

/**
 * Storage contract for orders. Not implemented in this package.
 *
 * `save` must commit only while the stored version still equals
 * `expectedVersion`; otherwise it reports a VERSION_CONFLICT and the caller
 * re-reads, re-applies its transition and tries again.
 */
export interface OrderRepository {
  load(orderId: string): Promise<VersionedOrder | null>;
  save(orderId: string, expectedVersion: number, order: Order): Promise<SaveResult>;
}
