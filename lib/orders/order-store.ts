/**
 * Order Store Port
 *
 * Everything the lifecycle workflows need from durable storage. The Supabase
 * implementation lives in supabase-order-store.ts; tests use an in-memory one.
 */

import type { CapturedCharge, RefundRecord } from '@/lib/payments/gateway';
import type { Order, OrderColumnUpdates, OrderStatus, StatusEvent } from '@/types/orders';

export interface OrderStore {
  getById(orderId: string): Promise<Order | null>;

  /**
   * Overwrite the status and append one status event, atomically. Readers
   * never see one without the other.
   */
  setStatus(orderId: string, status: OrderStatus, occurredAt: number): Promise<void>;

  /** Status history in append order */
  getStatusEvents(orderId: string): Promise<StatusEvent[]>;

  updateColumns(orderId: string, updates: OrderColumnUpdates): Promise<void>;

  /** Persist a successful capture onto the order */
  stampWithCharge(orderId: string, charge: CapturedCharge): Promise<void>;

  stampWithRefund(orderId: string, refund: RefundRecord): Promise<void>;

  /** Sum of total_price over the user's complete, unpaid, non-zero orders */
  unpaidBalance(userId: string): Promise<number>;

  /** Non-terminal orders currently bound to a courier */
  countActiveForCourier(courierId: string, excludingOrderId?: string): Promise<number>;
}

export class OrderStoreError extends Error {
  constructor(
    readonly operation: string,
    message: string,
    readonly code?: string
  ) {
    super(`[${operation}] ${message}`);
    this.name = 'OrderStoreError';
  }
}
