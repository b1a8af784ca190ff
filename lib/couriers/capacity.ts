/**
 * Courier Capacity
 *
 * Sole owner of the courier busy flag. A courier is busy exactly when at
 * least one non-terminal order is bound to them; no other module writes
 * couriers.busy.
 *
 * Not compare-and-swap: concurrent acquire/release on one courier can race,
 * the next release or acquire on that courier recomputes the flag.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { OrderStoreError, type OrderStore } from '@/lib/orders/order-store';
import { createLogger } from '@/lib/security/logger';

const log = createLogger('courier-capacity');

/** Storage for the derived flag only */
export interface CourierBusyFlags {
  setBusy(courierId: string, busy: boolean): Promise<void>;
}

export class CourierCapacity {
  constructor(
    private readonly flags: CourierBusyFlags,
    private readonly orders: Pick<OrderStore, 'countActiveForCourier'>
  ) {}

  /** The courier has just been bound to `orderId` */
  async acquire(courierId: string, orderId: string): Promise<void> {
    await this.flags.setBusy(courierId, true);
    log.debug('Courier acquired', { courierId, orderId });
  }

  /**
   * `orderId` no longer occupies the courier (completed or cancelled). The
   * courier stays busy if any other non-terminal order is bound to them.
   */
  async release(courierId: string, orderId: string): Promise<boolean> {
    const remaining = await this.orders.countActiveForCourier(courierId, orderId);
    const busy = remaining > 0;
    await this.flags.setBusy(courierId, busy);
    log.debug('Courier released', { courierId, orderId, remaining, busy });
    return busy;
  }
}

export class SupabaseCourierBusyFlags implements CourierBusyFlags {
  constructor(private readonly supabase: SupabaseClient) {}

  async setBusy(courierId: string, busy: boolean): Promise<void> {
    const { error } = await this.supabase
      .from('couriers')
      .update({ busy })
      .eq('id', courierId);

    if (error) throw new OrderStoreError('couriers.setBusy', error.message, error.code);
  }
}
