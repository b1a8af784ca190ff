/**
 * Supabase Order Store
 *
 * Rows are parsed with zod on the way in; any Supabase error or malformed row
 * is raised as OrderStoreError. Status changes go through the
 * set_order_status() Postgres function so the status column and the
 * order_status_events row are written in one transaction.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { TERMINAL_STATUSES } from '@/lib/config/status-transitions';
import { serializeCardSummary, type CapturedCharge, type RefundRecord } from '@/lib/payments/gateway';
import { orderRowSchema, statusEventSchema } from '@/lib/validations/order';
import type { Order, OrderColumnUpdates, OrderStatus, StatusEvent } from '@/types/orders';
import { OrderStoreError, type OrderStore } from './order-store';
import { sumUnpaidBalance } from './unpaid-balance';

const ORDER_COLUMNS =
  'id, status, user_id, courier_id, ' +
  'vehicle_id, license_plate, gallons, gas_type, tire_pressure_check, ' +
  'lat, lng, address_street, address_city, address_state, address_zip, ' +
  'target_time_start, target_time_end, ' +
  'gas_price, service_fee, total_price, ' +
  'paid, stripe_charge_id, stripe_customer_id_charged, stripe_balance_transaction_id, ' +
  'time_paid, payment_info, stripe_refund_id, ' +
  'coupon_code, referral_gallons_used';

const balanceRowSchema = orderRowSchema.pick({ status: true, paid: true, total_price: true });

function parseRows<T extends z.ZodTypeAny>(
  operation: string,
  schema: T,
  rows: unknown
): z.infer<T>[] {
  const parsed = z.array(schema).safeParse(rows ?? []);
  if (!parsed.success) {
    throw new OrderStoreError(operation, `Malformed rows: ${parsed.error.message}`);
  }
  return parsed.data;
}

export class SupabaseOrderStore implements OrderStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async getById(orderId: string): Promise<Order | null> {
    const { data, error } = await this.supabase
      .from('orders')
      .select(ORDER_COLUMNS)
      .eq('id', orderId)
      .maybeSingle();

    if (error) throw new OrderStoreError('getById', error.message, error.code);
    if (!data) return null;

    const parsed = orderRowSchema.safeParse(data);
    if (!parsed.success) {
      throw new OrderStoreError('getById', `Malformed order ${orderId}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async setStatus(orderId: string, status: OrderStatus, occurredAt: number): Promise<void> {
    const { error } = await this.supabase.rpc('set_order_status', {
      p_order_id: orderId,
      p_status: status,
      p_occurred_at: occurredAt,
    });

    if (error) throw new OrderStoreError('setStatus', error.message, error.code);
  }

  async getStatusEvents(orderId: string): Promise<StatusEvent[]> {
    const { data, error } = await this.supabase
      .from('order_status_events')
      .select('status, occurred_at')
      .eq('order_id', orderId)
      .order('seq', { ascending: true });

    if (error) throw new OrderStoreError('getStatusEvents', error.message, error.code);
    return parseRows('getStatusEvents', statusEventSchema, data);
  }

  async updateColumns(orderId: string, updates: OrderColumnUpdates): Promise<void> {
    const { error } = await this.supabase
      .from('orders')
      .update({ ...updates, updated_at: new Date().toISOString() })
      .eq('id', orderId);

    if (error) throw new OrderStoreError('updateColumns', error.message, error.code);
  }

  async stampWithCharge(orderId: string, charge: CapturedCharge): Promise<void> {
    await this.updateColumns(orderId, {
      paid: charge.captured,
      stripe_charge_id: charge.id,
      stripe_customer_id_charged: charge.customer,
      stripe_balance_transaction_id: charge.balance_transaction,
      time_paid: charge.created,
      payment_info: serializeCardSummary(charge.source),
    });
  }

  async stampWithRefund(orderId: string, refund: RefundRecord): Promise<void> {
    await this.updateColumns(orderId, { stripe_refund_id: refund.id });
  }

  async unpaidBalance(userId: string): Promise<number> {
    const { data, error } = await this.supabase
      .from('orders')
      .select('status, paid, total_price')
      .eq('user_id', userId)
      .eq('status', 'complete')
      .eq('paid', false)
      .gt('total_price', 0);

    if (error) throw new OrderStoreError('unpaidBalance', error.message, error.code);
    return sumUnpaidBalance(parseRows('unpaidBalance', balanceRowSchema, data));
  }

  async countActiveForCourier(courierId: string, excludingOrderId?: string): Promise<number> {
    let query = this.supabase
      .from('orders')
      .select('id', { count: 'exact', head: true })
      .eq('courier_id', courierId)
      .not('status', 'in', `(${[...TERMINAL_STATUSES].join(',')})`);

    if (excludingOrderId) {
      query = query.neq('id', excludingOrderId);
    }

    const { count, error } = await query;
    if (error) throw new OrderStoreError('countActiveForCourier', error.message, error.code);
    return count ?? 0;
  }
}
