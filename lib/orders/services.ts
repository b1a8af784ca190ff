/**
 * Order Services
 *
 * Every collaborator the lifecycle workflows touch, bundled so each workflow
 * takes one argument. createOrderServices() wires the production set
 * (Supabase, Stripe, Inngest); tests build their own from in-memory fakes.
 */

import type { EventTracker } from '@/lib/analytics/event-tracker';
import { SupabaseEventTracker } from '@/lib/analytics/event-tracker';
import { loadOrderConfig, type OrderConfig } from '@/lib/config/order-config';
import { CourierCapacity, SupabaseCourierBusyFlags } from '@/lib/couriers/capacity';
import { InngestCompensationDispatcher } from '@/lib/inngest/compensation-dispatcher';
import { SupabaseCouponLedger, type CouponLedger } from '@/lib/ledgers/coupon-ledger';
import { SupabaseGallonsLedger, type GallonsLedger } from '@/lib/ledgers/gallons-ledger';
import { QueuedNotifier, type Notifier } from '@/lib/notifications/notifier';
import type { PaymentGateway } from '@/lib/payments/gateway';
import { StripePaymentGateway, getStripeClient } from '@/lib/payments/stripe-gateway';
import { getServiceSupabase } from '@/lib/supabase/admin';
import { SupabaseUserDirectory, type UserDirectory } from '@/lib/users/user-directory';
import { nowUnix } from '@/lib/utils/timezone';
import type { CancellationCompensation } from '@/types/orders';
import { SupabaseCompensationLog, type CompensationLog } from './compensation-log';
import type { OrderStore } from './order-store';
import { SupabaseOrderStore } from './supabase-order-store';

/** Hands a cancellation's compensation sequence to a durable runner */
export interface CompensationDispatcher {
  dispatch(payload: CancellationCompensation): Promise<void>;
}

export interface OrderServices {
  orders: OrderStore;
  payments: PaymentGateway;
  gallons: GallonsLedger;
  coupons: CouponLedger;
  capacity: CourierCapacity;
  users: UserDirectory;
  notifier: Notifier;
  tracker: EventTracker;
  compensationLog: CompensationLog;
  compensation: CompensationDispatcher;
  config: OrderConfig;
  /** Unix seconds */
  clock: () => number;
}

export function createOrderServices(env: NodeJS.ProcessEnv = process.env): OrderServices {
  const supabase = getServiceSupabase(env);
  const orders = new SupabaseOrderStore(supabase);

  return {
    orders,
    payments: new StripePaymentGateway(getStripeClient(env)),
    gallons: new SupabaseGallonsLedger(supabase),
    coupons: new SupabaseCouponLedger(supabase),
    capacity: new CourierCapacity(new SupabaseCourierBusyFlags(supabase), orders),
    users: new SupabaseUserDirectory(supabase),
    notifier: new QueuedNotifier(supabase),
    tracker: new SupabaseEventTracker(supabase),
    compensationLog: new SupabaseCompensationLog(supabase),
    compensation: new InngestCompensationDispatcher(),
    config: loadOrderConfig(env),
    clock: nowUnix,
  };
}
