/**
 * Delivery Order Types
 *
 * Row shapes are inferred from the zod schemas in lib/validations/order.ts so
 * that what storage returns and what the workflows consume cannot drift.
 */

import type { z } from 'zod';
import type { OrderStatus } from '@/lib/config/status-transitions';
import type {
  cancellationCompensationSchema,
  orderRowSchema,
  statusEventSchema,
  userRowSchema,
} from '@/lib/validations/order';

export type { OrderStatus };

export type Order = z.infer<typeof orderRowSchema>;

/** One entry of an order's append-only status history */
export type StatusEvent = z.infer<typeof statusEventSchema>;

export type UserRecord = z.infer<typeof userRowSchema>;

/** Everything the detached compensation sequence needs, fixed at cancel time */
export type CancellationCompensation = z.infer<typeof cancellationCompensationSchema>;

/**
 * Columns writable outside the status machine. Status is excluded; use
 * setOrderStatus() instead.
 */
export interface OrderColumnUpdates {
  courier_id?: string | null;
  coupon_code?: string | null;
  referral_gallons_used?: number;

  paid?: boolean;
  stripe_charge_id?: string | null;
  stripe_customer_id_charged?: string | null;
  stripe_balance_transaction_id?: string | null;
  time_paid?: number | null;
  payment_info?: string | null;
  stripe_refund_id?: string | null;
}

// ============================================================================
// WORKFLOW RESULTS
// ============================================================================

export interface OrderActionSuccess {
  success: true;
}

export interface OrderActionFailure {
  success: false;
  message: string;
}

export type OrderActionResult = OrderActionSuccess | OrderActionFailure;

/** Profile details returned to a customer after their own cancellation */
export interface UserDetails {
  success: true;
  user: {
    id: string;
    name: string | null;
    email: string | null;
    phone_number: string | null;
    referral_code: string | null;
    referral_gallons: number;
  };
}

export interface CancelOptions {
  /** Cancelled from the operator dashboard rather than by the customer */
  originWasDashboard?: boolean;
  notifyCustomer?: boolean;
  suppressUserDetails?: boolean;
  overrideCancellableStatuses?: readonly OrderStatus[];
}

export interface AssignOptions {
  /** Leave the order alone unless it is still unassigned */
  noReassign?: boolean;
}
