/**
 * Payment Gateway Port
 *
 * The order workflows only ever capture an authorized charge or refund it.
 * Implementations never throw for gateway-side failures; they return a
 * PaymentFailure so callers can hand it straight back to their own caller.
 */

/** Card fields persisted on the order after capture */
export interface CardSummary {
  id: string;
  brand: string;
  exp_month: number;
  exp_year: number;
  last4: string;
}

export interface CapturedCharge {
  /** Funds actually captured. NOT the same as the gateway's "paid" flag */
  captured: boolean;
  id: string;
  customer: string | null;
  balance_transaction: string | null;
  /** Unix seconds */
  created: number;
  source: CardSummary | null;
}

export interface RefundRecord {
  id: string;
}

export interface PaymentFailure {
  success: false;
  message: string;
  code?: string;
}

export type CaptureOutcome = { success: true; charge: CapturedCharge } | PaymentFailure;

export type RefundOutcome = { success: true; refund: RefundRecord } | PaymentFailure;

export interface RefundOptions {
  /** Repeating a refund with the same key returns the original refund */
  idempotencyKey: string;
}

export interface PaymentGateway {
  capture(chargeId: string): Promise<CaptureOutcome>;
  refund(chargeId: string, options: RefundOptions): Promise<RefundOutcome>;
}

/** Serialized card summary stored in orders.payment_info */
export function serializeCardSummary(source: CardSummary | null): string | null {
  if (!source) return null;
  const { id, brand, exp_month, exp_year, last4 } = source;
  return JSON.stringify({ id, brand, exp_month, exp_year, last4 });
}
