/**
 * Stripe Payment Gateway
 *
 * Captures previously authorized charges and refunds them. Stripe exceptions
 * are converted into PaymentFailure results here; nothing above this file sees
 * a Stripe error object.
 */

import Stripe from 'stripe';
import { createLogger, errorMessage } from '@/lib/security/logger';
import type {
  CaptureOutcome,
  CapturedCharge,
  CardSummary,
  PaymentFailure,
  PaymentGateway,
  RefundOptions,
  RefundOutcome,
} from './gateway';

const log = createLogger('stripe-gateway');

// ============================================================================
// STRIPE CLIENT
// ============================================================================

/**
 * Build a Stripe client from STRIPE_SECRET_KEY, or null when the key is
 * missing or still a placeholder.
 */
export function getStripeClient(env: NodeJS.ProcessEnv = process.env): Stripe | null {
  const key = env.STRIPE_SECRET_KEY;
  if (!key || key.includes('xxxxx')) return null;
  return new Stripe(key, { apiVersion: '2023-10-16', typescript: true });
}

// ============================================================================
// MAPPING
// ============================================================================

type ChargeFields = Pick<
  Stripe.Charge,
  | 'captured'
  | 'id'
  | 'customer'
  | 'balance_transaction'
  | 'created'
  | 'source'
  | 'payment_method'
  | 'payment_method_details'
>;

function expandableId(value: string | { id: string } | null): string | null {
  if (value === null) return null;
  return typeof value === 'string' ? value : value.id;
}

function cardSummary(charge: ChargeFields): CardSummary | null {
  const source = charge.source;
  if (source && source.object === 'card') {
    return {
      id: source.id,
      brand: source.brand,
      exp_month: source.exp_month,
      exp_year: source.exp_year,
      last4: source.last4,
    };
  }

  // PaymentMethod-era charges carry the card on payment_method_details
  const card = charge.payment_method_details?.card;
  if (card && charge.payment_method) {
    return {
      id: charge.payment_method,
      brand: card.brand ?? 'unknown',
      exp_month: card.exp_month,
      exp_year: card.exp_year,
      last4: card.last4 ?? '',
    };
  }

  return null;
}

export function toCapturedCharge(charge: ChargeFields): CapturedCharge {
  return {
    captured: charge.captured,
    id: charge.id,
    customer: expandableId(charge.customer),
    balance_transaction: expandableId(charge.balance_transaction),
    created: charge.created,
    source: cardSummary(charge),
  };
}

function toFailure(error: unknown): PaymentFailure {
  if (error instanceof Stripe.errors.StripeError) {
    return { success: false, message: error.message, code: error.code };
  }
  return { success: false, message: errorMessage(error) };
}

const NOT_CONFIGURED: PaymentFailure = {
  success: false,
  message: 'Stripe is not configured',
  code: 'not_configured',
};

// ============================================================================
// GATEWAY
// ============================================================================

export class StripePaymentGateway implements PaymentGateway {
  constructor(private readonly stripe: Stripe | null) {}

  async capture(chargeId: string): Promise<CaptureOutcome> {
    if (!this.stripe) {
      log.warn('Capture requested but Stripe is not configured', { chargeId });
      return NOT_CONFIGURED;
    }

    try {
      const charge = await this.stripe.charges.capture(chargeId);
      return { success: true, charge: toCapturedCharge(charge) };
    } catch (error) {
      const failure = toFailure(error);
      log.error('Stripe capture failed', { chargeId, code: failure.code, error: failure.message });
      return failure;
    }
  }

  async refund(chargeId: string, options: RefundOptions): Promise<RefundOutcome> {
    if (!this.stripe) {
      log.warn('Refund requested but Stripe is not configured', { chargeId });
      return NOT_CONFIGURED;
    }

    try {
      const refund = await this.stripe.refunds.create(
        { charge: chargeId },
        { idempotencyKey: options.idempotencyKey }
      );
      return { success: true, refund: { id: refund.id } };
    } catch (error) {
      const failure = toFailure(error);
      log.error('Stripe refund failed', { chargeId, code: failure.code, error: failure.message });
      return failure;
    }
  }
}
