/**
 * Cancellation Compensation
 *
 * Runs after an order has already been marked cancelled, detached from the
 * caller's response. Each step touches one external system and is:
 *   - durable: executed through a StepRunner (Inngest step.run in production),
 *     which retries it on its own
 *   - idempotent: completion is recorded per (order, step) and ledger/refund
 *     writes carry order-scoped idempotency keys
 *   - isolated: a step that still fails after its retries is recorded as
 *     failed and the remaining steps run anyway
 *
 * Step order is fixed:
 *   restore-referral-gallons → release-coupon-code → release-courier →
 *   notify-customer → refund-charge → track-cancellation
 */

import { cancellationNoticeText } from '@/lib/config/order-config';
import type { PaymentFailure } from '@/lib/payments/gateway';
import { createLogger, errorMessage } from '@/lib/security/logger';
import { nonBlank } from '@/lib/utils/text';
import type { CancellationCompensation } from '@/types/orders';
import { orderEventProperties } from './order-properties';
import type { OrderServices } from './services';

const log = createLogger('cancellation-compensation');

// ============================================================================
// TYPES
// ============================================================================

export const COMPENSATION_STEPS = [
  'restore-referral-gallons',
  'release-coupon-code',
  'release-courier',
  'notify-customer',
  'refund-charge',
  'track-cancellation',
] as const;

export type CompensationStep = (typeof COMPENSATION_STEPS)[number];

export type CompensationStepStatus = 'completed' | 'skipped' | 'failed';

export interface CompensationReport {
  orderId: string;
  steps: Record<CompensationStep, CompensationStepStatus>;
}

/**
 * Executes one named unit of work durably. Inngest's `step.run` in
 * production; tests run the callback inline.
 */
export interface StepRunner {
  run(id: string, fn: () => Promise<void>): Promise<void>;
}

export class RefundFailedError extends Error {
  constructor(
    readonly orderId: string,
    readonly failure: PaymentFailure
  ) {
    super(`Refund failed for order ${orderId}: ${failure.message}`);
    this.name = 'RefundFailedError';
  }
}

type CompensationServices = Pick<
  OrderServices,
  | 'orders'
  | 'payments'
  | 'gallons'
  | 'coupons'
  | 'capacity'
  | 'notifier'
  | 'tracker'
  | 'compensationLog'
  | 'config'
>;

// ============================================================================
// STEP EXECUTION
// ============================================================================

async function runStep(
  services: CompensationServices,
  step: StepRunner,
  orderId: string,
  id: CompensationStep,
  applies: boolean,
  work: () => Promise<void>
): Promise<CompensationStepStatus> {
  if (!applies) return 'skipped';

  try {
    await step.run(id, async () => {
      if (await services.compensationLog.hasCompleted(orderId, id)) {
        log.debug('Compensation step already completed', { orderId, step: id });
        return;
      }
      await work();
      await services.compensationLog.record(orderId, id, 'completed');
    });
    return 'completed';
  } catch (error) {
    const message = errorMessage(error);
    log.error('Compensation step failed', { orderId, step: id, error: message });
    await step.run(`${id}:record-failure`, () =>
      services.compensationLog.record(orderId, id, 'failed', message)
    );
    return 'failed';
  }
}

// ============================================================================
// SEQUENCE
// ============================================================================

export async function runCancellationCompensation(
  services: CompensationServices,
  payload: CancellationCompensation,
  step: StepRunner
): Promise<CompensationReport> {
  const { order, userId, originWasDashboard, notifyCustomer } = payload;
  const orderId = order.id;
  const couponCode = nonBlank(order.coupon_code);
  const courierId = nonBlank(order.courier_id);
  const chargeId = nonBlank(order.stripe_charge_id);

  // (a) give back any free gallons the order consumed
  const gallons = await runStep(
    services, step, orderId, 'restore-referral-gallons',
    order.referral_gallons_used !== 0,
    async () => {
      await services.gallons.credit(order.user_id, order.referral_gallons_used, `cancel:${orderId}`);
      await services.orders.updateColumns(orderId, { referral_gallons_used: 0 });
    }
  );

  // (b) free the coupon code for this vehicle
  const coupon = await runStep(
    services, step, orderId, 'release-coupon-code',
    couponCode !== null,
    async () => {
      if (couponCode === null) return;
      await services.coupons.markCodeUnused(couponCode, order.vehicle_id, order.user_id);
      await services.orders.updateColumns(orderId, { coupon_code: '' });
    }
  );

  // (c) let the courier go and tell them
  const courier = await runStep(
    services, step, orderId, 'release-courier',
    courierId !== null,
    async () => {
      if (courierId === null) return;
      await services.capacity.release(courierId, orderId);
      await services.notifier.push(courierId, 'The current order has been cancelled.');
    }
  );

  // (d) tell the customer, when asked to
  const customer = await runStep(
    services, step, orderId, 'notify-customer',
    notifyCustomer,
    () => services.notifier.push(userId, cancellationNoticeText(services.config.SUPPORT_EMAIL))
  );

  // (e) refund the authorized charge
  const refund = await runStep(
    services, step, orderId, 'refund-charge',
    chargeId !== null,
    async () => {
      if (chargeId === null) return;
      const outcome = await services.payments.refund(chargeId, {
        idempotencyKey: `refund:${orderId}`,
      });
      if (!outcome.success) throw new RefundFailedError(orderId, outcome);
      await services.orders.stampWithRefund(orderId, outcome.refund);
    }
  );

  // (f) analytics
  const tracked = await runStep(
    services, step, orderId, 'track-cancellation',
    true,
    () =>
      services.tracker.track(order.user_id, 'Cancel Order', {
        ...orderEventProperties(order),
        cancelled_by_user: !originWasDashboard,
      })
  );

  const report: CompensationReport = {
    orderId,
    steps: {
      'restore-referral-gallons': gallons,
      'release-coupon-code': coupon,
      'release-courier': courier,
      'notify-customer': customer,
      'refund-charge': refund,
      'track-cancellation': tracked,
    },
  };

  log.info('Cancellation compensation finished', report);
  return report;
}
