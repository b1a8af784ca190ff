/**
 * Completion Workflow
 *
 * Marks the order complete, frees the courier, captures the authorized charge
 * and, once payment is settled (or not needed), runs the post-payment fan-out:
 * referral bonus, "Complete Order" analytics, customer push.
 *
 * A failed capture leaves the order complete but unpaid. There is no retry
 * and no reversal: the failure goes back to the caller for out-of-band
 * reconciliation.
 */

import type { PaymentFailure } from '@/lib/payments/gateway';
import { applyReferralBonus } from '@/lib/ledgers/coupon-ledger';
import { createLogger } from '@/lib/security/logger';
import { isManagedAccount } from '@/lib/users/user-directory';
import { centsToDollars } from '@/lib/utils/currency';
import { nonBlank } from '@/lib/utils/text';
import type { Order, OrderActionSuccess, UserRecord } from '@/types/orders';
import { orderEventProperties } from './order-properties';
import type { OrderServices } from './services';
import { setOrderStatus } from './status-machine';

const log = createLogger('order-completion');

export type CompletionResult = OrderActionSuccess | PaymentFailure;

/** Gift emoji appended to the referral upsell on rich-text capable devices */
const GIFT_SUFFIX = ' \u{1F381}';

/**
 * Push text sent to the customer once the delivery is done. Managed accounts
 * do not get the referral upsell.
 */
export function completionMessage(user: UserRecord | null): string {
  let upsell = '';
  if (user && !isManagedAccount(user)) {
    upsell =
      ` Share your code ${user.referral_code ?? ''} to earn free gas` +
      (user.supports_rich_text ? GIFT_SUFFIX : '') +
      '.';
  }
  return `Your delivery has been completed.${upsell} Thank you!`;
}

/**
 * Fan-out after payment succeeded or was not required.
 */
export async function afterPayment(services: OrderServices, order: Order): Promise<void> {
  const couponCode = nonBlank(order.coupon_code);
  if (couponCode !== null) {
    // No owner means a standard coupon rather than a referral code
    const referrer = await services.users.findByReferralCode(couponCode);
    if (referrer) {
      const { applied } = await applyReferralBonus(
        services.gallons,
        referrer.id,
        order.id,
        services.config.REFERRAL_BONUS_GALLONS
      );
      log.info('Referral bonus', { orderId: order.id, referrerId: referrer.id, applied });
    }
  }

  await services.tracker.track(order.user_id, 'Complete Order', {
    ...orderEventProperties(order),
    revenue: centsToDollars(order.total_price),
  });

  const user = await services.users.getById(order.user_id);
  await services.notifier.push(order.user_id, completionMessage(user));
}

export async function completeOrder(
  services: OrderServices,
  order: Order
): Promise<CompletionResult> {
  await setOrderStatus(services.orders, order.id, 'complete', services.clock);
  const courierId = nonBlank(order.courier_id);
  if (courierId !== null) {
    await services.capacity.release(courierId, order.id);
  }

  // A $0 order, or one never authorized, is never charged
  const chargeId = nonBlank(order.stripe_charge_id);
  if (order.total_price === 0 || chargeId === null) {
    await afterPayment(services, order);
    return { success: true };
  }

  const capture = await services.payments.capture(chargeId);
  if (!capture.success) {
    log.error('Capture failed; order is complete but unpaid', {
      orderId: order.id,
      chargeId,
      code: capture.code,
      error: capture.message,
    });
    return capture;
  }

  await services.orders.stampWithCharge(order.id, capture.charge);
  await afterPayment(services, order);
  return { success: true };
}
