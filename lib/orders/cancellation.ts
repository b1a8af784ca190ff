/**
 * Cancellation Saga
 *
 * Validates that the order can still be cancelled, marks it cancelled, then
 * hands the compensation sequence (gallons, coupon, courier, customer notice,
 * refund, analytics) to a durable runner without waiting for it. The caller
 * sees success as soon as the status is written; compensation outcomes land
 * in the compensation log.
 */

import { isCancellable } from '@/lib/config/status-transitions';
import { createLogger, errorMessage } from '@/lib/security/logger';
import { getUserDetails } from '@/lib/users/user-directory';
import type { CancelOptions, OrderActionFailure, OrderActionSuccess, UserDetails } from '@/types/orders';
import type { OrderServices } from './services';
import { setOrderStatus } from './status-machine';

const log = createLogger('order-cancellation');

export const ORDER_NOT_FOUND_MESSAGE = 'An order with that ID could not be found.';
export const TOO_LATE_TO_CANCEL_MESSAGE = 'Sorry, it is too late for this order to be cancelled.';

export type CancelResult = OrderActionSuccess | UserDetails | OrderActionFailure;

export async function cancelOrder(
  services: OrderServices,
  userId: string,
  orderId: string,
  options: CancelOptions = {}
): Promise<CancelResult> {
  const order = await services.orders.getById(orderId);
  if (!order) {
    return { success: false, message: ORDER_NOT_FOUND_MESSAGE };
  }

  if (!isCancellable(order.status, options.overrideCancellableStatuses)) {
    log.info('Cancellation refused', { orderId, status: order.status });
    return { success: false, message: TOO_LATE_TO_CANCEL_MESSAGE };
  }

  await setOrderStatus(services.orders, orderId, 'cancelled', services.clock);

  try {
    await services.compensation.dispatch({
      order,
      userId,
      originWasDashboard: options.originWasDashboard ?? false,
      notifyCustomer: options.notifyCustomer ?? false,
    });
  } catch (error) {
    // The order stays cancelled; reconciliation picks the gap up from the log
    const message = errorMessage(error);
    log.error('Failed to dispatch cancellation compensation', { orderId, error: message });
    await services.compensationLog.record(orderId, 'dispatch', 'failed', message).catch((recordError: unknown) => {
      log.error('Failed to record dispatch failure', { orderId, error: errorMessage(recordError) });
    });
  }

  if (options.suppressUserDetails) {
    return { success: true };
  }
  return (await getUserDetails(services.users, services.gallons, userId)) ?? { success: true };
}
