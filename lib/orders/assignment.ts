/**
 * Assignment Coordinator + courier progress actions
 *
 * assignOrder binds a courier to an order; acceptOrder, beginRoute and
 * serviceOrder are the courier's own status moves. advanceOrder dispatches to
 * whichever of these (or completion) is the order's next forward step.
 */

import { nextStatus } from '@/lib/config/status-transitions';
import { createLogger } from '@/lib/security/logger';
import { nonBlank } from '@/lib/utils/text';
import type { AssignOptions, Order, OrderActionFailure, OrderActionResult } from '@/types/orders';
import { ORDER_NOT_FOUND_MESSAGE } from './cancellation';
import { completeOrder, type CompletionResult } from './completion';
import { newOrderText } from './courier-messages';
import type { OrderServices } from './services';
import { setOrderStatus } from './status-machine';

const log = createLogger('order-assignment');

export const ENROUTE_MESSAGE =
  'A courier is enroute to your location. Please ensure that your fueling door is open.';
export const SERVICING_MESSAGE = 'We are currently servicing your vehicle.';
export const ASSIGNED_MESSAGE = 'You have been assigned a new order.';

/**
 * Bind `courierId` to the order. A courier the order is taken from is
 * released, so their busy flag reflects the orders they still hold.
 *
 * With `noReassign`, an order that is no longer unassigned is left untouched
 * and null is returned: not stealing someone else's order is not an error.
 */
export async function assignOrder(
  services: OrderServices,
  orderId: string,
  courierId: string,
  options: AssignOptions = {}
): Promise<OrderActionResult | null> {
  const order = await services.orders.getById(orderId);
  if (!order) {
    return { success: false, message: ORDER_NOT_FOUND_MESSAGE };
  }

  if (options.noReassign && order.status !== 'unassigned') {
    log.info('Assignment skipped; order already taken', { orderId, courierId, status: order.status });
    return null;
  }

  await setOrderStatus(services.orders, orderId, 'assigned', services.clock);
  await services.orders.updateColumns(orderId, { courier_id: courierId });
  await services.capacity.acquire(courierId, orderId);

  const previousCourierId = nonBlank(order.courier_id);
  if (previousCourierId !== null && previousCourierId !== courierId) {
    await services.capacity.release(previousCourierId, orderId);
    log.info('Order reassigned', { orderId, from: previousCourierId, to: courierId });
  }

  await services.notifier.push(courierId, ASSIGNED_MESSAGE);
  await services.notifier.sms(
    courierId,
    newOrderText(order, {
      chargeAuthorized: true,
      unpaidBalance: await services.orders.unpaidBalance(order.user_id),
      timeZone: services.config.ORDER_TIMEZONE,
    })
  );

  return { success: true };
}

export async function acceptOrder(services: OrderServices, orderId: string): Promise<OrderActionResult> {
  await setOrderStatus(services.orders, orderId, 'accepted', services.clock);
  return { success: true };
}

export async function beginRoute(services: OrderServices, order: Order): Promise<OrderActionResult> {
  await setOrderStatus(services.orders, order.id, 'enroute', services.clock);
  await services.notifier.push(order.user_id, ENROUTE_MESSAGE);
  return { success: true };
}

export async function serviceOrder(services: OrderServices, order: Order): Promise<OrderActionResult> {
  await setOrderStatus(services.orders, order.id, 'servicing', services.clock);
  await services.notifier.push(order.user_id, SERVICING_MESSAGE);
  return { success: true };
}

function cannotAdvance(order: Order): OrderActionFailure {
  return { success: false, message: `Order cannot be advanced from status ${order.status}.` };
}

/**
 * Courier "next step" button: move the order one edge along the forward
 * chain. Assignment is not a courier action, so unassigned orders are refused.
 */
export async function advanceOrder(
  services: OrderServices,
  order: Order
): Promise<OrderActionResult | CompletionResult> {
  switch (nextStatus(order.status)) {
    case 'accepted':
      return acceptOrder(services, order.id);
    case 'enroute':
      return beginRoute(services, order);
    case 'servicing':
      return serviceOrder(services, order);
    case 'complete':
      return completeOrder(services, order);
    default:
      return cannotAdvance(order);
  }
}
