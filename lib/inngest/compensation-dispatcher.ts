import type { CompensationDispatcher } from '@/lib/orders/services';
import type { CancellationCompensation } from '@/types/orders';
import { inngest, ORDER_CANCELLED_EVENT } from './client';
import { validateEvent } from './event-schemas';

/**
 * Sends order/cancelled to Inngest. The event id is derived from the order,
 * so a repeated dispatch for the same order is deduplicated by Inngest.
 */
export class InngestCompensationDispatcher implements CompensationDispatcher {
  async dispatch(payload: CancellationCompensation): Promise<void> {
    if (!validateEvent(ORDER_CANCELLED_EVENT, payload)) {
      throw new Error(`Refusing to send invalid ${ORDER_CANCELLED_EVENT} payload for order ${payload.order.id}`);
    }
    await inngest.send({
      id: `order-cancelled-${payload.order.id}`,
      name: ORDER_CANCELLED_EVENT,
      data: payload,
    });
  }
}
