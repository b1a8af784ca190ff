/**
 * Order Status Machine
 *
 * Every status change goes through setOrderStatus(): one atomic write of the
 * new status plus one appended status event. Legality is NOT checked here;
 * the workflows only call it on edges they have already validated.
 */

import { nextStatus, type OrderStatus } from '@/lib/config/status-transitions';
import { createLogger } from '@/lib/security/logger';
import { nowUnix } from '@/lib/utils/timezone';
import type { OrderStore } from './order-store';

const log = createLogger('status-machine');

export { nextStatus };

export async function setOrderStatus(
  orders: OrderStore,
  orderId: string,
  status: OrderStatus,
  clock: () => number = nowUnix
): Promise<void> {
  await orders.setStatus(orderId, status, clock());
  log.info('Order status changed', { orderId, status });
}
