import type { Order } from '@/types/orders';

type BalanceFields = Pick<Order, 'status' | 'paid' | 'total_price'>;

/**
 * Orders that count toward a customer's unpaid balance. A $0 order was never
 * charged, so it never counts, whatever its paid flag says.
 */
export function countsTowardUnpaidBalance(order: BalanceFields): boolean {
  return order.status === 'complete' && !order.paid && order.total_price > 0;
}

export function sumUnpaidBalance(orders: readonly BalanceFields[]): number {
  return orders
    .filter(countsTowardUnpaidBalance)
    .reduce((sum, order) => sum + order.total_price, 0);
}
