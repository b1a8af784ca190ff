import { centsToDollarsString } from '@/lib/utils/currency';
import { formatFull } from '@/lib/utils/timezone';
import type { Order } from '@/types/orders';

export interface NewOrderTextOptions {
  chargeAuthorized: boolean;
  /** Customer's unpaid balance in cents across other orders */
  unpaidBalance: number;
  timeZone: string;
}

/**
 * SMS summary sent to a courier when an order is assigned to them.
 */
export function newOrderText(order: Order, options: NewOrderTextOptions): string {
  const lines = ['New order:'];

  lines.push(options.chargeAuthorized ? 'Charge Authorized.' : '!CHARGE FAILED TO AUTHORIZE!');

  if (options.unpaidBalance > 0) {
    lines.push(`!UNPAID BALANCE: $${centsToDollarsString(options.unpaidBalance)}`);
  }

  const due = order.target_time_end === null ? 'unscheduled' : formatFull(order.target_time_end, options.timeZone);
  lines.push(`Due: ${due}`);
  lines.push(`${order.address_street ?? ''}, ${order.address_zip ?? ''}`);
  lines.push(`${order.gallons} Gallons of ${order.gas_type}`);

  return lines.join('\n');
}
