/**
 * Cancellation Compensation (Inngest function)
 *
 * Triggered by order/cancelled. Each compensation step is its own
 * `step.run`, so Inngest retries a failing step on its own and never re-runs
 * a step that already succeeded in this run. Steps that exhaust their
 * retries are recorded as failed and the sequence continues; see
 * lib/orders/compensation.ts.
 *
 * @module inngest/functions/cancel-compensation
 */

import { NonRetriableError } from 'inngest';
import { inngest, ORDER_CANCELLED_EVENT } from '../client';
import { cancellationCompensationSchema } from '@/lib/validations/order';
import { runCancellationCompensation, type StepRunner } from '@/lib/orders/compensation';
import { createOrderServices } from '@/lib/orders/services';
import { createLogger } from '@/lib/security/logger';

const log = createLogger('inngest-cancel-compensation');

export const cancelOrderCompensation = inngest.createFunction(
  {
    id: 'cancel-order-compensation',
    name: 'Cancel Order Compensation',
    retries: 3,
    // Only reached when something outside the per-step handling throws,
    // e.g. the failure record itself could not be written
    onFailure: async ({ event, error }) => {
      const parsed = cancellationCompensationSchema.safeParse(event.data.event.data);
      const orderId = parsed.success ? parsed.data.order.id : null;

      log.error('Cancellation compensation run failed', { orderId, error: error.message });

      if (orderId) {
        await createOrderServices().compensationLog.record(orderId, 'run', 'failed', error.message);
      }
    },
  },
  { event: ORDER_CANCELLED_EVENT },
  async ({ event, step }) => {
    const parsed = cancellationCompensationSchema.safeParse(event.data);
    if (!parsed.success) {
      throw new NonRetriableError(`Invalid ${ORDER_CANCELLED_EVENT} payload: ${parsed.error.message}`);
    }

    const runner: StepRunner = {
      run: async (id, fn) => {
        await step.run(id, fn);
      },
    };

    return runCancellationCompensation(createOrderServices(), parsed.data, runner);
  },
);
