import { Inngest } from "inngest";

/**
 * Order Lifecycle Inngest Client
 *
 * Used for durable background work:
 * - Cancellation compensation (one retried step per external system)
 *
 * Event payloads are validated with the zod schemas in ./event-schemas.
 */
export const inngest = new Inngest({
  id: "fuel-order-lifecycle",
});

export const ORDER_CANCELLED_EVENT = "order/cancelled";
