/**
 * Order Lifecycle Configuration
 *
 * Non-secret settings with production defaults. Override via environment
 * variables. Secrets (Supabase, Stripe, Inngest keys) are read where the
 * client is built, never here.
 */

import { z } from 'zod';

const OrderConfigSchema = z.object({
  SUPPORT_EMAIL: z.string().email().default('support@example.com'),
  REFERRAL_BONUS_GALLONS: z.coerce.number().int().nonnegative().default(5),
  ORDER_TIMEZONE: z.string().min(1).default('America/Los_Angeles'),
});

export type OrderConfig = z.infer<typeof OrderConfigSchema>;

/**
 * Parse order settings from an environment map. Empty strings count as unset.
 *
 * @throws ZodError when a variable is set to an invalid value
 */
export function loadOrderConfig(env: NodeJS.ProcessEnv = process.env): OrderConfig {
  return OrderConfigSchema.parse({
    SUPPORT_EMAIL: env.SUPPORT_EMAIL || undefined,
    REFERRAL_BONUS_GALLONS: env.REFERRAL_BONUS_GALLONS || undefined,
    ORDER_TIMEZONE: env.ORDER_TIMEZONE || undefined,
  });
}

/** Fixed customer-facing text sent when an order is cancelled */
export function cancellationNoticeText(supportEmail: string): string {
  return (
    'Your order has been cancelled. If you have any questions,' +
    ` please email us at ${supportEmail} or use the Feedback` +
    ' form on the left-hand menu.'
  );
}
