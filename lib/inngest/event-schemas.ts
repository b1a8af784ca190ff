/**
 * Canonical Event Validation
 *
 * Zod schemas for every Inngest event this package sends or consumes.
 * Payloads are validated before emission and again on receipt.
 */

import { z } from 'zod';
import { cancellationCompensationSchema } from '@/lib/validations/order';
import { createLogger } from '@/lib/security/logger';
import { ORDER_CANCELLED_EVENT } from './client';

const log = createLogger('event-schemas');

export const EventSchemas: Record<string, z.ZodTypeAny> = {
  [ORDER_CANCELLED_EVENT]: cancellationCompensationSchema,
};

/**
 * Validate an event payload against its canonical schema.
 *
 * @returns true if valid or unknown event, false if validation fails
 */
export function validateEvent(name: string, data: unknown): boolean {
  const schema = EventSchemas[name];
  if (!schema) {
    log.warn('No schema for event', { name });
    return true;
  }
  const result = schema.safeParse(data);
  if (!result.success) {
    log.error('Event validation failed', { name, error: result.error.message });
    return false;
  }
  return true;
}
