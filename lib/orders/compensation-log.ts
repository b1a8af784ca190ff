/**
 * Compensation Log
 *
 * Durable per-(order, step) record of the cancellation compensation sequence.
 * A step recorded as completed is never run again for that order; failed
 * steps stay visible for operational reconciliation.
 *
 * Schema (order_compensation_steps):
 *   order_id    TEXT
 *   step        TEXT
 *   status      TEXT ('completed' | 'failed')
 *   error       TEXT
 *   updated_at  TIMESTAMPTZ
 *   PRIMARY KEY (order_id, step)
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { OrderStoreError } from './order-store';

export type RecordedStepStatus = 'completed' | 'failed';

export interface CompensationLog {
  hasCompleted(orderId: string, step: string): Promise<boolean>;
  record(orderId: string, step: string, status: RecordedStepStatus, error?: string): Promise<void>;
}

export class SupabaseCompensationLog implements CompensationLog {
  constructor(private readonly supabase: SupabaseClient) {}

  async hasCompleted(orderId: string, step: string): Promise<boolean> {
    const { data, error } = await this.supabase
      .from('order_compensation_steps')
      .select('status')
      .eq('order_id', orderId)
      .eq('step', step)
      .eq('status', 'completed')
      .maybeSingle();

    if (error) throw new OrderStoreError('compensation.hasCompleted', error.message, error.code);
    return data !== null;
  }

  async record(orderId: string, step: string, status: RecordedStepStatus, error?: string): Promise<void> {
    const { error: upsertError } = await this.supabase
      .from('order_compensation_steps')
      .upsert(
        {
          order_id: orderId,
          step,
          status,
          error: error ?? null,
          updated_at: new Date().toISOString(),
        },
        { onConflict: 'order_id,step' }
      );

    if (upsertError) {
      throw new OrderStoreError('compensation.record', upsertError.message, upsertError.code);
    }
  }
}
