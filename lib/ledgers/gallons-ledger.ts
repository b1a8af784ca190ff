/**
 * Referral Gallons Ledger
 *
 * Promotional gallon credit, stored as signed entries in
 * referral_gallon_ledger. Every entry carries a unique reference, so replaying
 * the same credit or debit (a retried step, a duplicate event) is a no-op.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { UNIQUE_VIOLATION } from '@/lib/supabase/admin';
import { OrderStoreError } from '@/lib/orders/order-store';

export interface LedgerWriteResult {
  /** false when an entry with the same reference already existed */
  applied: boolean;
}

export interface GallonsLedger {
  credit(userId: string, gallons: number, reference: string): Promise<LedgerWriteResult>;
  debit(userId: string, gallons: number, reference: string): Promise<LedgerWriteResult>;
  balance(userId: string): Promise<number>;
}

export class SupabaseGallonsLedger implements GallonsLedger {
  constructor(private readonly supabase: SupabaseClient) {}

  credit(userId: string, gallons: number, reference: string): Promise<LedgerWriteResult> {
    return this.write('credit', userId, gallons, reference);
  }

  debit(userId: string, gallons: number, reference: string): Promise<LedgerWriteResult> {
    return this.write('debit', userId, -gallons, reference);
  }

  async balance(userId: string): Promise<number> {
    const { data, error } = await this.supabase
      .from('referral_gallon_ledger')
      .select('delta')
      .eq('user_id', userId);

    if (error) throw new OrderStoreError('gallons.balance', error.message, error.code);

    const rows = z.array(z.object({ delta: z.number() })).parse(data ?? []);
    return rows.reduce((sum, row) => sum + row.delta, 0);
  }

  private async write(
    operation: 'credit' | 'debit',
    userId: string,
    delta: number,
    reference: string
  ): Promise<LedgerWriteResult> {
    if (delta === 0) return { applied: false };

    const { error } = await this.supabase
      .from('referral_gallon_ledger')
      .insert({ user_id: userId, delta, reference });

    if (!error) return { applied: true };
    if (error.code === UNIQUE_VIOLATION) return { applied: false };
    throw new OrderStoreError(`gallons.${operation}`, error.message, error.code);
  }
}
