/**
 * Coupon Usage Ledger
 *
 * Tracks which (code, vehicle, user) tuples have redeemed a coupon. Code
 * validity rules live elsewhere; this only records usage.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { UNIQUE_VIOLATION } from '@/lib/supabase/admin';
import { OrderStoreError } from '@/lib/orders/order-store';
import type { GallonsLedger, LedgerWriteResult } from './gallons-ledger';

export interface CouponLedger {
  markCodeUsed(code: string, vehicleId: string | null, userId: string): Promise<void>;
  /** Free the code again for this vehicle and user */
  markCodeUnused(code: string, vehicleId: string | null, userId: string): Promise<void>;
}

export class SupabaseCouponLedger implements CouponLedger {
  constructor(private readonly supabase: SupabaseClient) {}

  async markCodeUsed(code: string, vehicleId: string | null, userId: string): Promise<void> {
    const { error } = await this.supabase
      .from('coupon_redemptions')
      .insert({ code: normalizeCode(code), vehicle_id: vehicleId, user_id: userId });

    if (error && error.code !== UNIQUE_VIOLATION) {
      throw new OrderStoreError('coupons.markCodeUsed', error.message, error.code);
    }
  }

  async markCodeUnused(code: string, vehicleId: string | null, userId: string): Promise<void> {
    let query = this.supabase
      .from('coupon_redemptions')
      .delete()
      .eq('code', normalizeCode(code))
      .eq('user_id', userId);

    query = vehicleId === null ? query.is('vehicle_id', null) : query.eq('vehicle_id', vehicleId);

    const { error } = await query;
    if (error) throw new OrderStoreError('coupons.markCodeUnused', error.message, error.code);
  }
}

/** Codes are matched case-insensitively */
export function normalizeCode(code: string): string {
  return code.trim().toUpperCase();
}

/**
 * Credit the owner of a referral code used on a completed order. Keyed by
 * order so a repeated completion never pays twice.
 */
export function applyReferralBonus(
  gallons: GallonsLedger,
  referrerId: string,
  orderId: string,
  bonusGallons: number
): Promise<LedgerWriteResult> {
  return gallons.credit(referrerId, bonusGallons, `referral-bonus:${orderId}`);
}
