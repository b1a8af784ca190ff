/**
 * User Directory
 *
 * Read-only view of customers and couriers for the order workflows.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { userRowSchema } from '@/lib/validations/order';
import { OrderStoreError } from '@/lib/orders/order-store';
import type { GallonsLedger } from '@/lib/ledgers/gallons-ledger';
import { normalizeCode } from '@/lib/ledgers/coupon-ledger';
import type { UserDetails, UserRecord } from '@/types/orders';

export interface UserDirectory {
  getById(userId: string): Promise<UserRecord | null>;
  /** Owner of a referral code, or null for a standard (non-referral) coupon */
  findByReferralCode(code: string): Promise<UserRecord | null>;
}

const USER_COLUMNS =
  'id, name, email, phone_number, referral_code, account_manager_id, supports_rich_text, is_courier';

/** Accounts run by an account manager are not sent referral upsells */
export function isManagedAccount(user: UserRecord): boolean {
  return user.account_manager_id !== null && user.account_manager_id !== '';
}

/**
 * Profile details handed back to a customer, or null when the user is gone.
 */
export async function getUserDetails(
  users: UserDirectory,
  gallons: GallonsLedger,
  userId: string
): Promise<UserDetails | null> {
  const user = await users.getById(userId);
  if (!user) return null;

  return {
    success: true,
    user: {
      id: user.id,
      name: user.name,
      email: user.email,
      phone_number: user.phone_number,
      referral_code: user.referral_code,
      referral_gallons: await gallons.balance(user.id),
    },
  };
}

export class SupabaseUserDirectory implements UserDirectory {
  constructor(private readonly supabase: SupabaseClient) {}

  async getById(userId: string): Promise<UserRecord | null> {
    const { data, error } = await this.supabase
      .from('users')
      .select(USER_COLUMNS)
      .eq('id', userId)
      .maybeSingle();

    return this.parse('users.getById', data, error);
  }

  async findByReferralCode(code: string): Promise<UserRecord | null> {
    const { data, error } = await this.supabase
      .from('users')
      .select(USER_COLUMNS)
      .eq('referral_code', normalizeCode(code))
      .maybeSingle();

    return this.parse('users.findByReferralCode', data, error);
  }

  private parse(
    operation: string,
    data: unknown,
    error: { message: string; code: string } | null
  ): UserRecord | null {
    if (error) throw new OrderStoreError(operation, error.message, error.code);
    if (!data) return null;

    const parsed = userRowSchema.safeParse(data);
    if (!parsed.success) {
      throw new OrderStoreError(operation, `Malformed user row: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
