/**
 * Product analytics events ("Complete Order", "Cancel Order", ...).
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { OrderStoreError } from '@/lib/orders/order-store';

export type EventProperties = Record<string, string | number | boolean | null>;

export interface EventTracker {
  track(userId: string, event: string, properties: EventProperties): Promise<void>;
}

export class SupabaseEventTracker implements EventTracker {
  constructor(private readonly supabase: SupabaseClient) {}

  async track(userId: string, event: string, properties: EventProperties): Promise<void> {
    const { error } = await this.supabase
      .from('analytics_events')
      .insert({ user_id: userId, event, properties });

    if (error) throw new OrderStoreError('analytics.track', error.message, error.code);
  }
}
