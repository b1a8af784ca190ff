/**
 * Customer / Courier Notifier
 *
 * Push and SMS messages are queued in notification_queue; a separate sender
 * drains the queue and owns delivery (APNs/FCM/SMS transport is not part of
 * this package).
 *
 * Schema (notification_queue):
 *   id          UUID PK
 *   user_id     TEXT
 *   channel     TEXT ('push' | 'sms')
 *   body        TEXT
 *   status      TEXT ('pending' | 'sent' | 'failed')
 *   created_at  TIMESTAMPTZ
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { OrderStoreError } from '@/lib/orders/order-store';

export type NotificationChannel = 'push' | 'sms';

export interface Notifier {
  push(userId: string, text: string): Promise<void>;
  sms(userId: string, text: string): Promise<void>;
}

export class QueuedNotifier implements Notifier {
  constructor(private readonly supabase: SupabaseClient) {}

  push(userId: string, text: string): Promise<void> {
    return this.enqueue('push', userId, text);
  }

  sms(userId: string, text: string): Promise<void> {
    return this.enqueue('sms', userId, text);
  }

  private async enqueue(channel: NotificationChannel, userId: string, body: string): Promise<void> {
    const { error } = await this.supabase
      .from('notification_queue')
      .insert({ user_id: userId, channel, body, status: 'pending' });

    if (error) throw new OrderStoreError(`notify.${channel}`, error.message, error.code);
  }
}
