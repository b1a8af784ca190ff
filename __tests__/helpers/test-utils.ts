// /__tests__/helpers/test-utils.ts
// In-process stand-ins for every collaborator of the order lifecycle engine.
// No network, no database: each fake keeps state in plain maps/arrays so tests
// can assert on exactly what was written.

import { vi } from 'vitest';
import type { EventProperties, EventTracker } from '@/lib/analytics/event-tracker';
import { TERMINAL_STATUSES } from '@/lib/config/status-transitions';
import type { OrderConfig } from '@/lib/config/order-config';
import { CourierCapacity, type CourierBusyFlags } from '@/lib/couriers/capacity';
import type { CouponLedger } from '@/lib/ledgers/coupon-ledger';
import { normalizeCode } from '@/lib/ledgers/coupon-ledger';
import type { GallonsLedger, LedgerWriteResult } from '@/lib/ledgers/gallons-ledger';
import type { Notifier, NotificationChannel } from '@/lib/notifications/notifier';
import type { CompensationLog, RecordedStepStatus } from '@/lib/orders/compensation-log';
import type { StepRunner } from '@/lib/orders/compensation';
import type { OrderStore } from '@/lib/orders/order-store';
import type { CompensationDispatcher, OrderServices } from '@/lib/orders/services';
import { sumUnpaidBalance } from '@/lib/orders/unpaid-balance';
import {
  serializeCardSummary,
  type CaptureOutcome,
  type CapturedCharge,
  type PaymentGateway,
  type RefundOptions,
  type RefundOutcome,
  type RefundRecord,
} from '@/lib/payments/gateway';
import type { UserDirectory } from '@/lib/users/user-directory';
import type {
  CancellationCompensation,
  Order,
  OrderColumnUpdates,
  OrderStatus,
  StatusEvent,
  UserRecord,
} from '@/types/orders';

/** Fixed clock value used by every test service set */
export const TEST_NOW = 1_790_000_000;

export const TEST_CONFIG: OrderConfig = {
  SUPPORT_EMAIL: 'support@example.com',
  REFERRAL_BONUS_GALLONS: 5,
  ORDER_TIMEZONE: 'America/Los_Angeles',
};

// ============================================================================
// FIXTURES
// ============================================================================

export function makeOrder(overrides: Partial<Order> = {}): Order {
  return {
    id: 'o1',
    status: 'unassigned',
    user_id: 'u1',
    courier_id: null,
    vehicle_id: 'v1',
    license_plate: 'TEST123',
    gallons: 10,
    gas_type: '87',
    tire_pressure_check: false,
    lat: 34.05,
    lng: -118.25,
    address_street: '100 Main St',
    address_city: 'Los Angeles',
    address_state: 'CA',
    address_zip: '90012',
    target_time_start: 1_790_000_000,
    target_time_end: 1_790_010_800,
    gas_price: 300,
    service_fee: 500,
    total_price: 3500,
    paid: false,
    stripe_charge_id: null,
    stripe_customer_id_charged: null,
    stripe_balance_transaction_id: null,
    time_paid: null,
    payment_info: null,
    stripe_refund_id: null,
    coupon_code: '',
    referral_gallons_used: 0,
    ...overrides,
  };
}

export function makeUser(overrides: Partial<UserRecord> = {}): UserRecord {
  return {
    id: 'u1',
    name: 'Test Customer',
    email: 'customer@example.com',
    phone_number: '555-0100',
    referral_code: 'TESTREF1',
    account_manager_id: null,
    supports_rich_text: false,
    is_courier: false,
    ...overrides,
  };
}

export function makeCapturedCharge(overrides: Partial<CapturedCharge> = {}): CapturedCharge {
  return {
    captured: true,
    id: 'ch_1',
    customer: 'cus_1',
    balance_transaction: 'txn_1',
    created: 1_790_020_000,
    source: { id: 'card_1', brand: 'Visa', exp_month: 4, exp_year: 2030, last4: '4242' },
    ...overrides,
  };
}

// ============================================================================
// ORDER STORE
// ============================================================================

export class InMemoryOrderStore implements OrderStore {
  readonly rows = new Map<string, Order>();
  readonly events = new Map<string, StatusEvent[]>();

  constructor(orders: Order[] = []) {
    for (const order of orders) this.rows.set(order.id, { ...order });
  }

  async getById(orderId: string): Promise<Order | null> {
    const row = this.rows.get(orderId);
    return row ? { ...row } : null;
  }

  async setStatus(orderId: string, status: OrderStatus, occurredAt: number): Promise<void> {
    const row = this.require(orderId);
    this.rows.set(orderId, { ...row, status });
    this.events.set(orderId, [...(this.events.get(orderId) ?? []), { status, occurred_at: occurredAt }]);
  }

  async getStatusEvents(orderId: string): Promise<StatusEvent[]> {
    return [...(this.events.get(orderId) ?? [])];
  }

  async updateColumns(orderId: string, updates: OrderColumnUpdates): Promise<void> {
    this.rows.set(orderId, { ...this.require(orderId), ...updates });
  }

  async stampWithCharge(orderId: string, charge: CapturedCharge): Promise<void> {
    await this.updateColumns(orderId, {
      paid: charge.captured,
      stripe_charge_id: charge.id,
      stripe_customer_id_charged: charge.customer,
      stripe_balance_transaction_id: charge.balance_transaction,
      time_paid: charge.created,
      payment_info: serializeCardSummary(charge.source),
    });
  }

  async stampWithRefund(orderId: string, refund: RefundRecord): Promise<void> {
    await this.updateColumns(orderId, { stripe_refund_id: refund.id });
  }

  async unpaidBalance(userId: string): Promise<number> {
    return sumUnpaidBalance([...this.rows.values()].filter((o) => o.user_id === userId));
  }

  async countActiveForCourier(courierId: string, excludingOrderId?: string): Promise<number> {
    return [...this.rows.values()].filter(
      (o) => o.courier_id === courierId && o.id !== excludingOrderId && !TERMINAL_STATUSES.has(o.status)
    ).length;
  }

  private require(orderId: string): Order {
    const row = this.rows.get(orderId);
    if (!row) throw new Error(`Order ${orderId} not found`);
    return row;
  }
}

// ============================================================================
// LEDGERS / CAPACITY / USERS
// ============================================================================

export class InMemoryGallonsLedger implements GallonsLedger {
  readonly entries: Array<{ userId: string; delta: number; reference: string }> = [];

  async credit(userId: string, gallons: number, reference: string): Promise<LedgerWriteResult> {
    return this.write(userId, gallons, reference);
  }

  async debit(userId: string, gallons: number, reference: string): Promise<LedgerWriteResult> {
    return this.write(userId, -gallons, reference);
  }

  async balance(userId: string): Promise<number> {
    return this.entries.filter((e) => e.userId === userId).reduce((sum, e) => sum + e.delta, 0);
  }

  private write(userId: string, delta: number, reference: string): LedgerWriteResult {
    if (delta === 0 || this.entries.some((e) => e.reference === reference)) {
      return { applied: false };
    }
    this.entries.push({ userId, delta, reference });
    return { applied: true };
  }
}

export class InMemoryCouponLedger implements CouponLedger {
  readonly redemptions: Array<{ code: string; vehicleId: string | null; userId: string }> = [];

  async markCodeUsed(code: string, vehicleId: string | null, userId: string): Promise<void> {
    const normalized = normalizeCode(code);
    if (!this.find(normalized, vehicleId, userId)) {
      this.redemptions.push({ code: normalized, vehicleId, userId });
    }
  }

  async markCodeUnused(code: string, vehicleId: string | null, userId: string): Promise<void> {
    const match = this.find(normalizeCode(code), vehicleId, userId);
    if (match) this.redemptions.splice(this.redemptions.indexOf(match), 1);
  }

  private find(code: string, vehicleId: string | null, userId: string) {
    return this.redemptions.find(
      (r) => r.code === code && r.vehicleId === vehicleId && r.userId === userId
    );
  }
}

export class InMemoryBusyFlags implements CourierBusyFlags {
  readonly busy = new Map<string, boolean>();
  readonly writes: Array<{ courierId: string; busy: boolean }> = [];

  async setBusy(courierId: string, busy: boolean): Promise<void> {
    this.busy.set(courierId, busy);
    this.writes.push({ courierId, busy });
  }
}

export class InMemoryUserDirectory implements UserDirectory {
  readonly users = new Map<string, UserRecord>();

  constructor(users: UserRecord[] = []) {
    for (const user of users) this.users.set(user.id, user);
  }

  async getById(userId: string): Promise<UserRecord | null> {
    return this.users.get(userId) ?? null;
  }

  async findByReferralCode(code: string): Promise<UserRecord | null> {
    const normalized = normalizeCode(code);
    return [...this.users.values()].find((u) => u.referral_code === normalized) ?? null;
  }
}

// ============================================================================
// NOTIFIER / TRACKER / PAYMENTS
// ============================================================================

export class RecordingNotifier implements Notifier {
  readonly sent: Array<{ channel: NotificationChannel; userId: string; text: string }> = [];

  async push(userId: string, text: string): Promise<void> {
    this.sent.push({ channel: 'push', userId, text });
  }

  async sms(userId: string, text: string): Promise<void> {
    this.sent.push({ channel: 'sms', userId, text });
  }
}

export class RecordingTracker implements EventTracker {
  readonly events: Array<{ userId: string; event: string; properties: EventProperties }> = [];

  async track(userId: string, event: string, properties: EventProperties): Promise<void> {
    this.events.push({ userId, event, properties });
  }
}

export class FakePaymentGateway implements PaymentGateway {
  captureOutcome: CaptureOutcome = { success: true, charge: makeCapturedCharge() };
  refundOutcome: RefundOutcome = { success: true, refund: { id: 're_1' } };

  readonly capture = vi.fn(async (_chargeId: string): Promise<CaptureOutcome> => this.captureOutcome);

  readonly refund = vi.fn(
    async (_chargeId: string, _options: RefundOptions): Promise<RefundOutcome> => this.refundOutcome
  );
}

// ============================================================================
// COMPENSATION
// ============================================================================

export class InMemoryCompensationLog implements CompensationLog {
  readonly steps = new Map<string, { status: RecordedStepStatus; error?: string }>();

  async hasCompleted(orderId: string, step: string): Promise<boolean> {
    return this.steps.get(`${orderId}:${step}`)?.status === 'completed';
  }

  async record(orderId: string, step: string, status: RecordedStepStatus, error?: string): Promise<void> {
    this.steps.set(`${orderId}:${step}`, { status, error });
  }

  get(orderId: string, step: string) {
    return this.steps.get(`${orderId}:${step}`);
  }
}

/** Holds dispatched payloads until a test drains them */
export class QueueingDispatcher implements CompensationDispatcher {
  readonly queued: CancellationCompensation[] = [];

  async dispatch(payload: CancellationCompensation): Promise<void> {
    this.queued.push(payload);
  }
}

/**
 * Runs each step inline, once, and remembers the step ids in order. Steps
 * listed in `failing` throw before their work runs, as if every retry failed.
 */
export function inlineStepRunner(failing: readonly string[] = []): StepRunner & { ran: string[] } {
  const ran: string[] = [];
  return {
    ran,
    async run(id, fn) {
      ran.push(id);
      if (failing.includes(id)) {
        throw new Error(`${id} unavailable`);
      }
      await fn();
    },
  };
}

// ============================================================================
// SERVICE SET
// ============================================================================

export interface TestServices extends OrderServices {
  orders: InMemoryOrderStore;
  payments: FakePaymentGateway;
  gallons: InMemoryGallonsLedger;
  coupons: InMemoryCouponLedger;
  users: InMemoryUserDirectory;
  notifier: RecordingNotifier;
  tracker: RecordingTracker;
  compensationLog: InMemoryCompensationLog;
  compensation: QueueingDispatcher;
  busyFlags: InMemoryBusyFlags;
}

export function buildTestServices(
  options: { orders?: Order[]; users?: UserRecord[] } = {}
): TestServices {
  const orders = new InMemoryOrderStore(options.orders);
  const busyFlags = new InMemoryBusyFlags();

  return {
    orders,
    payments: new FakePaymentGateway(),
    gallons: new InMemoryGallonsLedger(),
    coupons: new InMemoryCouponLedger(),
    capacity: new CourierCapacity(busyFlags, orders),
    users: new InMemoryUserDirectory(options.users),
    notifier: new RecordingNotifier(),
    tracker: new RecordingTracker(),
    compensationLog: new InMemoryCompensationLog(),
    compensation: new QueueingDispatcher(),
    config: TEST_CONFIG,
    clock: () => TEST_NOW,
    busyFlags,
  };
}
