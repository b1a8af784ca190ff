/**
 * Cancellation compensation tests
 *
 * Run: npx vitest run lib/orders/__tests__/compensation.test.ts
 */

import { describe, it, expect } from 'vitest';
import { cancellationNoticeText } from '@/lib/config/order-config';
import { cancelOrder } from '../cancellation';
import { runCancellationCompensation } from '../compensation';
import {
  buildTestServices,
  inlineStepRunner,
  makeOrder,
  makeUser,
  type TestServices,
} from '@/__tests__/helpers/test-utils';
import type { CancellationCompensation, Order } from '@/types/orders';

const snapshot = makeOrder({
  status: 'enroute',
  courier_id: 'c1',
  coupon_code: 'SAVE5',
  referral_gallons_used: 3,
  stripe_charge_id: 'ch_1',
});

function cancelled(order: Order = snapshot): TestServices {
  return buildTestServices({ orders: [{ ...order, status: 'cancelled' }], users: [makeUser()] });
}

function payload(overrides: Partial<CancellationCompensation> = {}): CancellationCompensation {
  return { order: snapshot, userId: 'u1', originWasDashboard: false, notifyCustomer: true, ...overrides };
}

describe('runCancellationCompensation', () => {
  it('undoes every side effect of the order', async () => {
    const services = cancelled();
    await services.coupons.markCodeUsed('SAVE5', 'v1', 'u1');

    const report = await runCancellationCompensation(services, payload(), inlineStepRunner());

    expect(report).toEqual({
      orderId: 'o1',
      steps: {
        'restore-referral-gallons': 'completed',
        'release-coupon-code': 'completed',
        'release-courier': 'completed',
        'notify-customer': 'completed',
        'refund-charge': 'completed',
        'track-cancellation': 'completed',
      },
    });

    expect(services.gallons.entries).toEqual([{ userId: 'u1', delta: 3, reference: 'cancel:o1' }]);
    expect(services.coupons.redemptions).toEqual([]);
    expect(services.busyFlags.busy.get('c1')).toBe(false);
    expect(services.payments.refund).toHaveBeenCalledWith('ch_1', { idempotencyKey: 'refund:o1' });
    expect(await services.orders.getById('o1')).toMatchObject({
      status: 'cancelled',
      referral_gallons_used: 0,
      coupon_code: '',
      stripe_refund_id: 're_1',
    });
    expect(services.notifier.sent).toEqual([
      { channel: 'push', userId: 'c1', text: 'The current order has been cancelled.' },
      { channel: 'push', userId: 'u1', text: cancellationNoticeText('support@example.com') },
    ]);
  });

  it('tracks the cancellation with the snapshot properties', async () => {
    const services = cancelled();

    await runCancellationCompensation(services, payload(), inlineStepRunner());

    expect(services.tracker.events).toHaveLength(1);
    expect(services.tracker.events[0]).toMatchObject({
      userId: 'u1',
      event: 'Cancel Order',
      properties: {
        order_id: 'o1',
        coupon_code: 'SAVE5',
        referral_gallons_used: 3,
        gas_price: 3,
        service_fee: 5,
        total_price: 35,
        market_id: 0,
        target_time_start: new Date(1_790_000_000 * 1000).toISOString(),
        cancelled_by_user: true,
      },
    });
  });

  it('marks dashboard cancellations as not by the user', async () => {
    const services = cancelled();

    await runCancellationCompensation(services, payload({ originWasDashboard: true }), inlineStepRunner());

    expect(services.tracker.events[0].properties.cancelled_by_user).toBe(false);
  });

  it('keeps the courier busy while another order is bound to them', async () => {
    const services = buildTestServices({
      orders: [{ ...snapshot, status: 'cancelled' }, makeOrder({ id: 'o2', status: 'accepted', courier_id: 'c1' })],
    });

    await runCancellationCompensation(services, payload(), inlineStepRunner());

    expect(services.busyFlags.busy.get('c1')).toBe(true);
  });

  it('skips steps that do not apply', async () => {
    const bare = makeOrder({ status: 'unassigned' });
    const services = cancelled(bare);
    const runner = inlineStepRunner();

    const report = await runCancellationCompensation(
      services,
      payload({ order: bare, notifyCustomer: false }),
      runner
    );

    expect(report.steps).toEqual({
      'restore-referral-gallons': 'skipped',
      'release-coupon-code': 'skipped',
      'release-courier': 'skipped',
      'notify-customer': 'skipped',
      'refund-charge': 'skipped',
      'track-cancellation': 'completed',
    });
    expect(runner.ran).toEqual(['track-cancellation']);
    expect(services.payments.refund).not.toHaveBeenCalled();
    expect(services.notifier.sent).toEqual([]);
  });

  it('records a failed refund and still runs the later steps', async () => {
    const services = cancelled();
    services.payments.refundOutcome = {
      success: false,
      message: 'Charge ch_1 has already been refunded.',
      code: 'charge_already_refunded',
    };
    const runner = inlineStepRunner();

    const report = await runCancellationCompensation(services, payload(), runner);

    expect(report.steps['refund-charge']).toBe('failed');
    expect(report.steps['track-cancellation']).toBe('completed');
    expect(services.compensationLog.get('o1', 'refund-charge')).toEqual({
      status: 'failed',
      error: 'Refund failed for order o1: Charge ch_1 has already been refunded.',
    });
    expect(runner.ran).toContain('refund-charge:record-failure');
    expect((await services.orders.getById('o1'))?.stripe_refund_id).toBeNull();
  });

  it('isolates a step whose runner gives up', async () => {
    const services = cancelled();

    const report = await runCancellationCompensation(services, payload(), inlineStepRunner(['release-courier']));

    expect(report.steps['release-courier']).toBe('failed');
    expect(report.steps['notify-customer']).toBe('completed');
    expect(report.steps['refund-charge']).toBe('completed');
    expect(services.busyFlags.writes).toEqual([]);
    expect(services.compensationLog.get('o1', 'release-courier')).toEqual({
      status: 'failed',
      error: 'release-courier unavailable',
    });
  });

  it('is idempotent when the whole sequence is replayed', async () => {
    const services = cancelled();

    await runCancellationCompensation(services, payload(), inlineStepRunner());
    const sentAfterFirstRun = services.notifier.sent.length;
    await runCancellationCompensation(services, payload(), inlineStepRunner());

    expect(services.gallons.entries).toHaveLength(1);
    expect(services.payments.refund).toHaveBeenCalledTimes(1);
    expect(services.tracker.events).toHaveLength(1);
    expect(services.notifier.sent).toHaveLength(sentAfterFirstRun);
  });

  it('completes a cancellation end to end', async () => {
    const services = buildTestServices({ orders: [snapshot], users: [makeUser()] });

    await cancelOrder(services, 'u1', 'o1', { suppressUserDetails: true });
    const [queued] = services.compensation.queued;
    await runCancellationCompensation(services, queued, inlineStepRunner());

    expect(await services.orders.getById('o1')).toMatchObject({
      status: 'cancelled',
      referral_gallons_used: 0,
      coupon_code: '',
      stripe_refund_id: 're_1',
    });
    expect(await services.gallons.balance('u1')).toBe(3);
    expect(services.busyFlags.busy.get('c1')).toBe(false);
  });
});
