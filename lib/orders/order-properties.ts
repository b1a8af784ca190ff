import type { EventProperties } from '@/lib/analytics/event-tracker';
import { marketIdForZip } from '@/lib/config/markets';
import { centsToDollars } from '@/lib/utils/currency';
import { unixToIso } from '@/lib/utils/timezone';
import type { Order } from '@/types/orders';

/**
 * Standard properties attached to every order analytics event. Prices are in
 * dollars, the delivery window as ISO timestamps.
 */
export function orderEventProperties(order: Order): EventProperties {
  return {
    order_id: order.id,
    vehicle_id: order.vehicle_id,
    gallons: order.gallons,
    gas_type: order.gas_type,
    lat: order.lat,
    lng: order.lng,
    address_street: order.address_street,
    address_city: order.address_city,
    address_state: order.address_state,
    address_zip: order.address_zip,
    license_plate: order.license_plate,
    coupon_code: order.coupon_code,
    referral_gallons_used: order.referral_gallons_used,
    tire_pressure_check: order.tire_pressure_check,
    gas_price: centsToDollars(order.gas_price),
    service_fee: centsToDollars(order.service_fee),
    total_price: centsToDollars(order.total_price),
    target_time_start: unixToIso(order.target_time_start),
    target_time_end: unixToIso(order.target_time_end),
    market_id: marketIdForZip(order.address_zip),
  };
}
