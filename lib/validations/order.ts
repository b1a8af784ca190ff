import { z } from 'zod'
import { ORDER_STATUSES } from '@/lib/config/status-transitions'

export const orderStatusSchema = z.enum(ORDER_STATUSES)

/**
 * An `orders` row as read from storage. Prices are integer cents, times are
 * unix seconds.
 */
export const orderRowSchema = z.object({
  id: z.string().min(1),
  status: orderStatusSchema,
  user_id: z.string().min(1),
  courier_id: z.string().nullable(),

  // Vehicle + product
  vehicle_id: z.string().nullable(),
  license_plate: z.string().nullable(),
  gallons: z.number().nonnegative(),
  gas_type: z.string(),
  tire_pressure_check: z.boolean(),

  // Location + window (reporting only)
  lat: z.number().nullable(),
  lng: z.number().nullable(),
  address_street: z.string().nullable(),
  address_city: z.string().nullable(),
  address_state: z.string().nullable(),
  address_zip: z.string().nullable(),
  target_time_start: z.number().int().nullable(),
  target_time_end: z.number().int().nullable(),

  // Commercial
  gas_price: z.number().int(),
  service_fee: z.number().int(),
  total_price: z.number().int().nonnegative(),

  // Payment
  paid: z.boolean(),
  stripe_charge_id: z.string().nullable(),
  stripe_customer_id_charged: z.string().nullable(),
  stripe_balance_transaction_id: z.string().nullable(),
  time_paid: z.number().int().nullable(),
  payment_info: z.string().nullable(),
  stripe_refund_id: z.string().nullable(),

  // Promotions
  coupon_code: z.string().nullable(),
  referral_gallons_used: z.number().int().nonnegative(),
})

export const statusEventSchema = z.object({
  status: orderStatusSchema,
  occurred_at: z.number().int(),
})

export const userRowSchema = z.object({
  id: z.string().min(1),
  name: z.string().nullable(),
  email: z.string().nullable(),
  phone_number: z.string().nullable(),
  referral_code: z.string().nullable(),
  account_manager_id: z.string().nullable(),
  supports_rich_text: z.boolean(),
  is_courier: z.boolean(),
})

/**
 * Payload of the order/cancelled event: the order as it was before
 * cancellation plus the caller's choices.
 */
export const cancellationCompensationSchema = z.object({
  order: orderRowSchema,
  userId: z.string().min(1),
  originWasDashboard: z.boolean(),
  notifyCustomer: z.boolean(),
})
