/**
 * Row schemas for the ledger tables.
 *
 * Every repository parses what the driver returns through these, so the rest of
 * the code sees one shape regardless of dialect: Postgres hands back booleans,
 * Date objects and numeric strings where SQLite hands back 0/1, text and floats.
 */

import { z } from 'zod';

const bool = z.union([z.boolean(), z.number()]).transform((value) => value === true || value === 1);

const num = z.union([z.number(), z.string()]).transform((value) => Number(value));

const timestamp = z
  .union([z.string(), z.date()])
  .transform((value) => (value instanceof Date ? value.toISOString() : value));

const nullableTimestamp = timestamp.nullable();

const calendarDate = z
  .union([z.string(), z.date()])
  .transform((value) => (value instanceof Date ? value.toISOString().slice(0, 10) : value.slice(0, 10)));

const stringList = z
  .union([z.array(z.string()), z.string(), z.null()])
  .transform((value): string[] => {
    if (value === null) return [];
    if (Array.isArray(value)) return value;
    const parsed: unknown = JSON.parse(value);
    return z.array(z.string()).parse(parsed);
  });

export const driverRecordSchema = z.object({
  id: z.string(),
  phone_number: z.string(),
  name: z.string().nullable(),
  email: z.string().nullable(),
  preferred_language: z.string(),
  city: z.string().nullable(),
  vehicle_number: z.string().nullable(),
  is_active: bool,
  created_at: timestamp,
  updated_at: timestamp,
});

export const stationRecordSchema = z.object({
  id: z.string(),
  code: z.string(),
  name: z.string(),
  address: z.string().nullable(),
  landmark: z.string().nullable(),
  latitude: num,
  longitude: num,
  city: z.string(),
  pincode: z.string().nullable(),
  operating_hours: z.string(),
  contact_phone: z.string().nullable(),
  is_dsk: bool,
  is_active: bool,
  available_batteries: num.nullable().default(null),
  charging_batteries: num.nullable().default(null),
  total_slots: num.nullable().default(null),
});

export const dskRecordSchema = z.object({
  id: z.string(),
  code: z.string(),
  name: z.string(),
  address: z.string().nullable(),
  landmark: z.string().nullable(),
  latitude: num,
  longitude: num,
  city: z.string(),
  pincode: z.string().nullable(),
  phone: z.string().nullable(),
  operating_hours: z.string(),
  services: stringList,
  is_active: bool,
});

export const planRecordSchema = z.object({
  id: z.string(),
  code: z.string(),
  name: z.string(),
  name_hi: z.string().nullable(),
  price: num,
  validity_days: num,
  swaps_included: num,
  swaps_per_day: num,
  extra_swap_price: num,
  gst_percentage: num,
  description_en: z.string().nullable(),
  description_hi: z.string().nullable(),
  is_active: bool,
  created_at: timestamp,
  updated_at: timestamp,
});

export const subscriptionStatusSchema = z.enum(['active', 'expired', 'cancelled', 'suspended']);

export const subscriptionRecordSchema = z.object({
  id: z.string(),
  driver_id: z.string(),
  plan_id: z.string(),
  start_date: calendarDate,
  end_date: calendarDate,
  status: subscriptionStatusSchema,
  swaps_used: num,
  auto_renew: bool,
  battery_id: z.string().nullable(),
  battery_returned: bool,
  is_misplaced: bool,
  battery_returned_date: nullableTimestamp,
  created_at: timestamp,
  updated_at: timestamp,
});

export const swapStatusSchema = z.enum(['completed', 'failed', 'refunded']);

export const swapRecordSchema = z.object({
  id: z.string(),
  driver_id: z.string(),
  station_id: z.string(),
  subscription_id: z.string().nullable(),
  old_battery_id: z.string().nullable(),
  new_battery_id: z.string().nullable(),
  old_battery_charge_level: num.nullable(),
  new_battery_charge_level: num.nullable(),
  swap_time: timestamp,
  swap_date: calendarDate,
  is_subscription_swap: bool,
  charge_amount: num,
  status: swapStatusSchema,
});

export const swapHistoryRecordSchema = swapRecordSchema.extend({
  station_name: z.string(),
  station_code: z.string(),
  invoice_number: z.string().nullable(),
});

export const invoiceTypeSchema = z.enum(['swap', 'subscription', 'extra_swap']);
export const paymentStatusSchema = z.enum(['paid', 'pending', 'failed']);

export const invoiceRecordSchema = z.object({
  id: z.string(),
  invoice_number: z.string(),
  period: z.string(),
  driver_id: z.string(),
  swap_id: z.string().nullable(),
  subscription_id: z.string().nullable(),
  invoice_type: invoiceTypeSchema,
  amount: num,
  tax_amount: num,
  total_amount: num,
  description: z.string().nullable(),
  payment_status: paymentStatusSchema,
  generated_at: timestamp,
  updated_at: timestamp,
});

export const penaltyReasonSchema = z.enum(['battery_not_returned', 'late_return', 'damage']);
export const penaltyStatusSchema = z.enum(['pending', 'paid', 'waived']);

export const penaltyRecordSchema = z.object({
  id: z.string(),
  driver_id: z.string(),
  subscription_id: z.string(),
  reason: penaltyReasonSchema,
  days_overdue: num,
  daily_rate: num,
  total_amount: num,
  status: penaltyStatusSchema,
  created_at: timestamp,
  updated_at: timestamp,
  paid_at: nullableTimestamp,
});

export const leaveBalanceRecordSchema = z
  .object({
    id: z.string(),
    driver_id: z.string(),
    month_year: z.string(),
    total_leaves: num,
    used_leaves: num,
    created_at: timestamp,
    updated_at: timestamp,
  })
  .transform((row) => ({ ...row, remaining_leaves: row.total_leaves - row.used_leaves }));

export const leaveStatusSchema = z.enum(['pending', 'approved', 'rejected']);

export const leaveRequestRecordSchema = z.object({
  id: z.string(),
  driver_id: z.string(),
  start_date: calendarDate,
  end_date: calendarDate,
  days: num,
  reason: z.string().nullable(),
  status: leaveStatusSchema,
  created_at: timestamp,
  processed_at: nullableTimestamp,
  processed_by: z.string().nullable(),
  rejection_reason: z.string().nullable(),
});
