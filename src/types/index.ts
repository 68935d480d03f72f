import { z } from 'zod';
import type { Knex } from 'knex';
import type { LedgerRules } from '../config';
import type { LedgerEvents } from '../services/ledger-events.service';
import type { Clock } from '../utils/date.util';
import {
  driverRecordSchema,
  dskRecordSchema,
  invoiceRecordSchema,
  invoiceTypeSchema,
  leaveBalanceRecordSchema,
  leaveRequestRecordSchema,
  leaveStatusSchema,
  paymentStatusSchema,
  penaltyRecordSchema,
  penaltyStatusSchema,
  planRecordSchema,
  stationRecordSchema,
  subscriptionRecordSchema,
  subscriptionStatusSchema,
  swapHistoryRecordSchema,
  swapRecordSchema,
  swapStatusSchema,
} from '../schemas/record.schemas';

/** Sentinel for "no limit" on swaps_included and swaps_per_day. */
export const UNLIMITED = -1;

export type Driver = z.infer<typeof driverRecordSchema>;
export type Station = z.infer<typeof stationRecordSchema>;
export type DskLocation = z.infer<typeof dskRecordSchema>;
export type SubscriptionPlan = z.infer<typeof planRecordSchema>;
export type SubscriptionStatus = z.infer<typeof subscriptionStatusSchema>;
export type DriverSubscription = z.infer<typeof subscriptionRecordSchema>;
export type SwapStatus = z.infer<typeof swapStatusSchema>;
export type SwapEvent = z.infer<typeof swapRecordSchema>;
export type SwapHistoryEntry = z.infer<typeof swapHistoryRecordSchema>;
export type InvoiceType = z.infer<typeof invoiceTypeSchema>;
export type PaymentStatus = z.infer<typeof paymentStatusSchema>;
export type Invoice = z.infer<typeof invoiceRecordSchema>;
export type PenaltyStatus = z.infer<typeof penaltyStatusSchema>;
export type PenaltyRecord = z.infer<typeof penaltyRecordSchema>;
export type LeaveBalance = z.infer<typeof leaveBalanceRecordSchema>;
export type LeaveStatus = z.infer<typeof leaveStatusSchema>;
export type DriverLeaveRequest = z.infer<typeof leaveRequestRecordSchema>;

/** The root knex instance or an open transaction (Knex.Transaction extends Knex). */
export type Executor = Knex;

/** Collaborators every ledger service accepts; omitted ones fall back to the process defaults. */
export interface LedgerServiceOptions {
  clock?: Clock;
  rules?: LedgerRules;
  events?: LedgerEvents;
}

export interface PenaltyResult {
  has_penalty: boolean;
  days_overdue: number;
  daily_rate: number;
  total_amount: number;
}

export interface PenaltyView extends PenaltyResult {
  subscription_id: string;
  driver_id: string;
  end_date: string;
  battery_id: string | null;
  battery_returned: boolean;
  is_misplaced: boolean;
  grace_period_days: number;
  evaluated_on: string;
  integrity_warnings: string[];
}

export interface EntitlementView {
  subscription_id: string;
  driver_id: string;
  plan: Pick<
    SubscriptionPlan,
    'id' | 'code' | 'name' | 'name_hi' | 'price' | 'validity_days' | 'swaps_included' | 'swaps_per_day' | 'extra_swap_price' | 'gst_percentage'
  >;
  start_date: string;
  end_date: string;
  status: SubscriptionStatus;
  auto_renew: boolean;
  swaps_used: number;
  swaps_used_today: number;
  /** UNLIMITED when the plan has no quota. */
  swaps_remaining: number;
  days_remaining: number;
  battery_id: string | null;
  battery_returned: boolean;
  is_misplaced: boolean;
  penalty: PenaltyResult;
  integrity_warnings: string[];
}

export interface CoverageDecision {
  covered: boolean;
  charge_amount: number;
}

export interface ConsumeSwapResult extends CoverageDecision {
  subscription: DriverSubscription;
  plan: SubscriptionPlan;
  swaps_remaining_after: number;
}

export interface SwapResult {
  swap_id: string;
  subscription_id: string | null;
  covered: boolean;
  charge_amount: number;
  invoice_number: string | null;
  invoice_total: number | null;
  swaps_remaining: number | null;
}

export interface SwapHistory {
  driver_id: string;
  from: string;
  to: string;
  swaps: SwapHistoryEntry[];
  total_swaps: number;
  free_swaps: number;
  total_charged: number;
}

export interface StationDistance {
  station: Station;
  distance_km: number;
}

export interface DriverProfile extends Driver {
  current_subscription: {
    subscription_id: string;
    plan_code: string;
    end_date: string;
    swaps_remaining: number;
  } | null;
  total_swaps_this_month: number;
  pending_leaves: number;
}

export interface LeaveSummary {
  driver_id: string;
  balance: LeaveBalance;
  pending_requests: DriverLeaveRequest[];
  upcoming_leaves: DriverLeaveRequest[];
}
