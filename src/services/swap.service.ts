import { Knex } from 'knex';
import { z } from 'zod';
import { getDb } from '../config/database';
import { logger } from '../config/logger';
import { DriverSubscriptionRepository } from '../repositories/driver-subscription.repository';
import { DriverRepository } from '../repositories/driver.repository';
import { SwapRepository } from '../repositories/swap.repository';
import { Driver, Invoice, LedgerServiceOptions, Station, SwapEvent, SwapHistory, SwapResult } from '../types';
import { addDays, isCalendarDate, startOfMonth, startOfWeek, startOfYear } from '../utils/date.util';
import { Errors, parseInput } from '../utils/error-handler.util';
import { percentToRate, round2 } from '../utils/money.util';
import { inTransaction } from '../utils/transaction.util';
import { BaseService } from './base.service';
import { EntitlementService } from './entitlement.service';
import { InvoiceService } from './invoice.service';
import { LEDGER_CHANNELS } from './ledger-events.service';
import { StationService } from './station.service';

const chargeLevel = z.number().int().min(0).max(100);

export const recordSwapSchema = z.object({
  driver_id: z.string().uuid(),
  station_id: z.string().uuid(),
  old_battery_id: z.string().trim().min(1),
  new_battery_id: z.string().trim().min(1),
  old_charge_pct: chargeLevel,
  new_charge_pct: chargeLevel,
});

export type RecordSwapInput = z.input<typeof recordSwapSchema>;

export const SWAP_PERIODS = [
  'today',
  'yesterday',
  'last_week',
  'last_month',
  'this_week',
  'this_month',
  'last_year',
  'this_year',
  'all',
] as const;
export type SwapPeriod = (typeof SWAP_PERIODS)[number];

const MAX_PERIOD_DAYS = 3650;

/** A named period, or a number of days back from today ("7"). */
export const swapPeriodSchema = z.union([
  z.enum(SWAP_PERIODS),
  z
    .string()
    .regex(/^\d+$/, 'Period must be a named period or a number of days')
    .transform(Number)
    .pipe(z.number().int().min(1).max(MAX_PERIOD_DAYS)),
]);

const HISTORY_EPOCH = '2020-01-01';
const DEFAULT_HISTORY_LIMIT = 50;
const MAX_HISTORY_LIMIT = 200;

export interface SwapHistoryQuery {
  period?: SwapPeriod | number;
  from?: string;
  to?: string;
  limit?: number;
}

/**
 * Inclusive date range of a named period, or of explicit bounds defaulting to today.
 */
export function resolveSwapRange(query: SwapHistoryQuery, today: string): { from: string; to: string } {
  switch (query.period) {
    case 'today':
      return { from: today, to: today };
    case 'yesterday':
      return { from: addDays(today, -1), to: addDays(today, -1) };
    case 'last_week':
      return { from: addDays(today, -7), to: today };
    case 'last_month':
      return { from: addDays(today, -30), to: today };
    case 'this_week':
      return { from: startOfWeek(today), to: today };
    case 'this_month':
      return { from: startOfMonth(today), to: today };
    case 'this_year':
      return { from: startOfYear(today), to: today };
    case 'last_year': {
      const lastDay = addDays(startOfYear(today), -1);
      return { from: startOfYear(lastDay), to: lastDay };
    }
    case 'all':
      return { from: HISTORY_EPOCH, to: today };
    case undefined:
      break;
    default: {
      if (!Number.isInteger(query.period) || query.period < 1 || query.period > MAX_PERIOD_DAYS) {
        throw Errors.invalidInput(`Period must be between 1 and ${MAX_PERIOD_DAYS} days`);
      }
      return { from: addDays(today, -query.period), to: today };
    }
  }

  const from = query.from ?? today;
  const to = query.to ?? today;
  if (!isCalendarDate(from) || !isCalendarDate(to)) {
    throw Errors.invalidInput('Dates must be YYYY-MM-DD');
  }
  if (from > to) {
    throw Errors.invalidInput('Start date must not be after end date');
  }
  return { from, to };
}

export class SwapService extends BaseService {
  private swaps: SwapRepository;
  private drivers: DriverRepository;
  private subscriptions: DriverSubscriptionRepository;
  private stations: StationService;
  private entitlements: EntitlementService;
  private invoices: InvoiceService;

  constructor(db: Knex = getDb(), options: LedgerServiceOptions = {}) {
    super(db, options);
    this.swaps = new SwapRepository(db);
    this.drivers = new DriverRepository(db);
    this.subscriptions = new DriverSubscriptionRepository(db);
    this.stations = new StationService(db);
    this.entitlements = new EntitlementService(db, this.options());
    this.invoices = new InvoiceService(db, this.options());
  }

  /**
   * Record a completed battery exchange.
   *
   * Consumption, the swap row, the custody move and any invoice are written in
   * one transaction. A driver without a current subscription pays per swap.
   */
  async recordSwap(input: RecordSwapInput): Promise<SwapResult> {
    const data = parseInput(recordSwapSchema, input);
    const { driver, station } = await this.requireParticipants(data.driver_id, data.station_id);
    const { today, now } = this.moment();

    const outcome = await inTransaction(this.db, async (trx) => {
      const current = await this.subscriptions.lockCurrentForDriver(driver.id, today, trx);
      if (current.length > 1) {
        logger.warn({
          message: 'Multiple active subscriptions while recording swap',
          driverId: driver.id,
          subscriptionIds: current.map((s) => s.id),
        });
      }
      const subscription = current.length > 0 ? current[0] : null;

      const consumption = subscription
        ? await this.entitlements.consumeSwap(subscription.id, { battery_id: data.new_battery_id }, trx)
        : null;
      const covered = consumption?.covered ?? false;
      const chargeAmount = consumption ? consumption.charge_amount : this.rules.payPerSwapPrice;

      const swap = await this.swaps.create(
        {
          driver_id: driver.id,
          station_id: station.id,
          subscription_id: subscription?.id ?? null,
          old_battery_id: data.old_battery_id,
          new_battery_id: data.new_battery_id,
          old_battery_charge_level: data.old_charge_pct,
          new_battery_charge_level: data.new_charge_pct,
          swap_time: now,
          swap_date: today,
          is_subscription_swap: covered,
          charge_amount: chargeAmount,
          status: 'completed',
        },
        trx
      );

      let invoice: Invoice | null = null;
      if (chargeAmount > 0) {
        invoice = await this.invoices.createInvoice(
          {
            invoice_type: consumption ? 'extra_swap' : 'swap',
            driver_id: driver.id,
            swap_id: swap.id,
            subscription_id: subscription?.id ?? null,
            amount: chargeAmount,
            tax_rate: percentToRate(consumption ? consumption.plan.gst_percentage : this.rules.defaultGstPercentage),
            description: consumption
              ? `Extra swap at ${station.name} (${consumption.plan.code})`
              : `Pay-per-swap at ${station.name}`,
          },
          trx
        );
      }

      return { swap, invoice, consumption };
    });

    const result: SwapResult = {
      swap_id: outcome.swap.id,
      subscription_id: outcome.swap.subscription_id,
      covered: outcome.swap.is_subscription_swap,
      charge_amount: outcome.swap.charge_amount,
      invoice_number: outcome.invoice?.invoice_number ?? null,
      invoice_total: outcome.invoice?.total_amount ?? null,
      swaps_remaining: outcome.consumption?.swaps_remaining_after ?? null,
    };

    logger.info({ message: 'Swap recorded', driverId: driver.id, stationId: station.id, ...result });
    await this.events.emit(LEDGER_CHANNELS.swaps, 'swap.recorded', {
      ...result,
      driver_id: driver.id,
      station_id: station.id,
    });
    if (outcome.invoice) {
      await this.invoices.announce(outcome.invoice);
    }

    return result;
  }

  /**
   * Record an exchange the station could not complete. No counters move and nothing is billed.
   */
  async recordFailedSwap(input: RecordSwapInput, reason: string): Promise<SwapEvent> {
    const data = parseInput(recordSwapSchema, input);
    const { driver, station } = await this.requireParticipants(data.driver_id, data.station_id);
    const { today, now } = this.moment();
    const current = await this.subscriptions.findCurrentForDriver(driver.id, today);

    const swap = await this.swaps.create({
      driver_id: driver.id,
      station_id: station.id,
      subscription_id: current.length > 0 ? current[0].id : null,
      old_battery_id: data.old_battery_id,
      new_battery_id: data.new_battery_id,
      old_battery_charge_level: data.old_charge_pct,
      new_battery_charge_level: data.new_charge_pct,
      swap_time: now,
      swap_date: today,
      is_subscription_swap: false,
      charge_amount: 0,
      status: 'failed',
    });

    logger.warn({ message: 'Swap failed at station', swapId: swap.id, driverId: driver.id, stationId: station.id, reason });
    await this.events.emit(LEDGER_CHANNELS.swaps, 'swap.failed', {
      swap_id: swap.id,
      driver_id: driver.id,
      station_id: station.id,
      reason,
    });

    return swap;
  }

  async listSwapHistory(driverId: string, query: SwapHistoryQuery = {}): Promise<SwapHistory> {
    const driver = await this.drivers.findById(driverId);
    if (!driver) {
      throw Errors.notFound('Driver', driverId);
    }

    const { today } = this.moment();
    const { from, to } = resolveSwapRange(query, today);
    const limit = Math.min(MAX_HISTORY_LIMIT, Math.max(1, Math.trunc(query.limit ?? DEFAULT_HISTORY_LIMIT)));
    const swaps = await this.swaps.findHistory(driverId, from, to, limit);
    const completed = swaps.filter((swap) => swap.status === 'completed');

    return {
      driver_id: driverId,
      from,
      to,
      swaps,
      total_swaps: completed.length,
      free_swaps: completed.filter((swap) => swap.is_subscription_swap).length,
      total_charged: round2(completed.reduce((sum, swap) => sum + swap.charge_amount, 0)),
    };
  }

  private async requireParticipants(driverId: string, stationId: string): Promise<{ driver: Driver; station: Station }> {
    const driver = await this.drivers.findById(driverId);
    if (!driver || !driver.is_active) {
      throw Errors.notFound('Driver', driverId);
    }
    const station = await this.stations.requireStation(stationId);
    return { driver, station };
  }
}
