import { Knex } from 'knex';
import { getDb } from '../config/database';
import { logger } from '../config/logger';
import { DriverSubscriptionRepository } from '../repositories/driver-subscription.repository';
import { DriverRepository } from '../repositories/driver.repository';
import { PlanRepository } from '../repositories/plan.repository';
import { SwapRepository } from '../repositories/swap.repository';
import {
  ConsumeSwapResult,
  DriverSubscription,
  EntitlementView,
  Invoice,
  LedgerServiceOptions,
  SubscriptionPlan,
  SubscriptionStatus,
} from '../types';
import { decideCoverage, swapsRemaining } from '../utils/coverage.util';
import { addDays, daysBetween, isCalendarDate } from '../utils/date.util';
import { Errors } from '../utils/error-handler.util';
import { percentToRate } from '../utils/money.util';
import { inTransaction } from '../utils/transaction.util';
import { BaseService } from './base.service';
import { InvoiceService } from './invoice.service';
import { computePenalty, custodyWarnings } from './penalty.service';

export interface CreateSubscriptionOptions {
  auto_renew?: boolean;
  start_date?: string;
}

export interface CreatedSubscription {
  subscription: DriverSubscription;
  plan: SubscriptionPlan;
  invoice: Invoice;
  superseded: number;
  /** Battery moved over from a replaced subscription, if any. */
  carried_battery_id: string | null;
}

export class EntitlementService extends BaseService {
  private subscriptions: DriverSubscriptionRepository;
  private plans: PlanRepository;
  private drivers: DriverRepository;
  private swaps: SwapRepository;
  private invoices: InvoiceService;

  constructor(db: Knex = getDb(), options: LedgerServiceOptions = {}) {
    super(db, options);
    this.subscriptions = new DriverSubscriptionRepository(db);
    this.plans = new PlanRepository(db);
    this.drivers = new DriverRepository(db);
    this.swaps = new SwapRepository(db);
    this.invoices = new InvoiceService(db, this.options());
  }

  /**
   * The driver's current subscription with quota, validity and custody figures.
   *
   * Current means `active` with `end_date >= today`. When several rows qualify the
   * most recently started one wins and the others are reported as integrity warnings.
   */
  async getActiveEntitlement(driverId: string): Promise<EntitlementView> {
    const driver = await this.drivers.findById(driverId);
    if (!driver) {
      throw Errors.notFound('Driver', driverId);
    }

    const { today } = this.moment();
    const current = await this.subscriptions.findCurrentForDriver(driverId, today);
    if (current.length === 0) {
      throw Errors.notFound('Active subscription for driver', driverId);
    }

    const subscription = current[0];
    const warnings: string[] = [];
    if (current.length > 1) {
      warnings.push(
        `Driver ${driverId} has ${current.length} active subscriptions; using ${subscription.id}, ignoring ${current
          .slice(1)
          .map((s) => s.id)
          .join(', ')}`
      );
    }
    warnings.push(...custodyWarnings(subscription));
    if (warnings.length > 0) {
      logger.warn({ message: 'Entitlement integrity warnings', driverId, warnings });
    }

    const plan = await this.requirePlan(subscription.plan_id);
    const swapsUsedToday = await this.swaps.countCompletedOnDate(subscription.id, today);

    return {
      subscription_id: subscription.id,
      driver_id: subscription.driver_id,
      plan: {
        id: plan.id,
        code: plan.code,
        name: plan.name,
        name_hi: plan.name_hi,
        price: plan.price,
        validity_days: plan.validity_days,
        swaps_included: plan.swaps_included,
        swaps_per_day: plan.swaps_per_day,
        extra_swap_price: plan.extra_swap_price,
        gst_percentage: plan.gst_percentage,
      },
      start_date: subscription.start_date,
      end_date: subscription.end_date,
      status: subscription.status,
      auto_renew: subscription.auto_renew,
      swaps_used: subscription.swaps_used,
      swaps_used_today: swapsUsedToday,
      swaps_remaining: swapsRemaining(plan, subscription.swaps_used),
      days_remaining: Math.max(0, daysBetween(today, subscription.end_date)),
      battery_id: subscription.battery_id,
      battery_returned: subscription.battery_returned,
      is_misplaced: subscription.is_misplaced,
      penalty: computePenalty(subscription, today, this.rules.penalty),
      integrity_warnings: warnings,
    };
  }

  /**
   * Charge one swap against a subscription.
   *
   * The subscription row stays locked until the transaction ends, so two swaps
   * for the same subscription never both see the last covered slot.
   */
  async consumeSwap(
    subscriptionId: string,
    options: { battery_id?: string } = {},
    trx?: Knex.Transaction
  ): Promise<ConsumeSwapResult> {
    const { today, now } = this.moment();

    return inTransaction(
      this.db,
      async (t) => {
        const locked = await this.subscriptions.lockById(subscriptionId, t);
        if (!locked) {
          throw Errors.notFound('Subscription', subscriptionId);
        }
        if (locked.status !== 'active' || locked.end_date < today) {
          throw Errors.invalidInput(`Subscription ${subscriptionId} is not active`);
        }

        const plan = await this.requirePlan(locked.plan_id, t);
        const swapsUsedToday = await this.swaps.countCompletedOnDate(subscriptionId, today, t);
        const decision = decideCoverage(plan, locked.swaps_used, swapsUsedToday);

        await this.subscriptions.incrementUsage(subscriptionId, now, t);
        if (options.battery_id) {
          await this.subscriptions.assignBattery(subscriptionId, options.battery_id, now, t);
          await this.subscriptions.closeOtherCustody(locked.driver_id, subscriptionId, now, t);
        }

        const subscription = await this.subscriptions.findById(subscriptionId, t);
        if (!subscription) {
          throw Errors.notFound('Subscription', subscriptionId);
        }

        return {
          ...decision,
          subscription,
          plan,
          swaps_remaining_after: swapsRemaining(plan, subscription.swaps_used),
        };
      },
      trx
    );
  }

  async setCustody(subscriptionId: string, batteryId: string): Promise<DriverSubscription> {
    if (batteryId.trim() === '') {
      throw Errors.invalidInput('Battery ID is required');
    }
    const { now } = this.moment();
    const subscription = await this.subscriptions.assignBattery(subscriptionId, batteryId.trim(), now);
    if (!subscription) {
      throw Errors.notFound('Subscription', subscriptionId);
    }

    logger.info({ message: 'Battery custody assigned', subscriptionId, batteryId: subscription.battery_id });
    return subscription;
  }

  /**
   * Record the battery as returned. Returning an already-returned battery changes nothing.
   */
  async markReturned(subscriptionId: string, returnedAt?: string): Promise<DriverSubscription> {
    const existing = await this.requireSubscription(subscriptionId);
    if (existing.battery_returned) {
      return existing;
    }

    const { now } = this.moment();
    const changed = await this.subscriptions.markReturned(subscriptionId, returnedAt ?? now, now);
    if (changed) {
      logger.info({ message: 'Battery returned', subscriptionId, batteryId: existing.battery_id });
    }
    return this.requireSubscription(subscriptionId);
  }

  async markMisplaced(subscriptionId: string): Promise<DriverSubscription> {
    const { now } = this.moment();
    const subscription = await this.subscriptions.markMisplaced(subscriptionId, now);
    if (!subscription) {
      throw Errors.notFound('Subscription', subscriptionId);
    }

    logger.warn({ message: 'Battery marked misplaced', subscriptionId, batteryId: subscription.battery_id });
    return subscription;
  }

  /**
   * Start a subscription on a plan, superseding the driver's active ones, and
   * issue its invoice in the same transaction.
   */
  async createSubscription(
    driverId: string,
    planCode: string,
    options: CreateSubscriptionOptions = {}
  ): Promise<CreatedSubscription> {
    const { today, now } = this.moment();
    const startDate = options.start_date ?? today;
    if (!isCalendarDate(startDate)) {
      throw Errors.invalidInput(`Invalid start date: ${startDate}`);
    }
    if (startDate < today) {
      throw Errors.invalidInput('Subscription cannot start in the past');
    }

    const driver = await this.drivers.findById(driverId);
    if (!driver) {
      throw Errors.notFound('Driver', driverId);
    }
    if (!driver.is_active) {
      throw Errors.invalidInput(`Driver ${driverId} is deactivated`);
    }

    const plan = await this.plans.findByCode(planCode.trim().toUpperCase());
    if (!plan) {
      throw Errors.notFound('Subscription plan', planCode);
    }
    if (!plan.is_active) {
      throw Errors.invalidInput(`Plan ${plan.code} is no longer offered`);
    }

    const created = await inTransaction(this.db, async (trx) => {
      const superseded = await this.subscriptions.expireActiveForDriver(driverId, now, trx);
      const subscription = await this.subscriptions.create(
        {
          driver_id: driverId,
          plan_id: plan.id,
          start_date: startDate,
          end_date: addDays(startDate, plan.validity_days),
          status: 'active',
          swaps_used: 0,
          auto_renew: options.auto_renew ?? false,
          battery_id: null,
          battery_returned: false,
          is_misplaced: false,
          battery_returned_date: null,
          created_at: now,
          updated_at: now,
        },
        trx
      );
      // The driver keeps the battery held under the subscriptions being replaced
      const [holder] = await this.subscriptions.closeOtherCustody(driverId, subscription.id, now, trx);
      const renewed = holder
        ? await this.subscriptions.update(
            subscription.id,
            { battery_id: holder.battery_id, is_misplaced: holder.is_misplaced, updated_at: now },
            trx
          )
        : subscription;
      if (!renewed) {
        throw Errors.notFound('Subscription', subscription.id);
      }
      const invoice = await this.invoices.createInvoice(
        {
          invoice_type: 'subscription',
          driver_id: driverId,
          subscription_id: renewed.id,
          amount: plan.price,
          tax_rate: percentToRate(plan.gst_percentage),
          description: `${plan.name} (${renewed.start_date} to ${renewed.end_date})`,
        },
        trx
      );
      return { subscription: renewed, plan, invoice, superseded, carried_battery_id: holder ? holder.battery_id : null };
    });

    logger.info({
      message: 'Subscription created',
      subscriptionId: created.subscription.id,
      driverId,
      plan: plan.code,
      superseded: created.superseded,
      carriedBatteryId: created.carried_battery_id,
    });
    await this.invoices.announce(created.invoice);

    return created;
  }

  async cancel(subscriptionId: string): Promise<DriverSubscription> {
    return this.transition(subscriptionId, 'cancelled');
  }

  async suspend(subscriptionId: string): Promise<DriverSubscription> {
    return this.transition(subscriptionId, 'suspended');
  }

  /**
   * Date-driven `active -> expired` sweep.
   */
  async expireLapsed(asOf?: string): Promise<number> {
    const { today, now } = this.moment();
    const expired = await this.subscriptions.expireLapsed(asOf ?? today, now);
    logger.info({ message: 'Expiry sweep completed', asOf: asOf ?? today, expired });
    return expired;
  }

  /**
   * Administrative reset of the usage counter; the only way `swaps_used` goes down.
   */
  async resetUsage(subscriptionId: string): Promise<DriverSubscription> {
    const { now } = this.moment();
    const subscription = await this.subscriptions.resetUsage(subscriptionId, now);
    if (!subscription) {
      throw Errors.notFound('Subscription', subscriptionId);
    }

    logger.warn({ message: 'Subscription usage reset', subscriptionId });
    return subscription;
  }

  async listForDriver(driverId: string): Promise<DriverSubscription[]> {
    return this.subscriptions.findForDriver(driverId);
  }

  private async transition(subscriptionId: string, to: SubscriptionStatus): Promise<DriverSubscription> {
    const existing = await this.requireSubscription(subscriptionId);
    const { now } = this.moment();
    const changed = await this.subscriptions.transitionStatus(subscriptionId, 'active', to, now);
    if (!changed) {
      throw Errors.invalidInput(`Cannot move subscription from ${existing.status} to ${to}`);
    }

    logger.info({ message: 'Subscription status changed', subscriptionId, from: 'active', to });
    return this.requireSubscription(subscriptionId);
  }

  private async requireSubscription(subscriptionId: string): Promise<DriverSubscription> {
    const subscription = await this.subscriptions.findById(subscriptionId);
    if (!subscription) {
      throw Errors.notFound('Subscription', subscriptionId);
    }
    return subscription;
  }

  private async requirePlan(planId: string, trx?: Knex.Transaction): Promise<SubscriptionPlan> {
    const plan = await this.plans.findById(planId, trx);
    if (!plan) {
      throw Errors.notFound('Subscription plan', planId);
    }
    return plan;
  }
}
