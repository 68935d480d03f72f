import { Knex } from 'knex';
import { getDb } from '../config/database';
import { logger } from '../config/logger';
import { DriverSubscriptionRepository } from '../repositories/driver-subscription.repository';
import { PenaltyRepository } from '../repositories/penalty.repository';
import {
  DriverSubscription,
  LedgerServiceOptions,
  PenaltyRecord,
  PenaltyResult,
  PenaltyStatus,
  PenaltyView,
} from '../types';
import { addDays, daysBetween } from '../utils/date.util';
import { Errors } from '../utils/error-handler.util';
import { inTransaction } from '../utils/transaction.util';
import { BaseService } from './base.service';
import { LEDGER_CHANNELS } from './ledger-events.service';

export interface PenaltyTerms {
  gracePeriodDays: number;
  dailyRate: number;
}

export const DEFAULT_PENALTY_TERMS: PenaltyTerms = {
  gracePeriodDays: 4,
  dailyRate: 80,
};

export type CustodyState = Pick<DriverSubscription, 'end_date' | 'battery_returned'>;

/**
 * Overdue-battery penalty of a subscription as of `today`. Pure.
 */
export function computePenalty(
  custody: CustodyState,
  today: string,
  terms: PenaltyTerms = DEFAULT_PENALTY_TERMS
): PenaltyResult {
  if (custody.battery_returned) {
    return { has_penalty: false, days_overdue: 0, daily_rate: terms.dailyRate, total_amount: 0 };
  }

  const daysOverdue = Math.max(0, daysBetween(custody.end_date, today) - terms.gracePeriodDays);
  return {
    has_penalty: daysOverdue > 0,
    days_overdue: daysOverdue,
    daily_rate: terms.dailyRate,
    total_amount: daysOverdue * terms.dailyRate,
  };
}

/**
 * Custody flag combinations that should never be written together.
 */
export function custodyWarnings(
  subscription: Pick<DriverSubscription, 'id' | 'battery_id' | 'battery_returned' | 'battery_returned_date' | 'is_misplaced'>
): string[] {
  const warnings: string[] = [];
  if (!subscription.battery_returned) {
    return warnings;
  }
  if (!subscription.battery_returned_date) {
    warnings.push(`Subscription ${subscription.id} is marked returned without a return date`);
  }
  if (subscription.is_misplaced) {
    warnings.push(`Subscription ${subscription.id} is marked both returned and misplaced`);
  }
  if (!subscription.battery_id) {
    warnings.push(`Subscription ${subscription.id} is marked returned but never held a battery`);
  }
  return warnings;
}

export interface PenaltySweepResult {
  evaluated_on: string;
  evaluated: number;
  created: number;
  refreshed: number;
}

export class PenaltyService extends BaseService {
  private repository: PenaltyRepository;
  private subscriptions: DriverSubscriptionRepository;

  constructor(db: Knex = getDb(), options: LedgerServiceOptions = {}) {
    super(db, options);
    this.repository = new PenaltyRepository(db);
    this.subscriptions = new DriverSubscriptionRepository(db);
  }

  async getPenalty(subscriptionId: string): Promise<PenaltyView> {
    const subscription = await this.subscriptions.findById(subscriptionId);
    if (!subscription) {
      throw Errors.notFound('Subscription', subscriptionId);
    }

    const { today } = this.moment();
    const result = computePenalty(subscription, today, this.rules.penalty);
    const warnings = custodyWarnings(subscription);
    if (warnings.length > 0) {
      logger.warn({ message: 'Incoherent custody flags', subscriptionId, warnings });
    }

    return {
      ...result,
      subscription_id: subscription.id,
      driver_id: subscription.driver_id,
      end_date: subscription.end_date,
      battery_id: subscription.battery_id,
      battery_returned: subscription.battery_returned,
      is_misplaced: subscription.is_misplaced,
      grace_period_days: this.rules.penalty.gracePeriodDays,
      evaluated_on: today,
      integrity_warnings: warnings,
    };
  }

  /**
   * Materialize one pending `battery_not_returned` record per overdue subscription.
   * Re-running on the same date leaves the records unchanged.
   */
  async sweep(evaluatedOn?: string): Promise<PenaltySweepResult> {
    const { today, now } = this.moment();
    const asOf = evaluatedOn ?? today;
    // Past the grace period means at least one overdue day
    const cutoff = addDays(asOf, -(this.rules.penalty.gracePeriodDays + 1));
    const candidates = await this.subscriptions.findUnreturnedEndedBy(cutoff);

    const result: PenaltySweepResult = { evaluated_on: asOf, evaluated: candidates.length, created: 0, refreshed: 0 };
    const accrued: PenaltyRecord[] = [];

    for (const subscription of candidates) {
      const penalty = computePenalty(subscription, asOf, this.rules.penalty);
      if (!penalty.has_penalty) {
        continue;
      }

      const record = await inTransaction(this.db, async (trx) => {
        const pending = await this.repository.findPending(subscription.id, 'battery_not_returned', trx);
        if (pending) {
          result.refreshed++;
          return this.repository.update(
            pending.id,
            {
              days_overdue: penalty.days_overdue,
              daily_rate: penalty.daily_rate,
              total_amount: penalty.total_amount,
              updated_at: now,
            },
            trx
          );
        }
        result.created++;
        return this.repository.create(
          {
            driver_id: subscription.driver_id,
            subscription_id: subscription.id,
            reason: 'battery_not_returned',
            days_overdue: penalty.days_overdue,
            daily_rate: penalty.daily_rate,
            total_amount: penalty.total_amount,
            status: 'pending',
            created_at: now,
            updated_at: now,
          },
          trx
        );
      });

      if (record) {
        accrued.push(record);
      }
    }

    logger.info({ message: 'Penalty sweep completed', ...result });

    for (const record of accrued) {
      await this.events.emit(LEDGER_CHANNELS.penalties, 'penalty.accrued', {
        penalty_id: record.id,
        driver_id: record.driver_id,
        subscription_id: record.subscription_id,
        days_overdue: record.days_overdue,
        total_amount: record.total_amount,
      });
    }

    return result;
  }

  async settle(penaltyId: string, status: Exclude<PenaltyStatus, 'pending'>): Promise<PenaltyRecord> {
    const existing = await this.repository.findById(penaltyId);
    if (!existing) {
      throw Errors.notFound('Penalty', penaltyId);
    }

    const { now } = this.moment();
    const settled = await this.repository.settle(penaltyId, status, now);
    if (!settled) {
      throw Errors.invalidInput(`Penalty ${penaltyId} is already ${existing.status}`);
    }

    const record = await this.repository.findById(penaltyId);
    if (!record) {
      throw Errors.notFound('Penalty', penaltyId);
    }

    logger.info({ message: 'Penalty settled', penaltyId, status });
    await this.events.emit(LEDGER_CHANNELS.penalties, 'penalty.settled', {
      penalty_id: record.id,
      driver_id: record.driver_id,
      status: record.status,
    });

    return record;
  }

  async listForDriver(driverId: string): Promise<PenaltyRecord[]> {
    return this.repository.findForDriver(driverId);
  }
}
