import { Knex } from 'knex';
import { subscriptionRecordSchema } from '../schemas/record.schemas';
import { DriverSubscription, Executor, SubscriptionStatus } from '../types';
import { BaseRepository } from './base.repository';

export class DriverSubscriptionRepository extends BaseRepository<DriverSubscription> {
  constructor(db: Knex) {
    super('driver_subscriptions', db, subscriptionRecordSchema);
  }

  /**
   * Subscriptions that count as "current" on `today`, most recent first.
   * More than one row here is a data-integrity problem the caller reports.
   */
  async findCurrentForDriver(driverId: string, today: string, executor: Executor = this.db): Promise<DriverSubscription[]> {
    const rows: unknown[] = await executor('driver_subscriptions')
      .where({ driver_id: driverId, status: 'active' })
      .where('end_date', '>=', today)
      .orderBy([
        { column: 'start_date', order: 'desc' },
        { column: 'created_at', order: 'desc' },
      ]);
    return this.parseMany(rows);
  }

  /**
   * `findCurrentForDriver` holding row locks; rows that stopped being current while
   * the lock was awaited drop out of the result.
   */
  async lockCurrentForDriver(driverId: string, today: string, trx: Knex.Transaction): Promise<DriverSubscription[]> {
    const rows: unknown[] = await trx('driver_subscriptions')
      .where({ driver_id: driverId, status: 'active' })
      .where('end_date', '>=', today)
      .orderBy([
        { column: 'start_date', order: 'desc' },
        { column: 'created_at', order: 'desc' },
      ])
      .forUpdate();
    return this.parseMany(rows);
  }

  async findForDriver(driverId: string, executor: Executor = this.db): Promise<DriverSubscription[]> {
    const rows: unknown[] = await executor('driver_subscriptions')
      .where({ driver_id: driverId })
      .orderBy([
        { column: 'start_date', order: 'desc' },
        { column: 'created_at', order: 'desc' },
      ]);
    return this.parseMany(rows);
  }

  /**
   * Row-level exclusive lock for the rest of the transaction.
   */
  async lockById(id: string, trx: Knex.Transaction): Promise<DriverSubscription | null> {
    const row: unknown = await trx('driver_subscriptions').where({ id }).forUpdate().first();
    return this.parseOptional(row);
  }

  async incrementUsage(id: string, now: string, trx: Knex.Transaction): Promise<void> {
    await trx('driver_subscriptions')
      .where({ id })
      .update({
        swaps_used: trx.raw('?? + 1', ['swaps_used']),
        updated_at: now,
      });
  }

  async assignBattery(id: string, batteryId: string, now: string, executor: Executor = this.db): Promise<DriverSubscription | null> {
    return this.update(
      id,
      {
        battery_id: batteryId,
        battery_returned: false,
        battery_returned_date: null,
        is_misplaced: false,
        updated_at: now,
      },
      executor
    );
  }

  /**
   * Only flips rows that are not yet returned; returns false when nothing changed.
   */
  async markReturned(id: string, returnedAt: string, now: string, executor: Executor = this.db): Promise<boolean> {
    const updated = await executor('driver_subscriptions')
      .where({ id, battery_returned: false })
      .update({
        battery_returned: true,
        battery_returned_date: returnedAt,
        is_misplaced: false,
        updated_at: now,
      });
    return updated > 0;
  }

  /**
   * Close custody on every other row of the driver that still holds a battery.
   * Returns the closed rows as they were, most recent first.
   */
  async closeOtherCustody(
    driverId: string,
    keepId: string,
    now: string,
    executor: Executor = this.db
  ): Promise<DriverSubscription[]> {
    const rows: unknown[] = await executor('driver_subscriptions')
      .where({ driver_id: driverId, battery_returned: false })
      .whereNot({ id: keepId })
      .whereNotNull('battery_id')
      .orderBy([
        { column: 'start_date', order: 'desc' },
        { column: 'created_at', order: 'desc' },
      ]);
    const holders = this.parseMany(rows);
    if (holders.length === 0) {
      return holders;
    }

    await executor('driver_subscriptions')
      .whereIn(
        'id',
        holders.map((holder) => holder.id)
      )
      .update({
        battery_returned: true,
        battery_returned_date: now,
        is_misplaced: false,
        updated_at: now,
      });
    return holders;
  }

  async markMisplaced(id: string, now: string, executor: Executor = this.db): Promise<DriverSubscription | null> {
    return this.update(id, { is_misplaced: true, updated_at: now }, executor);
  }

  /**
   * Conditional status transition; returns false when the row was not in `from`.
   */
  async transitionStatus(
    id: string,
    from: SubscriptionStatus,
    to: SubscriptionStatus,
    now: string,
    executor: Executor = this.db
  ): Promise<boolean> {
    const updated = await executor('driver_subscriptions')
      .where({ id, status: from })
      .update({ status: to, updated_at: now });
    return updated > 0;
  }

  async expireActiveForDriver(driverId: string, now: string, executor: Executor = this.db): Promise<number> {
    const expired = await executor('driver_subscriptions')
      .where({ driver_id: driverId, status: 'active' })
      .update({ status: 'expired', updated_at: now });
    return expired;
  }

  async expireLapsed(today: string, now: string, executor: Executor = this.db): Promise<number> {
    const expired = await executor('driver_subscriptions')
      .where({ status: 'active' })
      .where('end_date', '<', today)
      .update({ status: 'expired', updated_at: now });
    return expired;
  }

  /**
   * Subscriptions still holding a battery whose end date is on or before `endedOnOrBefore`.
   */
  async findUnreturnedEndedBy(endedOnOrBefore: string, executor: Executor = this.db): Promise<DriverSubscription[]> {
    const rows: unknown[] = await executor('driver_subscriptions')
      .where({ battery_returned: false })
      .whereNotNull('battery_id')
      .where('end_date', '<=', endedOnOrBefore)
      .orderBy('end_date', 'asc');
    return this.parseMany(rows);
  }

  async resetUsage(id: string, now: string, executor: Executor = this.db): Promise<DriverSubscription | null> {
    return this.update(id, { swaps_used: 0, updated_at: now }, executor);
  }
}
