import { randomUUID } from 'crypto';
import { Knex } from 'knex';
import { leaveBalanceRecordSchema } from '../schemas/record.schemas';
import { Executor, LeaveBalance } from '../types';
import { BaseRepository } from './base.repository';

export class LeaveBalanceRepository extends BaseRepository<LeaveBalance> {
  constructor(db: Knex) {
    super('leave_balance', db, leaveBalanceRecordSchema);
  }

  async find(driverId: string, monthYear: string, executor: Executor = this.db): Promise<LeaveBalance | null> {
    const row: unknown = await executor('leave_balance').where({ driver_id: driverId, month_year: monthYear }).first();
    return this.parseOptional(row);
  }

  /**
   * INSERT ... ON CONFLICT DO NOTHING on (driver_id, month_year).
   * A concurrent creator wins silently; the caller reads whichever row exists.
   */
  async insertIfAbsent(
    driverId: string,
    monthYear: string,
    totalLeaves: number,
    now: string,
    executor: Executor = this.db
  ): Promise<void> {
    await executor('leave_balance')
      .insert({
        id: randomUUID(),
        driver_id: driverId,
        month_year: monthYear,
        total_leaves: totalLeaves,
        used_leaves: 0,
        created_at: now,
        updated_at: now,
      })
      .onConflict(['driver_id', 'month_year'])
      .ignore();
  }

  async lock(driverId: string, monthYear: string, trx: Knex.Transaction): Promise<LeaveBalance | null> {
    const row: unknown = await trx('leave_balance')
      .where({ driver_id: driverId, month_year: monthYear })
      .forUpdate()
      .first();
    return this.parseOptional(row);
  }

  async addUsed(id: string, days: number, now: string, trx: Knex.Transaction): Promise<void> {
    await trx('leave_balance')
      .where({ id })
      .update({
        used_leaves: trx.raw('?? + ?', ['used_leaves', days]),
        updated_at: now,
      });
  }
}
