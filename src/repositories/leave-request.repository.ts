import { Knex } from 'knex';
import { leaveRequestRecordSchema } from '../schemas/record.schemas';
import { DriverLeaveRequest, Executor, LeaveStatus } from '../types';
import { BaseRepository } from './base.repository';

export class LeaveRequestRepository extends BaseRepository<DriverLeaveRequest> {
  constructor(db: Knex) {
    super('driver_leaves', db, leaveRequestRecordSchema);
  }

  /**
   * Pending or approved requests whose range intersects [start, end].
   */
  async findOverlapping(driverId: string, start: string, end: string, executor: Executor = this.db): Promise<DriverLeaveRequest[]> {
    const rows: unknown[] = await executor('driver_leaves')
      .where({ driver_id: driverId })
      .whereIn('status', ['pending', 'approved'])
      .where('start_date', '<=', end)
      .where('end_date', '>=', start);
    return this.parseMany(rows);
  }

  async findByStatus(driverId: string, status: LeaveStatus, executor: Executor = this.db): Promise<DriverLeaveRequest[]> {
    const rows: unknown[] = await executor('driver_leaves')
      .where({ driver_id: driverId, status })
      .orderBy('start_date', 'asc');
    return this.parseMany(rows);
  }

  async findUpcomingApproved(driverId: string, today: string, executor: Executor = this.db): Promise<DriverLeaveRequest[]> {
    const rows: unknown[] = await executor('driver_leaves')
      .where({ driver_id: driverId, status: 'approved' })
      .where('end_date', '>=', today)
      .orderBy('start_date', 'asc');
    return this.parseMany(rows);
  }

  async lockById(id: string, trx: Knex.Transaction): Promise<DriverLeaveRequest | null> {
    const row: unknown = await trx('driver_leaves').where({ id }).forUpdate().first();
    return this.parseOptional(row);
  }

  /**
   * pending -> approved | rejected; returns false when the request had already been processed.
   */
  async resolve(
    id: string,
    status: Exclude<LeaveStatus, 'pending'>,
    actor: string,
    now: string,
    rejectionReason: string | null,
    executor: Executor = this.db
  ): Promise<boolean> {
    const updated = await executor('driver_leaves')
      .where({ id, status: 'pending' })
      .update({
        status,
        processed_at: now,
        processed_by: actor,
        rejection_reason: rejectionReason,
      });
    return updated > 0;
  }
}
