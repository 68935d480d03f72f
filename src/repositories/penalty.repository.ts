import { Knex } from 'knex';
import { z } from 'zod';
import { penaltyReasonSchema, penaltyRecordSchema } from '../schemas/record.schemas';
import { Executor, PenaltyRecord, PenaltyStatus } from '../types';
import { BaseRepository } from './base.repository';

type PenaltyReason = z.infer<typeof penaltyReasonSchema>;

export class PenaltyRepository extends BaseRepository<PenaltyRecord> {
  constructor(db: Knex) {
    super('penalty_records', db, penaltyRecordSchema);
  }

  async findPending(subscriptionId: string, reason: PenaltyReason, executor: Executor = this.db): Promise<PenaltyRecord | null> {
    const row: unknown = await executor('penalty_records')
      .where({ subscription_id: subscriptionId, reason, status: 'pending' })
      .orderBy('created_at', 'desc')
      .first();
    return this.parseOptional(row);
  }

  async findForDriver(driverId: string, executor: Executor = this.db): Promise<PenaltyRecord[]> {
    const rows: unknown[] = await executor('penalty_records')
      .where({ driver_id: driverId })
      .orderBy('created_at', 'desc');
    return this.parseMany(rows);
  }

  /**
   * pending -> paid | waived; returns false when the record was already settled.
   */
  async settle(
    id: string,
    status: Exclude<PenaltyStatus, 'pending'>,
    now: string,
    executor: Executor = this.db
  ): Promise<boolean> {
    const updated = await executor('penalty_records')
      .where({ id, status: 'pending' })
      .update({
        status,
        paid_at: status === 'paid' ? now : null,
        updated_at: now,
      });
    return updated > 0;
  }
}
