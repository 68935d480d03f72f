import { Knex } from 'knex';
import { swapHistoryRecordSchema, swapRecordSchema } from '../schemas/record.schemas';
import { Executor, SwapEvent, SwapHistoryEntry } from '../types';
import { BaseRepository, countOf } from './base.repository';

export class SwapRepository extends BaseRepository<SwapEvent> {
  constructor(db: Knex) {
    super('swaps', db, swapRecordSchema);
  }

  /**
   * Completed swaps charged against a subscription on one business date.
   */
  async countCompletedOnDate(subscriptionId: string, swapDate: string, executor: Executor = this.db): Promise<number> {
    const row: unknown = await executor('swaps')
      .where({ subscription_id: subscriptionId, swap_date: swapDate, status: 'completed' })
      .count({ count: '*' })
      .first();
    return countOf(row);
  }

  async countForDriverSince(driverId: string, fromDate: string, executor: Executor = this.db): Promise<number> {
    const row: unknown = await executor('swaps')
      .where({ driver_id: driverId, status: 'completed' })
      .where('swap_date', '>=', fromDate)
      .count({ count: '*' })
      .first();
    return countOf(row);
  }

  async findHistory(
    driverId: string,
    from: string,
    to: string,
    limit: number,
    executor: Executor = this.db
  ): Promise<SwapHistoryEntry[]> {
    const rows: unknown[] = await executor('swaps as sw')
      .join('stations as s', 'sw.station_id', 's.id')
      .leftJoin('invoices as i', 'i.swap_id', 'sw.id')
      .where('sw.driver_id', driverId)
      .whereBetween('sw.swap_date', [from, to])
      .select('sw.*', 's.name as station_name', 's.code as station_code', 'i.invoice_number')
      .orderBy('sw.swap_time', 'desc')
      .limit(limit);
    return rows.map((row) => swapHistoryRecordSchema.parse(row));
  }
}
