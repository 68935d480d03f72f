import { Knex } from 'knex';
import { planRecordSchema } from '../schemas/record.schemas';
import { Executor, SubscriptionPlan } from '../types';
import { BaseRepository, RowData } from './base.repository';

export class PlanRepository extends BaseRepository<SubscriptionPlan> {
  constructor(db: Knex) {
    super('subscription_plans', db, planRecordSchema);
  }

  async findByCode(code: string, executor: Executor = this.db): Promise<SubscriptionPlan | null> {
    const row: unknown = await executor('subscription_plans').where({ code }).first();
    return this.parseOptional(row);
  }

  async findActive(executor: Executor = this.db): Promise<SubscriptionPlan[]> {
    const rows: unknown[] = await executor('subscription_plans')
      .where({ is_active: true })
      .orderBy('price', 'asc');
    return this.parseMany(rows);
  }

  /**
   * Insert or update by the natural key `code`.
   */
  async upsertByCode(data: RowData & { code: string }, executor: Executor = this.db): Promise<SubscriptionPlan> {
    const existing = await this.findByCode(data.code, executor);
    if (existing) {
      const { id: _ignored, created_at: _created, ...changes } = data;
      const updated = await this.update(existing.id, changes, executor);
      return updated ?? existing;
    }
    return this.create(data, executor);
  }
}
