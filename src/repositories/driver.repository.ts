import { Knex } from 'knex';
import { driverRecordSchema } from '../schemas/record.schemas';
import { Driver, Executor } from '../types';
import { BaseRepository } from './base.repository';

export class DriverRepository extends BaseRepository<Driver> {
  constructor(db: Knex) {
    super('drivers', db, driverRecordSchema);
  }

  async findByPhone(phoneNumber: string, executor: Executor = this.db): Promise<Driver | null> {
    const row: unknown = await executor('drivers').where({ phone_number: phoneNumber }).first();
    return this.parseOptional(row);
  }

  async setActive(id: string, isActive: boolean, now: string, executor: Executor = this.db): Promise<Driver | null> {
    return this.update(id, { is_active: isActive, updated_at: now }, executor);
  }
}
