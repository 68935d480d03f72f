import { Knex } from 'knex';
import { dskRecordSchema } from '../schemas/record.schemas';
import { DskLocation, Executor } from '../types';
import { BaseRepository } from './base.repository';

export class DskRepository extends BaseRepository<DskLocation> {
  constructor(db: Knex) {
    super('dsk_locations', db, dskRecordSchema);
  }

  async findActive(city?: string, executor: Executor = this.db): Promise<DskLocation[]> {
    const query = executor('dsk_locations').where({ is_active: true });
    if (city) {
      query.whereRaw('LOWER(??) = ?', ['city', city.toLowerCase()]);
    }
    const rows: unknown[] = await query.orderBy('code', 'asc');
    return this.parseMany(rows);
  }
}
