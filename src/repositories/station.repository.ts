import { Knex } from 'knex';
import { stationRecordSchema } from '../schemas/record.schemas';
import { Executor, Station } from '../types';
import { BaseRepository } from './base.repository';

const STATION_COLUMNS = [
  's.*',
  'si.available_batteries',
  'si.charging_batteries',
  'si.total_slots',
];

export class StationRepository extends BaseRepository<Station> {
  constructor(db: Knex) {
    super('stations', db, stationRecordSchema);
  }

  override async findById(id: string, executor: Executor = this.db): Promise<Station | null> {
    const row: unknown = await executor('stations as s')
      .leftJoin('station_inventory as si', 'si.station_id', 's.id')
      .where('s.id', id)
      .first(STATION_COLUMNS);
    return this.parseOptional(row);
  }

  async findActiveWithInventory(executor: Executor = this.db): Promise<Station[]> {
    const rows: unknown[] = await executor('stations as s')
      .leftJoin('station_inventory as si', 'si.station_id', 's.id')
      .where('s.is_active', true)
      .select(STATION_COLUMNS);
    return this.parseMany(rows);
  }

  async findByCode(code: string, executor: Executor = this.db): Promise<Station | null> {
    const row: unknown = await executor('stations as s')
      .leftJoin('station_inventory as si', 'si.station_id', 's.id')
      .where('s.code', code)
      .first(STATION_COLUMNS);
    return this.parseOptional(row);
  }
}
