import { Knex } from 'knex';
import { getDb } from '../config/database';
import { DskRepository } from '../repositories/dsk.repository';
import { DskLocation } from '../types';

export interface DskFilter {
  city?: string;
  service?: string;
}

export class DskService {
  private repository: DskRepository;

  constructor(db: Knex = getDb()) {
    this.repository = new DskRepository(db);
  }

  async listDskCenters(filter: DskFilter = {}): Promise<DskLocation[]> {
    const centers = await this.repository.findActive(filter.city?.trim() || undefined);
    const service = filter.service?.trim().toLowerCase();
    if (!service) {
      return centers;
    }
    return centers.filter((center) => center.services.some((offered) => offered.toLowerCase() === service));
  }
}
