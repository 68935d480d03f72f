import { randomUUID } from 'crypto';
import { Knex } from 'knex';
import { z } from 'zod';
import stationData from './data/stations.json';
import dskData from './data/dsk-locations.json';

const location = {
  code: z.string(),
  name: z.string(),
  address: z.string(),
  landmark: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  city: z.string(),
  pincode: z.string(),
  operating_hours: z.string(),
};

const stationSeedSchema = z.object({
  ...location,
  contact_phone: z.string(),
  available_batteries: z.number().int(),
  charging_batteries: z.number().int(),
  total_slots: z.number().int(),
});

const dskSeedSchema = z.object({
  ...location,
  phone: z.string(),
  services: z.array(z.string()),
});

export async function seed(knex: Knex): Promise<void> {
  const now = new Date().toISOString();

  for (const entry of z.array(stationSeedSchema).parse(stationData)) {
    const { available_batteries, charging_batteries, total_slots, ...station } = entry;
    await knex('stations')
      .insert({ id: randomUUID(), ...station, is_dsk: false, is_active: true, created_at: now, updated_at: now })
      .onConflict('code')
      .ignore();

    const stored: unknown = await knex('stations').where({ code: station.code }).first('id');
    const { id: stationId } = z.object({ id: z.string() }).parse(stored);
    await knex('station_inventory')
      .insert({
        id: randomUUID(),
        station_id: stationId,
        available_batteries,
        charging_batteries,
        total_slots,
        last_updated: now,
      })
      .onConflict('station_id')
      .merge(['available_batteries', 'charging_batteries', 'total_slots', 'last_updated']);
  }

  for (const entry of z.array(dskSeedSchema).parse(dskData)) {
    await knex('dsk_locations')
      .insert({
        id: randomUUID(),
        ...entry,
        services: JSON.stringify(entry.services),
        is_active: true,
        created_at: now,
        updated_at: now,
      })
      .onConflict('code')
      .ignore();
  }
}
