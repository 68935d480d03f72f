import { randomUUID } from 'crypto';
import knex, { Knex } from 'knex';
import { z } from 'zod';
import { LedgerRules } from '../../config';
import * as drivers from '../../database/migrations/001_create_drivers';
import * as stations from '../../database/migrations/002_create_stations';
import * as plans from '../../database/migrations/003_create_subscription_plans';
import * as subscriptions from '../../database/migrations/004_create_driver_subscriptions';
import * as swaps from '../../database/migrations/005_create_swaps';
import * as invoices from '../../database/migrations/006_create_invoices';
import * as penalties from '../../database/migrations/007_create_penalty_records';
import * as leaves from '../../database/migrations/008_create_leaves';
import { seed as seedPlans } from '../../database/seeds/001_subscription_plans';
import { EventTransport, LedgerEvent, LedgerEvents } from '../../services/ledger-events.service';
import { LedgerServiceOptions } from '../../types';
import { addDays, Clock } from '../../utils/date.util';

const MIGRATIONS = [drivers, stations, plans, subscriptions, swaps, invoices, penalties, leaves];

const silent = () => undefined;

/**
 * Fresh in-memory SQLite database with every ledger migration applied.
 */
export async function createTestDb(options: { seedPlans?: boolean } = {}): Promise<Knex> {
  const db = knex({
    client: 'better-sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
    log: { warn: silent, error: silent, deprecate: silent, debug: silent },
  });
  for (const migration of MIGRATIONS) {
    await migration.up(db);
  }
  if (options.seedPlans ?? true) {
    await seedPlans(db);
  }
  return db;
}

/** 12:00 in Asia/Kolkata on 2026-03-10. */
export const TEST_NOW = '2026-03-10T06:30:00.000Z';
export const TEST_TODAY = '2026-03-10';

export class TestClock implements Clock {
  private current: Date;

  constructor(iso: string = TEST_NOW) {
    this.current = new Date(iso);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(iso: string): void {
    this.current = new Date(iso);
  }

  advanceDays(days: number): void {
    this.current = new Date(this.current.getTime() + days * 24 * 60 * 60 * 1000);
  }
}

export const testRules: LedgerRules = {
  timezone: 'Asia/Kolkata',
  penalty: { gracePeriodDays: 4, dailyRate: 80 },
  payPerSwapPrice: 35,
  defaultGstPercentage: 18,
  leavesPerMonth: 4,
};

const ledgerEventSchema = z.object({
  type: z.string(),
  occurred_at: z.string(),
  payload: z.record(z.unknown()),
});

export class RecordingTransport implements EventTransport {
  published: Array<{ channel: string; event: LedgerEvent }> = [];

  async publish(channel: string, message: string): Promise<number> {
    this.published.push({ channel, event: ledgerEventSchema.parse(JSON.parse(message)) });
    return 1;
  }

  types(): string[] {
    return this.published.map((entry) => entry.event.type);
  }
}

export interface TestContext {
  db: Knex;
  clock: TestClock;
  transport: RecordingTransport;
  options: LedgerServiceOptions;
}

export async function createTestContext(): Promise<TestContext> {
  const db = await createTestDb();
  const clock = new TestClock();
  const transport = new RecordingTransport();
  return {
    db,
    clock,
    transport,
    options: { clock, rules: testRules, events: new LedgerEvents(transport, clock) },
  };
}

let phoneSequence = 0;

export async function insertDriver(
  db: Knex,
  overrides: { phone_number?: string; name?: string; is_active?: boolean } = {}
): Promise<string> {
  const id = randomUUID();
  await db('drivers').insert({
    id,
    phone_number: overrides.phone_number ?? String(9800000000 + ++phoneSequence),
    name: overrides.name ?? 'Test Driver',
    preferred_language: 'hi-en',
    city: 'Delhi',
    is_active: overrides.is_active ?? true,
  });
  return id;
}

export async function insertStation(
  db: Knex,
  overrides: { code?: string; name?: string; latitude?: number; longitude?: number; is_active?: boolean } = {}
): Promise<string> {
  const id = randomUUID();
  await db('stations').insert({
    id,
    code: overrides.code ?? `ST-${id.slice(0, 8)}`,
    name: overrides.name ?? 'Test Station',
    latitude: overrides.latitude ?? 28.6315,
    longitude: overrides.longitude ?? 77.2167,
    city: 'Delhi',
    is_active: overrides.is_active ?? true,
  });
  await db('station_inventory').insert({
    id: randomUUID(),
    station_id: id,
    available_batteries: 10,
    charging_batteries: 4,
    total_slots: 16,
  });
  return id;
}

/**
 * Subscription row written directly, bypassing invoicing.
 */
export async function insertSubscription(
  db: Knex,
  driverId: string,
  planCode: string,
  overrides: {
    start_date?: string;
    end_date?: string;
    status?: string;
    swaps_used?: number;
    battery_id?: string | null;
    battery_returned?: boolean;
  } = {}
): Promise<string> {
  const plan: unknown = await db('subscription_plans').where({ code: planCode }).first('id', 'validity_days');
  const { id: planId, validity_days: validityDays } = z
    .object({ id: z.string(), validity_days: z.coerce.number() })
    .parse(plan);
  const id = randomUUID();
  const startDate = overrides.start_date ?? TEST_TODAY;
  await db('driver_subscriptions').insert({
    id,
    driver_id: driverId,
    plan_id: planId,
    start_date: startDate,
    end_date: overrides.end_date ?? addDays(startDate, validityDays),
    status: overrides.status ?? 'active',
    swaps_used: overrides.swaps_used ?? 0,
    battery_id: overrides.battery_id === undefined ? 'BAT-0001' : overrides.battery_id,
    battery_returned: overrides.battery_returned ?? false,
    created_at: TEST_NOW,
    updated_at: TEST_NOW,
  });
  return id;
}

export function swapInput(driverId: string, stationId: string, n: number = 1) {
  return {
    driver_id: driverId,
    station_id: stationId,
    old_battery_id: `BAT-OLD-${n}`,
    new_battery_id: `BAT-NEW-${n}`,
    old_charge_pct: 12,
    new_charge_pct: 98,
  };
}
