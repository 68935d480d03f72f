import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { computePenalty, custodyWarnings, PenaltyService } from '../penalty.service';
import { EntitlementService } from '../entitlement.service';
import { SwapService } from '../swap.service';
import {
  createTestContext,
  insertDriver,
  insertStation,
  insertSubscription,
  swapInput,
  TestContext,
} from '../../__tests__/helpers/test-db';

describe('computePenalty', () => {
  const custody = { end_date: '2026-03-01', battery_returned: false };

  it('charges nothing within the grace period', () => {
    expect(computePenalty(custody, '2026-03-04')).toEqual({
      has_penalty: false,
      days_overdue: 0,
      daily_rate: 80,
      total_amount: 0,
    });
    expect(computePenalty(custody, '2026-03-05').has_penalty).toBe(false);
  });

  it('charges the daily rate for each day past the grace period', () => {
    expect(computePenalty(custody, '2026-03-07')).toEqual({
      has_penalty: true,
      days_overdue: 2,
      daily_rate: 80,
      total_amount: 160,
    });
  });

  it('clears once the battery is returned', () => {
    expect(computePenalty({ ...custody, battery_returned: true }, '2026-03-20').total_amount).toBe(0);
  });

  it('honours custom terms', () => {
    expect(computePenalty(custody, '2026-03-07', { gracePeriodDays: 0, dailyRate: 50 }).total_amount).toBe(300);
  });
});

describe('custodyWarnings', () => {
  it('flags a battery returned and misplaced at once', () => {
    expect(
      custodyWarnings({
        id: 'sub-1',
        battery_id: 'BAT-1',
        battery_returned: true,
        battery_returned_date: '2026-03-01T10:00:00.000Z',
        is_misplaced: true,
      })
    ).toEqual(['Subscription sub-1 is marked both returned and misplaced']);
  });

  it('accepts an unreturned battery', () => {
    expect(
      custodyWarnings({ id: 'sub-1', battery_id: 'BAT-1', battery_returned: false, battery_returned_date: null, is_misplaced: true })
    ).toEqual([]);
  });
});

describe('PenaltyService', () => {
  let ctx: TestContext;
  let service: PenaltyService;
  let driverId: string;

  beforeEach(async () => {
    ctx = await createTestContext();
    service = new PenaltyService(ctx.db, ctx.options);
    driverId = await insertDriver(ctx.db);
  });

  afterEach(async () => {
    await ctx.db.destroy();
  });

  it('reports the penalty of an overdue subscription on read', async () => {
    // Ended six days before the test date
    const subscriptionId = await insertSubscription(ctx.db, driverId, 'DAILY', {
      start_date: '2026-03-03',
      end_date: '2026-03-04',
      status: 'expired',
    });

    const view = await service.getPenalty(subscriptionId);
    expect(view).toMatchObject({
      has_penalty: true,
      days_overdue: 2,
      total_amount: 160,
      grace_period_days: 4,
      evaluated_on: '2026-03-10',
      integrity_warnings: [],
    });

    const records: unknown[] = await ctx.db('penalty_records').select('id');
    expect(records).toHaveLength(0);
  });

  it('reports no penalty three days after the end date', async () => {
    const subscriptionId = await insertSubscription(ctx.db, driverId, 'DAILY', {
      start_date: '2026-03-06',
      end_date: '2026-03-07',
    });

    const view = await service.getPenalty(subscriptionId);
    expect(view.has_penalty).toBe(false);
    expect(view.total_amount).toBe(0);
  });

  it('materializes one pending record per overdue subscription', async () => {
    const overdue = await insertSubscription(ctx.db, driverId, 'DAILY', {
      start_date: '2026-03-03',
      end_date: '2026-03-04',
      status: 'expired',
    });
    await insertSubscription(ctx.db, driverId, 'DAILY', {
      start_date: '2026-03-06',
      end_date: '2026-03-07',
      status: 'expired',
    });

    const first = await service.sweep();
    expect(first).toEqual({ evaluated_on: '2026-03-10', evaluated: 1, created: 1, refreshed: 0 });

    const again = await service.sweep();
    expect(again).toEqual({ evaluated_on: '2026-03-10', evaluated: 1, created: 0, refreshed: 1 });

    const [record] = await service.listForDriver(driverId);
    expect(record).toMatchObject({
      subscription_id: overdue,
      reason: 'battery_not_returned',
      days_overdue: 2,
      total_amount: 160,
      status: 'pending',
    });
    expect(await service.listForDriver(driverId)).toHaveLength(1);
  });

  it('refreshes the pending record as days accrue', async () => {
    await insertSubscription(ctx.db, driverId, 'DAILY', {
      start_date: '2026-03-03',
      end_date: '2026-03-04',
      status: 'expired',
    });

    await service.sweep();
    ctx.clock.advanceDays(3);
    await service.sweep();

    const records = await service.listForDriver(driverId);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ days_overdue: 5, total_amount: 400 });
  });

  it('settles a pending penalty exactly once', async () => {
    await insertSubscription(ctx.db, driverId, 'DAILY', {
      start_date: '2026-03-03',
      end_date: '2026-03-04',
      status: 'expired',
    });
    await service.sweep();
    const [record] = await service.listForDriver(driverId);

    const paid = await service.settle(record.id, 'paid');
    expect(paid.status).toBe('paid');
    expect(paid.paid_at).toBe('2026-03-10T06:30:00.000Z');

    await expect(service.settle(record.id, 'waived')).rejects.toMatchObject({ code: 'INVALID_INPUT' });
    expect(ctx.transport.types()).toEqual(['penalty.accrued', 'penalty.settled']);
  });

  it('does not charge a driver who renews and keeps swapping', async () => {
    const entitlements = new EntitlementService(ctx.db, ctx.options);
    const swaps = new SwapService(ctx.db, ctx.options);
    const stationId = await insertStation(ctx.db);

    for (let day = 0; day < 8; day++) {
      if (day > 0) {
        ctx.clock.advanceDays(1);
      }
      const renewed = await entitlements.createSubscription(driverId, 'DAILY');
      expect(renewed.carried_battery_id).toBe(day > 0 ? `BAT-NEW-${day}` : null);
      await swaps.recordSwap(swapInput(driverId, stationId, day + 1));
    }

    expect(await service.sweep()).toEqual({ evaluated_on: '2026-03-17', evaluated: 0, created: 0, refreshed: 0 });
    expect(await service.listForDriver(driverId)).toHaveLength(0);

    const holding = (await entitlements.listForDriver(driverId)).filter((s) => !s.battery_returned);
    expect(holding.map((s) => s.battery_id)).toEqual(['BAT-NEW-8']);
  });

  it('ignores returned batteries', async () => {
    await insertSubscription(ctx.db, driverId, 'DAILY', {
      start_date: '2026-02-01',
      end_date: '2026-02-02',
      status: 'expired',
      battery_returned: true,
    });

    expect(await service.sweep()).toEqual({ evaluated_on: '2026-03-10', evaluated: 0, created: 0, refreshed: 0 });
  });
});
