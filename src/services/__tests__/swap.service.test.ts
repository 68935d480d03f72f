import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { z } from 'zod';
import { SwapService, resolveSwapRange, swapPeriodSchema } from '../swap.service';
import { EntitlementService } from '../entitlement.service';
import { DriverSubscriptionRepository } from '../../repositories/driver-subscription.repository';
import { SwapResult, UNLIMITED } from '../../types';
import {
  createTestContext,
  insertDriver,
  insertStation,
  insertSubscription,
  swapInput,
  TEST_TODAY,
  TestContext,
} from '../../__tests__/helpers/test-db';

const swapsUsedSchema = z.object({ swaps_used: z.coerce.number() });

describe('resolveSwapRange', () => {
  it('maps named periods onto inclusive date ranges', () => {
    expect(resolveSwapRange({ period: 'today' }, '2026-03-10')).toEqual({ from: '2026-03-10', to: '2026-03-10' });
    expect(resolveSwapRange({ period: 'yesterday' }, '2026-03-10')).toEqual({ from: '2026-03-09', to: '2026-03-09' });
    expect(resolveSwapRange({ period: 'last_week' }, '2026-03-10')).toEqual({ from: '2026-03-03', to: '2026-03-10' });
    expect(resolveSwapRange({ period: 'last_month' }, '2026-03-10')).toEqual({ from: '2026-02-08', to: '2026-03-10' });
    expect(resolveSwapRange({ period: 'all' }, '2026-03-10')).toEqual({ from: '2020-01-01', to: '2026-03-10' });
  });

  it('maps calendar periods onto the current week, month and year', () => {
    expect(resolveSwapRange({ period: 'this_week' }, '2026-03-10')).toEqual({ from: '2026-03-09', to: '2026-03-10' });
    expect(resolveSwapRange({ period: 'this_month' }, '2026-03-10')).toEqual({ from: '2026-03-01', to: '2026-03-10' });
    expect(resolveSwapRange({ period: 'this_year' }, '2026-03-10')).toEqual({ from: '2026-01-01', to: '2026-03-10' });
    expect(resolveSwapRange({ period: 'last_year' }, '2026-03-10')).toEqual({ from: '2025-01-01', to: '2025-12-31' });
  });

  it('accepts a number of days back from today', () => {
    expect(swapPeriodSchema.parse('14')).toBe(14);
    expect(resolveSwapRange({ period: 14 }, '2026-03-10')).toEqual({ from: '2026-02-24', to: '2026-03-10' });
    expect(swapPeriodSchema.safeParse('fortnight').success).toBe(false);
    expect(swapPeriodSchema.safeParse('0').success).toBe(false);
    expect(() => resolveSwapRange({ period: 0 }, '2026-03-10')).toThrow('Period must be between 1 and 3650 days');
  });

  it('rejects inverted explicit ranges', () => {
    expect(() => resolveSwapRange({ from: '2026-03-10', to: '2026-03-01' }, '2026-03-10')).toThrow(
      'Start date must not be after end date'
    );
  });
});

describe('SwapService', () => {
  let ctx: TestContext;
  let service: SwapService;
  let driverId: string;
  let stationId: string;

  beforeEach(async () => {
    ctx = await createTestContext();
    service = new SwapService(ctx.db, ctx.options);
    driverId = await insertDriver(ctx.db);
    stationId = await insertStation(ctx.db, { name: 'Connaught Place Hub' });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await ctx.db.destroy();
  });

  it('covers the included swaps of a daily plan and bills the next one', async () => {
    const subscriptionId = await insertSubscription(ctx.db, driverId, 'DAILY');

    const covered: SwapResult[] = [];
    for (let n = 1; n <= 4; n++) {
      covered.push(await service.recordSwap(swapInput(driverId, stationId, n)));
    }
    expect(covered.map((r) => r.covered)).toEqual([true, true, true, true]);
    expect(covered.map((r) => r.swaps_remaining)).toEqual([3, 2, 1, 0]);
    expect(covered.every((r) => r.invoice_number === null)).toBe(true);

    const fifth = await service.recordSwap(swapInput(driverId, stationId, 5));
    expect(fifth).toMatchObject({
      subscription_id: subscriptionId,
      covered: false,
      charge_amount: 35,
      invoice_number: 'INV-202603-000001',
      invoice_total: 41.3,
      swaps_remaining: 0,
    });

    const invoice: unknown = await ctx.db('invoices').where({ swap_id: fifth.swap_id }).first();
    expect(invoice).toMatchObject({ invoice_type: 'extra_swap', amount: 35, tax_amount: 6.3, total_amount: 41.3 });

    const row: unknown = await ctx.db('driver_subscriptions').where({ id: subscriptionId }).first('swaps_used');
    expect(swapsUsedSchema.parse(row).swaps_used).toBe(5);
  });

  it('covers only one of two simultaneous swaps for the last included slot', async () => {
    const subscriptionId = await insertSubscription(ctx.db, driverId, 'DAILY', { swaps_used: 3 });

    const results = await Promise.all([
      service.recordSwap(swapInput(driverId, stationId, 1)),
      service.recordSwap(swapInput(driverId, stationId, 2)),
    ]);

    expect(results.filter((r) => r.covered)).toHaveLength(1);
    const charged = results.filter((r) => !r.covered);
    expect(charged).toHaveLength(1);
    expect(charged[0]).toMatchObject({ subscription_id: subscriptionId, charge_amount: 35, invoice_number: 'INV-202603-000001' });

    const invoice: unknown = await ctx.db('invoices').where({ swap_id: charged[0].swap_id }).first();
    expect(invoice).toMatchObject({ invoice_type: 'extra_swap', amount: 35, total_amount: 41.3 });

    const row: unknown = await ctx.db('driver_subscriptions').where({ id: subscriptionId }).first('swaps_used');
    expect(swapsUsedSchema.parse(row).swaps_used).toBe(5);
  });

  it('bills pay-per-swap when the subscription stops being active before the swap takes its lock', async () => {
    const subscriptionId = await insertSubscription(ctx.db, driverId, 'MONTHLY');
    jest
      .spyOn(DriverSubscriptionRepository.prototype, 'lockCurrentForDriver')
      .mockImplementationOnce(async (id, today, trx) => {
        await trx('driver_subscriptions').where({ id: subscriptionId }).update({ status: 'suspended' });
        return new DriverSubscriptionRepository(ctx.db).lockCurrentForDriver(id, today, trx);
      });

    const result = await service.recordSwap(swapInput(driverId, stationId, 1));

    expect(result).toMatchObject({
      subscription_id: null,
      covered: false,
      charge_amount: 35,
      invoice_number: 'INV-202603-000001',
      invoice_total: 41.3,
      swaps_remaining: null,
    });
    const row: unknown = await ctx.db('driver_subscriptions').where({ id: subscriptionId }).first('swaps_used');
    expect(swapsUsedSchema.parse(row).swaps_used).toBe(0);
  });

  it('never bills an unlimited plan', async () => {
    await insertSubscription(ctx.db, driverId, 'YEARLY');

    for (let n = 1; n <= 50; n++) {
      const result = await service.recordSwap(swapInput(driverId, stationId, n));
      expect(result.covered).toBe(true);
      expect(result.charge_amount).toBe(0);
      expect(result.swaps_remaining).toBe(UNLIMITED);
    }

    const invoices: unknown[] = await ctx.db('invoices').select('id');
    expect(invoices).toHaveLength(0);
  });

  it('bills the daily cap overage on a monthly plan', async () => {
    await insertSubscription(ctx.db, driverId, 'MONTHLY');

    const results: SwapResult[] = [];
    for (let n = 1; n <= 3; n++) {
      results.push(await service.recordSwap(swapInput(driverId, stationId, n)));
    }
    expect(results.map((r) => r.covered)).toEqual([true, true, false]);
    expect(results[2].swaps_remaining).toBe(57);
  });

  it('charges the pay-per-swap price without a subscription', async () => {
    const result = await service.recordSwap(swapInput(driverId, stationId));

    expect(result).toMatchObject({
      subscription_id: null,
      covered: false,
      charge_amount: 35,
      invoice_number: 'INV-202603-000001',
      invoice_total: 41.3,
      swaps_remaining: null,
    });
    const invoice: unknown = await ctx.db('invoices').where({ swap_id: result.swap_id }).first();
    expect(invoice).toMatchObject({ invoice_type: 'swap', description: 'Pay-per-swap at Connaught Place Hub' });
  });

  it('moves battery custody to the issued battery', async () => {
    const subscriptionId = await insertSubscription(ctx.db, driverId, 'MONTHLY', { battery_id: 'BAT-START' });
    await service.recordSwap(swapInput(driverId, stationId, 7));

    const entitlement = await new EntitlementService(ctx.db, ctx.options).getActiveEntitlement(driverId);
    expect(entitlement.subscription_id).toBe(subscriptionId);
    expect(entitlement.battery_id).toBe('BAT-NEW-7');
    expect(entitlement.swaps_used_today).toBe(1);
  });

  it('rejects charge levels outside 0-100 without touching the ledger', async () => {
    const subscriptionId = await insertSubscription(ctx.db, driverId, 'DAILY');

    await expect(
      service.recordSwap({ ...swapInput(driverId, stationId), new_charge_pct: 101 })
    ).rejects.toMatchObject({ code: 'INVALID_INPUT' });

    const row: unknown = await ctx.db('driver_subscriptions').where({ id: subscriptionId }).first('swaps_used');
    expect(swapsUsedSchema.parse(row).swaps_used).toBe(0);
    const swaps: unknown[] = await ctx.db('swaps').select('id');
    expect(swaps).toHaveLength(0);
  });

  it('rejects unknown stations and inactive drivers', async () => {
    const inactive = await insertDriver(ctx.db, { is_active: false });
    const closed = await insertStation(ctx.db, { is_active: false });

    await expect(service.recordSwap(swapInput(inactive, stationId))).rejects.toMatchObject({ code: 'NOT_FOUND' });
    await expect(service.recordSwap(swapInput(driverId, closed))).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('records failed swaps without consuming quota', async () => {
    const subscriptionId = await insertSubscription(ctx.db, driverId, 'DAILY');

    const failed = await service.recordFailedSwap(swapInput(driverId, stationId), 'Dock jammed');
    expect(failed).toMatchObject({ status: 'failed', charge_amount: 0, subscription_id: subscriptionId });

    const row: unknown = await ctx.db('driver_subscriptions').where({ id: subscriptionId }).first('swaps_used');
    expect(swapsUsedSchema.parse(row).swaps_used).toBe(0);
    expect(ctx.transport.types()).toEqual(['swap.failed']);
  });

  it('summarizes swap history over completed swaps', async () => {
    await insertSubscription(ctx.db, driverId, 'DAILY');
    for (let n = 1; n <= 5; n++) {
      await service.recordSwap(swapInput(driverId, stationId, n));
    }
    await service.recordFailedSwap(swapInput(driverId, stationId, 6), 'No charged battery');

    const history = await service.listSwapHistory(driverId, { period: 'today' });

    expect(history).toMatchObject({
      driver_id: driverId,
      from: TEST_TODAY,
      to: TEST_TODAY,
      total_swaps: 5,
      free_swaps: 4,
      total_charged: 35,
    });
    expect(history.swaps).toHaveLength(6);
    expect(history.swaps.filter((swap) => swap.invoice_number !== null).map((swap) => swap.invoice_number)).toEqual([
      'INV-202603-000001',
    ]);
  });

  it('announces the swap and its invoice after commit', async () => {
    await service.recordSwap(swapInput(driverId, stationId));
    expect(ctx.transport.types()).toEqual(['swap.recorded', 'invoice.created']);
  });
});
