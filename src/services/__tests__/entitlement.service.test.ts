import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { EntitlementService } from '../entitlement.service';
import { UNLIMITED } from '../../types';
import { createTestContext, insertDriver, insertSubscription, TestContext } from '../../__tests__/helpers/test-db';

describe('EntitlementService', () => {
  let ctx: TestContext;
  let service: EntitlementService;
  let driverId: string;

  beforeEach(async () => {
    ctx = await createTestContext();
    service = new EntitlementService(ctx.db, ctx.options);
    driverId = await insertDriver(ctx.db);
  });

  afterEach(async () => {
    await ctx.db.destroy();
  });

  describe('getActiveEntitlement', () => {
    it('returns quota, validity and custody for the current subscription', async () => {
      const subscriptionId = await insertSubscription(ctx.db, driverId, 'WEEKLY', { swaps_used: 5 });

      const view = await service.getActiveEntitlement(driverId);
      expect(view).toMatchObject({
        subscription_id: subscriptionId,
        start_date: '2026-03-10',
        end_date: '2026-03-17',
        status: 'active',
        swaps_used: 5,
        swaps_used_today: 0,
        swaps_remaining: 9,
        days_remaining: 7,
        battery_id: 'BAT-0001',
        penalty: { has_penalty: false, days_overdue: 0, daily_rate: 80, total_amount: 0 },
        integrity_warnings: [],
      });
      expect(view.plan).toMatchObject({ code: 'WEEKLY', swaps_included: 14, swaps_per_day: 2 });
    });

    it('reports unlimited plans with the sentinel', async () => {
      await insertSubscription(ctx.db, driverId, 'YEARLY', { swaps_used: 300 });
      const view = await service.getActiveEntitlement(driverId);
      expect(view.swaps_remaining).toBe(UNLIMITED);
    });

    it('picks the most recent subscription and warns about the others', async () => {
      const older = await insertSubscription(ctx.db, driverId, 'MONTHLY', { start_date: '2026-03-01' });
      const newer = await insertSubscription(ctx.db, driverId, 'WEEKLY', { start_date: '2026-03-09' });

      const view = await service.getActiveEntitlement(driverId);
      expect(view.subscription_id).toBe(newer);
      expect(view.integrity_warnings).toEqual([
        `Driver ${driverId} has 2 active subscriptions; using ${newer}, ignoring ${older}`,
      ]);
    });

    it('ignores subscriptions past their end date', async () => {
      await insertSubscription(ctx.db, driverId, 'DAILY', { start_date: '2026-03-08', end_date: '2026-03-09' });
      await expect(service.getActiveEntitlement(driverId)).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });

    it('rejects unknown drivers', async () => {
      await expect(service.getActiveEntitlement('00000000-0000-4000-8000-000000000000')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'Driver not found with ID: 00000000-0000-4000-8000-000000000000',
      });
    });
  });

  describe('consumeSwap', () => {
    it('increments usage monotonically', async () => {
      const subscriptionId = await insertSubscription(ctx.db, driverId, 'MONTHLY');

      const used: number[] = [];
      for (let i = 0; i < 3; i++) {
        const result = await service.consumeSwap(subscriptionId);
        used.push(result.subscription.swaps_used);
      }
      expect(used).toEqual([1, 2, 3]);
    });

    it('refuses a subscription that is not active', async () => {
      const subscriptionId = await insertSubscription(ctx.db, driverId, 'MONTHLY', { status: 'suspended' });
      await expect(service.consumeSwap(subscriptionId)).rejects.toMatchObject({ code: 'INVALID_INPUT' });
    });
  });

  describe('createSubscription', () => {
    it('supersedes the active subscription and invoices the plan price', async () => {
      const previous = await insertSubscription(ctx.db, driverId, 'DAILY');

      const created = await service.createSubscription(driverId, 'monthly', { auto_renew: true });

      expect(created.superseded).toBe(1);
      expect(created.subscription).toMatchObject({
        driver_id: driverId,
        start_date: '2026-03-10',
        end_date: '2026-04-09',
        status: 'active',
        swaps_used: 0,
        auto_renew: true,
      });
      expect(created.invoice).toMatchObject({
        invoice_number: 'INV-202603-000001',
        invoice_type: 'subscription',
        subscription_id: created.subscription.id,
        amount: 999,
        tax_amount: 179.82,
        total_amount: 1178.82,
      });

      const subscriptions = await service.listForDriver(driverId);
      expect(subscriptions.find((s) => s.id === previous)?.status).toBe('expired');
      expect((await service.getActiveEntitlement(driverId)).subscription_id).toBe(created.subscription.id);
      expect(ctx.transport.types()).toEqual(['invoice.created']);
    });

    it('carries the held battery over to the renewed subscription', async () => {
      const previous = await insertSubscription(ctx.db, driverId, 'DAILY', { battery_id: 'BAT-0077' });

      const created = await service.createSubscription(driverId, 'WEEKLY');

      expect(created.carried_battery_id).toBe('BAT-0077');
      expect(created.subscription).toMatchObject({ battery_id: 'BAT-0077', battery_returned: false, is_misplaced: false });

      const closed = (await service.listForDriver(driverId)).find((s) => s.id === previous);
      expect(closed).toMatchObject({
        status: 'expired',
        battery_id: 'BAT-0077',
        battery_returned: true,
        battery_returned_date: '2026-03-10T06:30:00.000Z',
      });
    });

    it('starts without custody when no battery is held', async () => {
      await insertSubscription(ctx.db, driverId, 'DAILY', { battery_returned: true });

      const created = await service.createSubscription(driverId, 'WEEKLY');

      expect(created.carried_battery_id).toBeNull();
      expect(created.subscription.battery_id).toBeNull();
    });

    it('rejects unknown plans and past start dates', async () => {
      await expect(service.createSubscription(driverId, 'QUARTERLY')).rejects.toMatchObject({ code: 'NOT_FOUND' });
      await expect(service.createSubscription(driverId, 'DAILY', { start_date: '2026-03-09' })).rejects.toMatchObject({
        code: 'INVALID_INPUT',
      });
    });
  });

  describe('custody', () => {
    it('returns a battery once and keeps the first return date', async () => {
      const subscriptionId = await insertSubscription(ctx.db, driverId, 'DAILY');

      const returned = await service.markReturned(subscriptionId, '2026-03-10T08:00:00.000Z');
      expect(returned).toMatchObject({ battery_returned: true, battery_returned_date: '2026-03-10T08:00:00.000Z' });

      const again = await service.markReturned(subscriptionId, '2026-03-11T08:00:00.000Z');
      expect(again.battery_returned_date).toBe('2026-03-10T08:00:00.000Z');
    });

    it('assigning a new battery reopens custody', async () => {
      const subscriptionId = await insertSubscription(ctx.db, driverId, 'DAILY', { battery_returned: true });
      const updated = await service.setCustody(subscriptionId, ' BAT-0042 ');
      expect(updated).toMatchObject({ battery_id: 'BAT-0042', battery_returned: false, battery_returned_date: null });
    });
  });

  describe('lifecycle', () => {
    it('only suspends or cancels active subscriptions', async () => {
      const subscriptionId = await insertSubscription(ctx.db, driverId, 'WEEKLY');

      expect((await service.suspend(subscriptionId)).status).toBe('suspended');
      await expect(service.cancel(subscriptionId)).rejects.toMatchObject({
        code: 'INVALID_INPUT',
        message: 'Cannot move subscription from suspended to cancelled',
      });
    });

    it('expires subscriptions whose end date has passed', async () => {
      await insertSubscription(ctx.db, driverId, 'DAILY', { start_date: '2026-03-05', end_date: '2026-03-06' });
      await insertSubscription(ctx.db, driverId, 'WEEKLY');

      expect(await service.expireLapsed()).toBe(1);
      expect(await service.expireLapsed()).toBe(0);
    });

    it('resets usage on request', async () => {
      const subscriptionId = await insertSubscription(ctx.db, driverId, 'WEEKLY', { swaps_used: 9 });
      expect((await service.resetUsage(subscriptionId)).swaps_used).toBe(0);
    });
  });
});
