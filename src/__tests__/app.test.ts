import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { buildServer } from '../app';
import { createTestContext, insertDriver, insertStation, swapInput, TestContext } from './helpers/test-db';

const createdSchema = z.object({ data: z.object({ id: z.string() }) });

describe('HTTP API', () => {
  let ctx: TestContext;
  let app: FastifyInstance;

  beforeEach(async () => {
    ctx = await createTestContext();
    app = await buildServer({ db: ctx.db, options: ctx.options });
  });

  afterEach(async () => {
    await app.close();
    await ctx.db.destroy();
  });

  it('reports health with events disabled', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok', database: 'connected', redis: 'disabled' });
  });

  it('registers a driver, subscribes and reads the entitlement back', async () => {
    const registered = await app.inject({
      method: 'POST',
      url: '/api/drivers',
      payload: { phone_number: '+91 98111 22333', name: 'Asha' },
    });
    expect(registered.statusCode).toBe(201);
    const driverId = createdSchema.parse(registered.json()).data.id;

    const subscribed = await app.inject({
      method: 'POST',
      url: '/api/subscriptions',
      payload: { driver_id: driverId, plan_code: 'WEEKLY' },
    });
    expect(subscribed.statusCode).toBe(201);
    expect(subscribed.json()).toMatchObject({
      success: true,
      data: { superseded: 0, invoice: { invoice_number: 'INV-202603-000001', total_amount: 352.82 } },
    });

    const entitlement = await app.inject({ method: 'GET', url: `/api/drivers/${driverId}/entitlement` });
    expect(entitlement.statusCode).toBe(200);
    expect(entitlement.json()).toMatchObject({
      success: true,
      data: { driver_id: driverId, swaps_remaining: 14, end_date: '2026-03-17', plan: { code: 'WEEKLY' } },
    });
  });

  it('records a swap and exposes its invoice', async () => {
    const driverId = await insertDriver(ctx.db);
    const stationId = await insertStation(ctx.db);

    const swap = await app.inject({ method: 'POST', url: '/api/swaps', payload: swapInput(driverId, stationId) });
    expect(swap.statusCode).toBe(201);
    expect(swap.json()).toMatchObject({ data: { covered: false, invoice_number: 'INV-202603-000001' } });

    const invoice = await app.inject({ method: 'GET', url: '/api/invoices/INV-202603-000001' });
    expect(invoice.json()).toMatchObject({ data: { invoice_type: 'swap', amount: 35, tax_amount: 6.3, total_amount: 41.3 } });
  });

  it('answers invalid input with the error envelope', async () => {
    const driverId = await insertDriver(ctx.db);
    const stationId = await insertStation(ctx.db);

    const response = await app.inject({
      method: 'POST',
      url: '/api/swaps',
      payload: { ...swapInput(driverId, stationId), new_charge_pct: 150 },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({
      success: false,
      error: 'Validation error',
      code: 'INVALID_INPUT',
      details: [{ field: 'new_charge_pct' }],
    });
  });

  it('answers unknown drivers with NOT_FOUND', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/api/drivers/00000000-0000-4000-8000-000000000000/entitlement',
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({ success: false, code: 'NOT_FOUND' });
  });

  it('lists plans with GST and per-swap cost', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/plans' });
    const body = z
      .object({ data: z.array(z.object({ code: z.string(), total_with_gst: z.number(), per_swap_cost: z.number() })) })
      .parse(response.json());

    expect(body.data.map((plan) => plan.code)).toEqual(['DAILY', 'WEEKLY', 'MONTHLY', 'YEARLY']);
    expect(body.data[0]).toEqual({ code: 'DAILY', total_with_gst: 57.82, per_swap_cost: 12.25 });
    expect(body.data[3].per_swap_cost).toBe(0);
  });

  it('runs the penalty sweep on demand', async () => {
    const response = await app.inject({ method: 'POST', url: '/api/admin/sweeps/penalties', payload: {} });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      success: true,
      data: { evaluated_on: '2026-03-10', evaluated: 0, created: 0, refreshed: 0 },
    });
  });
});
