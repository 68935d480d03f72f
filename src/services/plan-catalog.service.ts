import { Knex } from 'knex';
import { z } from 'zod';
import { getDb } from '../config/database';
import { logger } from '../config/logger';
import { PlanRepository } from '../repositories/plan.repository';
import { LedgerServiceOptions, SubscriptionPlan, UNLIMITED } from '../types';
import { Errors, parseInput } from '../utils/error-handler.util';
import { percentToRate, round2 } from '../utils/money.util';
import { BaseService } from './base.service';

const quota = z.number().int().refine((value) => value === UNLIMITED || value >= 0, {
  message: 'Must be -1 (unlimited) or a non-negative integer',
});

export const upsertPlanSchema = z.object({
  code: z
    .string()
    .trim()
    .min(1)
    .max(20)
    .transform((value) => value.toUpperCase()),
  name: z.string().trim().min(1).max(50),
  name_hi: z.string().max(100).nullable().default(null),
  price: z.number().nonnegative(),
  validity_days: z.number().int().positive(),
  swaps_included: quota,
  swaps_per_day: quota.default(UNLIMITED),
  extra_swap_price: z.number().nonnegative().default(35),
  gst_percentage: z.number().min(0).max(100).default(18),
  description_en: z.string().nullable().default(null),
  description_hi: z.string().nullable().default(null),
  is_active: z.boolean().default(true),
});

export type UpsertPlanInput = z.input<typeof upsertPlanSchema>;

export interface PlanPricing extends SubscriptionPlan {
  gst_amount: number;
  total_with_gst: number;
  /** 0 for unlimited plans. */
  per_swap_cost: number;
}

export function priceWithGst(plan: SubscriptionPlan): PlanPricing {
  const gstAmount = round2(plan.price * percentToRate(plan.gst_percentage));
  const perSwap = plan.swaps_included > 0 ? round2(plan.price / plan.swaps_included) : 0;
  return {
    ...plan,
    gst_amount: gstAmount,
    total_with_gst: round2(plan.price + gstAmount),
    per_swap_cost: perSwap,
  };
}

export class PlanCatalogService extends BaseService {
  private repository: PlanRepository;

  constructor(db: Knex = getDb(), options: LedgerServiceOptions = {}) {
    super(db, options);
    this.repository = new PlanRepository(db);
  }

  async getByCode(code: string): Promise<SubscriptionPlan> {
    const plan = await this.repository.findByCode(code.trim().toUpperCase());
    if (!plan) {
      throw Errors.notFound('Subscription plan', code);
    }
    return plan;
  }

  async listActive(): Promise<PlanPricing[]> {
    const plans = await this.repository.findActive();
    return plans.map(priceWithGst);
  }

  /**
   * Insert or update a plan by its code.
   */
  async upsert(input: UpsertPlanInput): Promise<SubscriptionPlan> {
    const data = parseInput(upsertPlanSchema, input);
    const { now } = this.moment();
    const plan = await this.repository.upsertByCode({ ...data, created_at: now, updated_at: now });

    logger.info({ message: 'Subscription plan upserted', code: plan.code, planId: plan.id });
    return plan;
  }
}
