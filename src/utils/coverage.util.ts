import { CoverageDecision, SubscriptionPlan, UNLIMITED } from '../types';

type QuotaTerms = Pick<SubscriptionPlan, 'swaps_included' | 'swaps_per_day' | 'extra_swap_price'>;

/**
 * Free-vs-charged decision for the next swap under a plan.
 *
 * `swapsUsed` and `swapsUsedToday` are the counters before this swap. Either
 * ceiling being reached makes it an overage swap billed at `extra_swap_price`.
 */
export function decideCoverage(plan: QuotaTerms, swapsUsed: number, swapsUsedToday: number): CoverageDecision {
  const quotaExhausted = plan.swaps_included !== UNLIMITED && swapsUsed >= plan.swaps_included;
  const dailyCapReached = plan.swaps_per_day !== UNLIMITED && swapsUsedToday >= plan.swaps_per_day;
  const covered = !quotaExhausted && !dailyCapReached;

  return {
    covered,
    charge_amount: covered ? 0 : plan.extra_swap_price,
  };
}

export function swapsRemaining(plan: Pick<SubscriptionPlan, 'swaps_included'>, swapsUsed: number): number {
  if (plan.swaps_included === UNLIMITED) {
    return UNLIMITED;
  }
  return Math.max(0, plan.swaps_included - swapsUsed);
}
