import { Knex } from 'knex';
import { PlanCatalogService, UpsertPlanInput } from '../../services/plan-catalog.service';
import { UNLIMITED } from '../../types';

const plans: UpsertPlanInput[] = [
  {
    code: 'DAILY',
    name: 'Daily Plan',
    name_hi: 'दैनिक प्लान',
    price: 49,
    validity_days: 1,
    swaps_included: 4,
    swaps_per_day: UNLIMITED,
    extra_swap_price: 35,
    gst_percentage: 18,
    description_en: 'Quick daily plan. 4 swaps for today.',
    description_hi: 'Quick daily plan. Aaj ke liye 4 swaps.',
  },
  {
    code: 'WEEKLY',
    name: 'Weekly Plan',
    name_hi: 'साप्ताहिक प्लान',
    price: 299,
    validity_days: 7,
    swaps_included: 14,
    swaps_per_day: 2,
    extra_swap_price: 35,
    gst_percentage: 18,
    description_en: '14 swaps for 7 days, 2 swaps per day included. Extra swaps at Rs.35 each.',
    description_hi: '7 din ke liye 14 swaps. Rozana 2 swaps included. Extra swap Rs.35 mein.',
  },
  {
    code: 'MONTHLY',
    name: 'Monthly Plan',
    name_hi: 'मासिक प्लान',
    price: 999,
    validity_days: 30,
    swaps_included: 60,
    swaps_per_day: 2,
    extra_swap_price: 35,
    gst_percentage: 18,
    description_en: '60 swaps for 30 days, 2 swaps per day included. Extra swaps at Rs.35 each.',
    description_hi: '30 din ke liye 60 swaps. Rozana 2 swaps included. Extra swap Rs.35 mein.',
  },
  {
    code: 'YEARLY',
    name: 'Yearly Plan',
    name_hi: 'वार्षिक प्लान',
    price: 9999,
    validity_days: 365,
    swaps_included: UNLIMITED,
    swaps_per_day: UNLIMITED,
    extra_swap_price: 0,
    gst_percentage: 18,
    description_en: 'Unlimited swaps for 1 year.',
    description_hi: '1 saal ke liye unlimited swaps.',
  },
];

export async function seed(knex: Knex): Promise<void> {
  const catalog = new PlanCatalogService(knex);
  for (const plan of plans) {
    await catalog.upsert(plan);
  }
}
