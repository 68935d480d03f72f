import { Knex } from 'knex';
import { z } from 'zod';
import { getDb } from '../config/database';
import { logger } from '../config/logger';
import { DriverSubscriptionRepository } from '../repositories/driver-subscription.repository';
import { DriverRepository } from '../repositories/driver.repository';
import { LeaveRequestRepository } from '../repositories/leave-request.repository';
import { PlanRepository } from '../repositories/plan.repository';
import { SwapRepository } from '../repositories/swap.repository';
import { Driver, DriverProfile, LedgerServiceOptions } from '../types';
import { swapsRemaining } from '../utils/coverage.util';
import { startOfMonth } from '../utils/date.util';
import { Errors, parseInput } from '../utils/error-handler.util';
import { BaseService } from './base.service';

const INDIAN_MOBILE = /^[6-9]\d{9}$/;

/**
 * Canonical 10-digit form of an Indian mobile number.
 * Accepts spaces, dashes, brackets and a +91, 91 or 0 prefix.
 */
export function normalizePhone(raw: string): string {
  let digits = raw.trim().replace(/[\s\-().]/g, '');
  if (digits.startsWith('+91')) {
    digits = digits.slice(3);
  } else if (digits.length === 12 && digits.startsWith('91')) {
    digits = digits.slice(2);
  } else if (digits.length === 11 && digits.startsWith('0')) {
    digits = digits.slice(1);
  }

  if (!INDIAN_MOBILE.test(digits)) {
    throw Errors.invalidInput(`Invalid phone number: ${raw}`);
  }
  return digits;
}

export const registerDriverSchema = z.object({
  phone_number: z.string().min(1),
  name: z.string().trim().min(1).max(100).optional(),
  email: z.string().email().max(100).optional(),
  preferred_language: z.enum(['hi', 'en', 'hi-en']).default('hi-en'),
  city: z.string().trim().min(1).max(50).optional(),
  vehicle_number: z.string().trim().min(1).max(20).optional(),
});

export type RegisterDriverInput = z.input<typeof registerDriverSchema>;

export class DriverService extends BaseService {
  private repository: DriverRepository;
  private subscriptions: DriverSubscriptionRepository;
  private plans: PlanRepository;
  private swaps: SwapRepository;
  private leaveRequests: LeaveRequestRepository;

  constructor(db: Knex = getDb(), options: LedgerServiceOptions = {}) {
    super(db, options);
    this.repository = new DriverRepository(db);
    this.subscriptions = new DriverSubscriptionRepository(db);
    this.plans = new PlanRepository(db);
    this.swaps = new SwapRepository(db);
    this.leaveRequests = new LeaveRequestRepository(db);
  }

  /**
   * Profile of an active driver looked up by phone number.
   */
  async getDriver(phone: string): Promise<DriverProfile> {
    const phoneNumber = normalizePhone(phone);
    const driver = await this.repository.findByPhone(phoneNumber);
    if (!driver || !driver.is_active) {
      throw Errors.notFound('Driver', phoneNumber);
    }

    const { today } = this.moment();
    const [current] = await this.subscriptions.findCurrentForDriver(driver.id, today);
    let currentSubscription: DriverProfile['current_subscription'] = null;
    if (current) {
      const plan = await this.plans.findById(current.plan_id);
      if (plan) {
        currentSubscription = {
          subscription_id: current.id,
          plan_code: plan.code,
          end_date: current.end_date,
          swaps_remaining: swapsRemaining(plan, current.swaps_used),
        };
      }
    }

    const swapsThisMonth = await this.swaps.countForDriverSince(driver.id, startOfMonth(today));
    const pendingLeaves = await this.leaveRequests.findByStatus(driver.id, 'pending');

    return {
      ...driver,
      current_subscription: currentSubscription,
      total_swaps_this_month: swapsThisMonth,
      pending_leaves: pendingLeaves.length,
    };
  }

  async getById(driverId: string): Promise<Driver> {
    const driver = await this.repository.findById(driverId);
    if (!driver) {
      throw Errors.notFound('Driver', driverId);
    }
    return driver;
  }

  async register(input: RegisterDriverInput): Promise<Driver> {
    const data = parseInput(registerDriverSchema, input);
    const phoneNumber = normalizePhone(data.phone_number);

    const existing = await this.repository.findByPhone(phoneNumber);
    if (existing) {
      throw Errors.conflict(`Driver with phone ${phoneNumber} already exists`);
    }

    const { now } = this.moment();
    const driver = await this.repository.create({
      phone_number: phoneNumber,
      name: data.name ?? null,
      email: data.email ?? null,
      preferred_language: data.preferred_language,
      city: data.city ?? null,
      vehicle_number: data.vehicle_number ?? null,
      is_active: true,
      created_at: now,
      updated_at: now,
    });

    logger.info({ message: 'Driver registered', driverId: driver.id, city: driver.city });
    return driver;
  }

  /**
   * Soft delete. Drivers are never removed.
   */
  async deactivate(driverId: string): Promise<Driver> {
    const { now } = this.moment();
    const driver = await this.repository.setActive(driverId, false, now);
    if (!driver) {
      throw Errors.notFound('Driver', driverId);
    }

    logger.info({ message: 'Driver deactivated', driverId });
    return driver;
  }
}
