import { Knex } from 'knex';
import { getDb } from '../config/database';
import { logger } from '../config/logger';
import { DriverRepository } from '../repositories/driver.repository';
import { LeaveBalanceRepository } from '../repositories/leave-balance.repository';
import { LeaveRequestRepository } from '../repositories/leave-request.repository';
import { DriverLeaveRequest, Executor, LeaveBalance, LedgerServiceOptions, LeaveSummary } from '../types';
import { daysBetween, daysPerMonth, isCalendarDate, monthKey } from '../utils/date.util';
import { Errors } from '../utils/error-handler.util';
import { inTransaction } from '../utils/transaction.util';
import { BaseService } from './base.service';
import { LEDGER_CHANNELS } from './ledger-events.service';

const MONTH_KEY_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

export class LeaveService extends BaseService {
  private balances: LeaveBalanceRepository;
  private requests: LeaveRequestRepository;
  private drivers: DriverRepository;

  constructor(db: Knex = getDb(), options: LedgerServiceOptions = {}) {
    super(db, options);
    this.balances = new LeaveBalanceRepository(db);
    this.requests = new LeaveRequestRepository(db);
    this.drivers = new DriverRepository(db);
  }

  /**
   * The driver's balance for a 'YYYY-MM' month, created with the monthly
   * allowance on first access. Concurrent first accesses converge on one row.
   */
  async getOrCreate(driverId: string, month: string, executor: Executor = this.db): Promise<LeaveBalance> {
    if (!MONTH_KEY_PATTERN.test(month)) {
      throw Errors.invalidInput(`Invalid month key: ${month}`);
    }

    const existing = await this.balances.find(driverId, month, executor);
    if (existing) {
      return existing;
    }

    const { now } = this.moment();
    await this.balances.insertIfAbsent(driverId, month, this.rules.leavesPerMonth, now, executor);
    const balance = await this.balances.find(driverId, month, executor);
    if (!balance) {
      throw Errors.internal(`Leave balance for ${driverId} ${month} was not persisted`);
    }
    return balance;
  }

  async requestLeave(driverId: string, startDate: string, endDate: string, reason?: string): Promise<DriverLeaveRequest> {
    await this.requireDriver(driverId);
    const { today, now } = this.moment();

    if (!isCalendarDate(startDate) || !isCalendarDate(endDate)) {
      throw Errors.invalidInput('Leave dates must be YYYY-MM-DD');
    }
    if (startDate > endDate) {
      throw Errors.invalidInput('Leave start date must not be after the end date');
    }
    if (startDate < today) {
      throw Errors.invalidInput('Leave cannot start in the past');
    }

    const days = daysBetween(startDate, endDate) + 1;
    if (days > this.rules.leavesPerMonth) {
      throw Errors.invalidInput(`A leave request cannot exceed ${this.rules.leavesPerMonth} days`);
    }

    const overlapping = await this.requests.findOverlapping(driverId, startDate, endDate);
    if (overlapping.length > 0) {
      throw Errors.invalidInput('Leave overlaps an existing request', {
        overlapping: overlapping.map((request) => request.id),
      });
    }

    const pending = await this.requests.findByStatus(driverId, 'pending');
    for (const [month, needed] of daysPerMonth(startDate, endDate)) {
      const balance = await this.getOrCreate(driverId, month);
      const reserved = pending.reduce(
        (sum, request) => sum + (daysPerMonth(request.start_date, request.end_date).get(month) ?? 0),
        0
      );
      if (balance.remaining_leaves - reserved < needed) {
        throw Errors.invalidInput(`Not enough leave left in ${month}`, {
          month,
          remaining: balance.remaining_leaves,
          pending: reserved,
          requested: needed,
        });
      }
    }

    const request = await this.requests.create({
      driver_id: driverId,
      start_date: startDate,
      end_date: endDate,
      days,
      reason: reason?.trim() || null,
      status: 'pending',
      created_at: now,
    });

    logger.info({ message: 'Leave requested', requestId: request.id, driverId, startDate, endDate, days });
    await this.emit('leave.requested', request);
    return request;
  }

  /**
   * pending -> approved. The request's days are taken from each month it touches
   * in the same transaction; if any month lacks the days nothing is written.
   */
  async approve(requestId: string, actor: string): Promise<DriverLeaveRequest> {
    const { now } = this.moment();

    const approved = await inTransaction(this.db, async (trx) => {
      const request = await this.requests.lockById(requestId, trx);
      if (!request) {
        throw Errors.notFound('Leave request', requestId);
      }
      if (request.status !== 'pending') {
        throw Errors.invalidInput(`Leave request is already ${request.status}`);
      }

      for (const [month, needed] of daysPerMonth(request.start_date, request.end_date)) {
        await this.getOrCreate(request.driver_id, month, trx);
        const balance = await this.balances.lock(request.driver_id, month, trx);
        if (!balance) {
          throw Errors.notFound('Leave balance', `${request.driver_id}/${month}`);
        }
        if (balance.remaining_leaves < needed) {
          throw Errors.invalidInput(`Not enough leave left in ${month}`, {
            month,
            remaining: balance.remaining_leaves,
            requested: needed,
          });
        }
        await this.balances.addUsed(balance.id, needed, now, trx);
      }

      const resolved = await this.requests.resolve(requestId, 'approved', actor, now, null, trx);
      if (!resolved) {
        throw Errors.conflict(`Leave request ${requestId} was processed concurrently`);
      }
      return this.requireRequest(requestId, trx);
    });

    logger.info({ message: 'Leave approved', requestId, driverId: approved.driver_id, actor });
    await this.emit('leave.approved', approved);
    return approved;
  }

  async reject(requestId: string, actor: string, reason?: string): Promise<DriverLeaveRequest> {
    const request = await this.requireRequest(requestId);
    const { now } = this.moment();

    const resolved = await this.requests.resolve(requestId, 'rejected', actor, now, reason?.trim() || null);
    if (!resolved) {
      throw Errors.invalidInput(`Leave request is already ${request.status}`);
    }

    const rejected = await this.requireRequest(requestId);
    logger.info({ message: 'Leave rejected', requestId, driverId: rejected.driver_id, actor });
    await this.emit('leave.rejected', rejected);
    return rejected;
  }

  async getLeaveSummary(driverId: string): Promise<LeaveSummary> {
    await this.requireDriver(driverId);
    const { today } = this.moment();

    const balance = await this.getOrCreate(driverId, monthKey(today));
    const pendingRequests = await this.requests.findByStatus(driverId, 'pending');
    const upcomingLeaves = await this.requests.findUpcomingApproved(driverId, today);

    return {
      driver_id: driverId,
      balance,
      pending_requests: pendingRequests,
      upcoming_leaves: upcomingLeaves,
    };
  }

  private async requireDriver(driverId: string): Promise<void> {
    const driver = await this.drivers.findById(driverId);
    if (!driver || !driver.is_active) {
      throw Errors.notFound('Driver', driverId);
    }
  }

  private async requireRequest(requestId: string, executor: Executor = this.db): Promise<DriverLeaveRequest> {
    const request = await this.requests.findById(requestId, executor);
    if (!request) {
      throw Errors.notFound('Leave request', requestId);
    }
    return request;
  }

  private async emit(type: string, request: DriverLeaveRequest): Promise<void> {
    await this.events.emit(LEDGER_CHANNELS.leaves, type, {
      request_id: request.id,
      driver_id: request.driver_id,
      start_date: request.start_date,
      end_date: request.end_date,
      days: request.days,
      status: request.status,
    });
  }
}
