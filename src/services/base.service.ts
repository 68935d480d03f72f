import { Knex } from 'knex';
import { appConfig, LedgerRules } from '../config';
import { LedgerServiceOptions } from '../types';
import { businessDate, Clock, systemClock } from '../utils/date.util';
import { LedgerEvents } from './ledger-events.service';

export interface Moment {
  /** Business-timezone calendar date, 'YYYY-MM-DD'. */
  today: string;
  /** ISO-8601 timestamp. */
  now: string;
}

export abstract class BaseService {
  protected db: Knex;
  protected clock: Clock;
  protected rules: LedgerRules;
  protected events: LedgerEvents;

  constructor(db: Knex, options: LedgerServiceOptions = {}) {
    this.db = db;
    this.clock = options.clock ?? systemClock;
    this.rules = options.rules ?? appConfig.ledger;
    this.events = options.events ?? new LedgerEvents();
  }

  protected options(): LedgerServiceOptions {
    return { clock: this.clock, rules: this.rules, events: this.events };
  }

  protected moment(): Moment {
    const instant = this.clock.now();
    return {
      today: businessDate(instant, this.rules.timezone),
      now: instant.toISOString(),
    };
  }
}
