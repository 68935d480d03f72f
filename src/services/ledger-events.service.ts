import { logger } from '../config/logger';
import { Clock, systemClock } from '../utils/date.util';

export const LEDGER_CHANNELS = {
  swaps: 'ledger:swaps',
  invoices: 'ledger:invoices',
  penalties: 'ledger:penalties',
  leaves: 'ledger:leaves',
} as const;

export type LedgerChannel = (typeof LEDGER_CHANNELS)[keyof typeof LEDGER_CHANNELS];

/** Anything with Redis' `PUBLISH` shape; an ioredis client satisfies it. */
export interface EventTransport {
  publish(channel: string, message: string): Promise<unknown>;
}

export interface LedgerEvent {
  type: string;
  occurred_at: string;
  payload: Record<string, unknown>;
}

/**
 * Publishes ledger changes for downstream consumers (SMS, dialogue layer).
 *
 * Events are emitted after the ledger write has committed. A publish failure
 * is logged and otherwise ignored.
 */
export class LedgerEvents {
  private transport: EventTransport | null;
  private clock: Clock;

  constructor(transport: EventTransport | null = null, clock: Clock = systemClock) {
    this.transport = transport;
    this.clock = clock;
  }

  async emit(channel: LedgerChannel, type: string, payload: Record<string, unknown>): Promise<void> {
    if (!this.transport) {
      return;
    }

    const event: LedgerEvent = {
      type,
      occurred_at: this.clock.now().toISOString(),
      payload,
    };

    try {
      await this.transport.publish(channel, JSON.stringify(event));
    } catch (error) {
      logger.warn({
        message: 'Failed to publish ledger event',
        channel,
        type,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
