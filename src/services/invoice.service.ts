import { Knex } from 'knex';
import { getDb } from '../config/database';
import { logger } from '../config/logger';
import { InvoiceRepository } from '../repositories/invoice.repository';
import { Invoice, InvoiceType, LedgerServiceOptions, PaymentStatus } from '../types';
import { billingPeriod } from '../utils/date.util';
import { Errors } from '../utils/error-handler.util';
import { round2 } from '../utils/money.util';
import { inTransaction } from '../utils/transaction.util';
import { BaseService } from './base.service';
import { LEDGER_CHANNELS } from './ledger-events.service';

export const MAX_INVOICE_SEQUENCE = 999999;

const PERIOD_PATTERN = /^\d{4}(0[1-9]|1[0-2])$/;

export interface CreateInvoiceInput {
  invoice_type: InvoiceType;
  driver_id: string;
  amount: number;
  /** Fraction, e.g. 0.18 for 18% GST. */
  tax_rate: number;
  swap_id?: string | null;
  subscription_id?: string | null;
  description?: string | null;
  payment_status?: PaymentStatus;
}

export function formatInvoiceNumber(period: string, sequence: number): string {
  return `INV-${period}-${String(sequence).padStart(6, '0')}`;
}

export class InvoiceService extends BaseService {
  private repository: InvoiceRepository;

  constructor(db: Knex = getDb(), options: LedgerServiceOptions = {}) {
    super(db, options);
    this.repository = new InvoiceRepository(db);
  }

  /**
   * Allocate the next `INV-YYYYMM-NNNNNN` number of a billing period.
   * Pass `trx` to make the allocation part of a larger unit of work.
   */
  async nextInvoiceNumber(period: string, trx?: Knex.Transaction): Promise<string> {
    if (!PERIOD_PATTERN.test(period)) {
      throw Errors.invalidInput(`Invalid billing period: ${period}`);
    }
    const { now } = this.moment();

    return inTransaction(
      this.db,
      async (t) => {
        const sequence = await this.repository.allocateSequence(period, now, t);
        if (sequence > MAX_INVOICE_SEQUENCE) {
          throw Errors.internal(`Invoice sequence exhausted for period ${period}`);
        }
        return formatInvoiceNumber(period, sequence);
      },
      trx
    );
  }

  async createInvoice(input: CreateInvoiceInput, trx?: Knex.Transaction): Promise<Invoice> {
    if (!Number.isFinite(input.amount) || input.amount < 0) {
      throw Errors.invalidInput('Invoice amount must be a non-negative number');
    }
    if (!Number.isFinite(input.tax_rate) || input.tax_rate < 0 || input.tax_rate > 1) {
      throw Errors.invalidInput('Tax rate must be a fraction between 0 and 1');
    }

    const { today, now } = this.moment();
    const period = billingPeriod(today);
    const taxAmount = round2(input.amount * input.tax_rate);
    const totalAmount = round2(input.amount + taxAmount);

    const invoice = await inTransaction(
      this.db,
      async (t) => {
        const invoiceNumber = await this.nextInvoiceNumber(period, t);
        return this.repository.create(
          {
            invoice_number: invoiceNumber,
            period,
            driver_id: input.driver_id,
            swap_id: input.swap_id ?? null,
            subscription_id: input.subscription_id ?? null,
            invoice_type: input.invoice_type,
            amount: round2(input.amount),
            tax_amount: taxAmount,
            total_amount: totalAmount,
            description: input.description ?? null,
            payment_status: input.payment_status ?? 'pending',
            generated_at: now,
            updated_at: now,
          },
          t
        );
      },
      trx
    );

    logger.info({
      message: 'Invoice created',
      invoiceNumber: invoice.invoice_number,
      driverId: invoice.driver_id,
      invoiceType: invoice.invoice_type,
      total: invoice.total_amount,
    });

    // Inside a caller's transaction the caller announces it after commit
    if (!trx) {
      await this.announce(invoice);
    }

    return invoice;
  }

  async announce(invoice: Invoice): Promise<void> {
    await this.events.emit(LEDGER_CHANNELS.invoices, 'invoice.created', {
      invoice_number: invoice.invoice_number,
      driver_id: invoice.driver_id,
      invoice_type: invoice.invoice_type,
      total_amount: invoice.total_amount,
    });
  }

  async getByNumber(invoiceNumber: string): Promise<Invoice> {
    const invoice = await this.repository.findByNumber(invoiceNumber);
    if (!invoice) {
      throw Errors.notFound('Invoice', invoiceNumber);
    }
    return invoice;
  }

  async listForDriver(driverId: string): Promise<Invoice[]> {
    return this.repository.findForDriver(driverId);
  }

  async updatePaymentStatus(invoiceNumber: string, status: PaymentStatus): Promise<Invoice> {
    const { now } = this.moment();
    const invoice = await this.repository.setPaymentStatus(invoiceNumber, status, now);
    if (!invoice) {
      throw Errors.notFound('Invoice', invoiceNumber);
    }

    logger.info({ message: 'Invoice payment status updated', invoiceNumber, status });
    return invoice;
  }
}
