import { Knex } from 'knex';
import { z } from 'zod';
import { invoiceRecordSchema } from '../schemas/record.schemas';
import { Executor, Invoice, PaymentStatus } from '../types';
import { BaseRepository } from './base.repository';

const counterRowSchema = z.object({
  last_value: z.union([z.number(), z.string()]).transform((value) => Number(value)),
});

export class InvoiceRepository extends BaseRepository<Invoice> {
  constructor(db: Knex) {
    super('invoices', db, invoiceRecordSchema);
  }

  /**
   * Increment the period counter in a single upsert and read the new value.
   * The upsert holds the counter row's lock until `trx` ends, so concurrent
   * allocations for one period queue behind each other and never share a value.
   */
  async allocateSequence(period: string, now: string, trx: Knex.Transaction): Promise<number> {
    await trx('invoice_counters')
      .insert({ period, last_value: 1, updated_at: now })
      .onConflict('period')
      .merge({
        last_value: trx.raw('?? + 1', ['invoice_counters.last_value']),
        updated_at: now,
      });

    const row: unknown = await trx('invoice_counters').where({ period }).first('last_value');
    return counterRowSchema.parse(row).last_value;
  }

  async findByNumber(invoiceNumber: string, executor: Executor = this.db): Promise<Invoice | null> {
    const row: unknown = await executor('invoices').where({ invoice_number: invoiceNumber }).first();
    return this.parseOptional(row);
  }

  async findForDriver(driverId: string, executor: Executor = this.db): Promise<Invoice[]> {
    const rows: unknown[] = await executor('invoices')
      .where({ driver_id: driverId })
      .orderBy('invoice_number', 'desc');
    return this.parseMany(rows);
  }

  async setPaymentStatus(
    invoiceNumber: string,
    status: PaymentStatus,
    now: string,
    executor: Executor = this.db
  ): Promise<Invoice | null> {
    await executor('invoices')
      .where({ invoice_number: invoiceNumber })
      .update({ payment_status: status, updated_at: now });
    return this.findByNumber(invoiceNumber, executor);
  }
}
