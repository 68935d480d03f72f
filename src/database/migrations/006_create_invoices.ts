import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // One counter row per billing period; incremented atomically per invoice
  await knex.schema.createTable('invoice_counters', (table) => {
    table.string('period', 6).primary(); // YYYYMM
    table.integer('last_value').notNullable().defaultTo(0);
    table.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('invoices', (table) => {
    table.uuid('id').primary();
    table.string('invoice_number', 20).notNullable().unique(); // INV-YYYYMM-NNNNNN
    table.string('period', 6).notNullable();
    table.uuid('driver_id').notNullable().references('id').inTable('drivers');
    table.uuid('swap_id').nullable().references('id').inTable('swaps');
    table.uuid('subscription_id').nullable().references('id').inTable('driver_subscriptions');
    table.enum('invoice_type', ['swap', 'subscription', 'extra_swap']).notNullable();
    table.decimal('amount', 10, 2).notNullable();
    table.decimal('tax_amount', 10, 2).notNullable().defaultTo(0);
    table.decimal('total_amount', 10, 2).notNullable();
    table.text('description').nullable();
    table.enum('payment_status', ['paid', 'pending', 'failed']).notNullable().defaultTo('pending');
    table.timestamp('generated_at', { useTz: true }).notNullable();
    table.timestamp('updated_at', { useTz: true }).notNullable();

    table.index('driver_id');
    table.index('swap_id');
    table.index('period');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('invoices');
  await knex.schema.dropTableIfExists('invoice_counters');
}
