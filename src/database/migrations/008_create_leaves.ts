import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // remaining = total_leaves - used_leaves is computed on read, never stored
  await knex.schema.createTable('leave_balance', (table) => {
    table.uuid('id').primary();
    table.uuid('driver_id').notNullable().references('id').inTable('drivers');
    table.string('month_year', 7).notNullable(); // YYYY-MM
    table.integer('total_leaves').notNullable().defaultTo(4);
    table.integer('used_leaves').notNullable().defaultTo(0);
    table.timestamps(true, true);

    table.unique(['driver_id', 'month_year']);
    table.index('month_year');
  });

  await knex.schema.createTable('driver_leaves', (table) => {
    table.uuid('id').primary();
    table.uuid('driver_id').notNullable().references('id').inTable('drivers');
    table.date('start_date').notNullable();
    table.date('end_date').notNullable();
    table.integer('days').notNullable();
    table.string('reason', 200).nullable();
    table.enum('status', ['pending', 'approved', 'rejected']).notNullable().defaultTo('pending');
    table.timestamp('created_at', { useTz: true }).notNullable();
    table.timestamp('processed_at', { useTz: true }).nullable();
    table.string('processed_by', 100).nullable();
    table.string('rejection_reason', 200).nullable();

    table.index('driver_id');
    table.index(['start_date', 'end_date']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('driver_leaves');
  await knex.schema.dropTableIfExists('leave_balance');
}
