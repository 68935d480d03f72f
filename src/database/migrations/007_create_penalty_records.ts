import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('penalty_records', (table) => {
    table.uuid('id').primary();
    table.uuid('driver_id').notNullable().references('id').inTable('drivers');
    table.uuid('subscription_id').notNullable().references('id').inTable('driver_subscriptions');
    table.enum('reason', ['battery_not_returned', 'late_return', 'damage']).notNullable();
    table.integer('days_overdue').notNullable().defaultTo(0);
    table.decimal('daily_rate', 10, 2).notNullable().defaultTo(80);
    table.decimal('total_amount', 10, 2).notNullable();
    table.enum('status', ['pending', 'paid', 'waived']).notNullable().defaultTo('pending');
    table.timestamps(true, true);
    table.timestamp('paid_at', { useTz: true }).nullable();

    table.index('driver_id');
    table.index(['subscription_id', 'status']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('penalty_records');
}
