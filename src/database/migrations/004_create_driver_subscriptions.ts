import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('driver_subscriptions', (table) => {
    table.uuid('id').primary();
    table.uuid('driver_id').notNullable().references('id').inTable('drivers').onDelete('CASCADE');
    table.uuid('plan_id').notNullable().references('id').inTable('subscription_plans');
    table.date('start_date').notNullable();
    table.date('end_date').notNullable();
    table.enum('status', ['active', 'expired', 'cancelled', 'suspended']).notNullable().defaultTo('active');
    table.integer('swaps_used').notNullable().defaultTo(0);
    table.boolean('auto_renew').notNullable().defaultTo(false);
    table.string('battery_id', 50).nullable();
    table.boolean('battery_returned').notNullable().defaultTo(false);
    table.boolean('is_misplaced').notNullable().defaultTo(false);
    table.timestamp('battery_returned_date', { useTz: true }).nullable();
    table.timestamps(true, true);

    table.index('driver_id');
    table.index('status');
    table.index('end_date');
    table.index(['driver_id', 'status', 'end_date']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('driver_subscriptions');
}
