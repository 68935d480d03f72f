import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('swaps', (table) => {
    table.uuid('id').primary();
    table.uuid('driver_id').notNullable().references('id').inTable('drivers');
    table.uuid('station_id').notNullable().references('id').inTable('stations');
    table.uuid('subscription_id').nullable().references('id').inTable('driver_subscriptions');
    table.string('old_battery_id', 50).nullable();
    table.string('new_battery_id', 50).nullable();
    table.integer('old_battery_charge_level').nullable(); // percentage
    table.integer('new_battery_charge_level').nullable(); // percentage
    table.timestamp('swap_time', { useTz: true }).notNullable();
    table.date('swap_date').notNullable(); // business-timezone calendar date of swap_time
    table.boolean('is_subscription_swap').notNullable().defaultTo(true);
    table.decimal('charge_amount', 10, 2).notNullable().defaultTo(0);
    table.enum('status', ['completed', 'failed', 'refunded']).notNullable().defaultTo('completed');

    table.index('station_id');
    table.index(['driver_id', 'swap_date']);
    table.index(['subscription_id', 'swap_date']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('swaps');
}
