import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('subscription_plans', (table) => {
    table.uuid('id').primary();
    table.string('code', 20).notNullable().unique(); // DAILY, WEEKLY, MONTHLY, YEARLY
    table.string('name', 50).notNullable();
    table.string('name_hi', 100).nullable();
    table.decimal('price', 10, 2).notNullable();
    table.integer('validity_days').notNullable();
    table.integer('swaps_included').notNullable(); // -1 for unlimited
    table.integer('swaps_per_day').notNullable().defaultTo(-1); // -1 for unlimited
    table.decimal('extra_swap_price', 10, 2).notNullable().defaultTo(35);
    table.decimal('gst_percentage', 5, 2).notNullable().defaultTo(18);
    table.text('description_en').nullable();
    table.text('description_hi').nullable();
    table.boolean('is_active').notNullable().defaultTo(true);
    table.timestamps(true, true);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('subscription_plans');
}
