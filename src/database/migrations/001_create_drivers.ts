import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('drivers', (table) => {
    table.uuid('id').primary();
    table.string('phone_number', 15).notNullable().unique();
    table.string('name', 100).nullable();
    table.string('email', 100).nullable();
    table.string('preferred_language', 10).notNullable().defaultTo('hi-en');
    table.string('city', 50).nullable();
    table.string('vehicle_number', 20).nullable();
    table.boolean('is_active').notNullable().defaultTo(true);
    table.timestamps(true, true);

    table.index('city');
    table.index('vehicle_number');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('drivers');
}
