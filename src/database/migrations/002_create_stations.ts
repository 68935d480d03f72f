import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('stations', (table) => {
    table.uuid('id').primary();
    table.string('code', 20).notNullable().unique();
    table.string('name', 100).notNullable();
    table.text('address').nullable();
    table.string('landmark', 200).nullable();
    table.decimal('latitude', 10, 8).notNullable();
    table.decimal('longitude', 11, 8).notNullable();
    table.string('city', 50).notNullable();
    table.string('pincode', 10).nullable();
    table.string('operating_hours', 50).notNullable().defaultTo('06:00-22:00');
    table.string('contact_phone', 15).nullable();
    table.boolean('is_dsk').notNullable().defaultTo(false);
    table.boolean('is_active').notNullable().defaultTo(true);
    table.timestamps(true, true);

    table.index('city');
    table.index(['latitude', 'longitude']);
  });

  await knex.schema.createTable('station_inventory', (table) => {
    table.uuid('id').primary();
    table.uuid('station_id').notNullable().unique().references('id').inTable('stations').onDelete('CASCADE');
    table.integer('available_batteries').notNullable().defaultTo(0);
    table.integer('charging_batteries').notNullable().defaultTo(0);
    table.integer('total_slots').notNullable().defaultTo(0);
    table.timestamp('last_updated', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('dsk_locations', (table) => {
    table.uuid('id').primary();
    table.string('code', 20).notNullable().unique();
    table.string('name', 100).notNullable();
    table.text('address').nullable();
    table.string('landmark', 200).nullable();
    table.decimal('latitude', 10, 8).notNullable();
    table.decimal('longitude', 11, 8).notNullable();
    table.string('city', 50).notNullable();
    table.string('pincode', 10).nullable();
    table.string('phone', 15).nullable();
    table.string('operating_hours', 50).notNullable().defaultTo('09:00-18:00');
    table.json('services').nullable(); // ['activation', 'repair', 'support', 'battery_replacement']
    table.boolean('is_active').notNullable().defaultTo(true);
    table.timestamps(true, true);

    table.index('city');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('dsk_locations');
  await knex.schema.dropTableIfExists('station_inventory');
  await knex.schema.dropTableIfExists('stations');
}
