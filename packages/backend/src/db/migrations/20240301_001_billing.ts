import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('patients', (t) => {
    t.increments('patient_id').primary();
    t.string('first_name', 100).notNullable();
    t.string('last_name', 100).notNullable();
    t.date('date_of_birth').nullable();
    t.string('insurance_provider', 200).nullable();
    t.string('insurance_policy_number', 100).nullable();
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('providers', (t) => {
    t.increments('provider_id').primary();
    t.string('provider_name', 200).notNullable();
    t.string('npi_number', 10).nullable().unique();
    t.string('specialty', 100).nullable();
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('services', (t) => {
    t.increments('service_id').primary();
    t.string('cpt_code', 10).notNullable().unique();
    t.string('description', 500).notNullable();
    t.decimal('standard_charge', 10, 2).nullable();
  });

  await knex.schema.createTable('claims', (t) => {
    t.increments('claim_id').primary();
    t.integer('patient_id').unsigned().notNullable();
    t.integer('provider_id').unsigned().notNullable();
    t.date('claim_date').notNullable();
    t.enum('status', ['draft', 'submitted', 'pending', 'paid', 'denied', 'appealed'])
      .notNullable()
      .defaultTo('draft')
      .index('idx_claims_status');
    t.decimal('total_charge', 10, 2).notNullable().defaultTo(0);
    t.decimal('insurance_paid', 10, 2).notNullable().defaultTo(0);
    t.decimal('patient_paid', 10, 2).notNullable().defaultTo(0);
    t.decimal('fraud_score', 5, 2).nullable();
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());
    t.foreign('patient_id').references('patients.patient_id');
    t.foreign('provider_id').references('providers.provider_id');
  });

  await knex.schema.createTable('claim_items', (t) => {
    t.increments('item_id').primary();
    t.integer('claim_id').unsigned().notNullable();
    t.integer('service_id').unsigned().notNullable();
    t.decimal('charge_amount', 10, 2).notNullable();
    t.foreign('claim_id').references('claims.claim_id').onDelete('CASCADE');
    t.foreign('service_id').references('services.service_id');
    t.index(['claim_id'], 'idx_claim_items_claim');
  });

  await knex.schema.createTable('audit_log', (t) => {
    t.string('id', 36).primary();
    t.integer('claim_id').unsigned().nullable().index('idx_audit_log_claim');
    t.string('event_type', 50).notNullable();
    t.enum('actor_type', ['SYSTEM', 'USER', 'LLM']).notNullable();
    t.string('actor_id', 200).nullable();
    t.json('detail_json').notNullable();
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('audit_log');
  await knex.schema.dropTableIfExists('claim_items');
  await knex.schema.dropTableIfExists('claims');
  await knex.schema.dropTableIfExists('services');
  await knex.schema.dropTableIfExists('providers');
  await knex.schema.dropTableIfExists('patients');
}
