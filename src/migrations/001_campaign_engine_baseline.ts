import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.raw('CREATE EXTENSION IF NOT EXISTS "uuid-ossp"');

  // ---------------------------------------------------------------------------
  // Customer base (owned by the loyalty subsystem, read here for audiences)
  // ---------------------------------------------------------------------------
  await knex.schema.createTable('customers', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('uuid_generate_v4()'));
    table.uuid('restaurant_id').notNullable();
    table.string('name', 200).nullable();
    table.string('email', 255).nullable();
    table.string('phone', 50).nullable();
    table.boolean('consent_push').notNullable().defaultTo(false);
    table.boolean('consent_email').notNullable().defaultTo(false);
    table.boolean('consent_sms').notNullable().defaultTo(false);
    table.boolean('consent_whatsapp').notNullable().defaultTo(false);
    table.integer('total_points').notNullable().defaultTo(0);
    table.integer('visit_count').notNullable().defaultTo(0);
    table.bigInteger('total_spent_cents').notNullable().defaultTo(0);
    table.timestamp('last_visit', { useTz: true }).nullable();
    table.decimal('latitude', 9, 6).nullable();
    table.decimal('longitude', 9, 6).nullable();
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    table.index(['restaurant_id', 'id']);
    table.index(['restaurant_id', 'last_visit']);
    table.index(['restaurant_id', 'total_points']);
  });

  await knex.schema.createTable('customer_tags', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('uuid_generate_v4()'));
    table.uuid('restaurant_id').notNullable();
    table.string('name', 100).notNullable();
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    table.unique(['restaurant_id', 'name']);
  });

  await knex.schema.createTable('customer_tag_assignments', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('uuid_generate_v4()'));
    table.uuid('customer_id').notNullable().references('id').inTable('customers').onDelete('CASCADE');
    table.uuid('tag_id').notNullable().references('id').inTable('customer_tags').onDelete('CASCADE');
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    table.unique(['customer_id', 'tag_id']);
    table.index(['tag_id']);
  });

  // ---------------------------------------------------------------------------
  // Campaigns
  // ---------------------------------------------------------------------------
  await knex.schema.createTable('campaigns', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('uuid_generate_v4()'));
    table.uuid('restaurant_id').notNullable();
    table.string('name', 200).notNullable();
    table.text('description').nullable();
    table.string('type', 20).notNullable();
    table.string('status', 20).notNullable().defaultTo('draft');
    table.string('primary_channel', 20).notNullable();
    table.string('fallback_channel', 20).nullable();
    table.string('audience_type', 30).notNullable();
    table.jsonb('audience_filter').notNullable().defaultTo('{}');
    table.integer('estimated_audience_size').notNullable().defaultTo(0);
    table.string('message_subject', 200).nullable();
    table.text('message_template').notNullable();
    table.timestamp('scheduled_at', { useTz: true }).nullable();
    table.jsonb('recurring_config').nullable();
    table.jsonb('ab_test_config').nullable();
    table.jsonb('promo_template').nullable();
    table.string('created_by', 100).nullable();
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp('sent_at', { useTz: true }).nullable();
    // set once every audience member has a send row; cleared on each entry to sending
    table.timestamp('dispatch_completed_at', { useTz: true }).nullable();

    table.index(['restaurant_id', 'created_at']);
    table.index(['status', 'scheduled_at']);
  });

  await knex.raw(`
    ALTER TABLE campaigns ADD CONSTRAINT campaigns_status_check
    CHECK (status IN ('draft', 'scheduled', 'sending', 'sent', 'cancelled', 'paused'))
  `);

  // ---------------------------------------------------------------------------
  // Promo codes and redemptions
  // ---------------------------------------------------------------------------
  await knex.schema.createTable('promo_codes', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('uuid_generate_v4()'));
    table.uuid('campaign_id').nullable().references('id').inTable('campaigns').onDelete('SET NULL');
    table.uuid('restaurant_id').notNullable();
    table.string('code', 80).notNullable();
    table.string('discount_type', 20).notNullable();
    table.decimal('discount_value', 12, 2).notNullable();
    table.bigInteger('min_spend_cents').notNullable().defaultTo(0);
    table.integer('max_uses').nullable();
    table.integer('max_uses_per_customer').notNullable().defaultTo(1);
    table.integer('total_uses').notNullable().defaultTo(0);
    table.string('order_type', 20).notNullable().defaultTo('all');
    table.timestamp('valid_from', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp('valid_until', { useTz: true }).notNullable();
    table.boolean('is_active').notNullable().defaultTo(true);
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    table.unique(['restaurant_id', 'code'], { indexName: 'promo_codes_restaurant_code_unique' });
    table.index(['campaign_id']);
  });

  await knex.raw(`
    ALTER TABLE promo_codes ADD CONSTRAINT promo_codes_usage_check
    CHECK (total_uses >= 0 AND (max_uses IS NULL OR total_uses <= max_uses))
  `);

  await knex.raw(`
    ALTER TABLE promo_codes ADD CONSTRAINT promo_codes_discount_check
    CHECK (
      (discount_type = 'percentage' AND discount_value > 0 AND discount_value <= 100)
      OR (discount_type = 'fixed_amount' AND discount_value > 0)
    )
  `);

  await knex.raw(`
    ALTER TABLE promo_codes ADD CONSTRAINT promo_codes_validity_check
    CHECK (valid_until > valid_from)
  `);

  await knex.schema.createTable('promo_code_redemptions', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('uuid_generate_v4()'));
    table.uuid('promo_code_id').notNullable().references('id').inTable('promo_codes').onDelete('CASCADE');
    table.uuid('customer_id').notNullable();
    table.uuid('restaurant_id').notNullable();
    table.uuid('order_id').nullable();
    table.bigInteger('order_amount_cents').notNullable();
    table.bigInteger('discount_applied_cents').notNullable();
    table.timestamp('redeemed_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    table.index(['promo_code_id', 'customer_id']);
    table.index(['restaurant_id', 'redeemed_at']);
  });

  await knex.raw(`
    ALTER TABLE promo_code_redemptions ADD CONSTRAINT promo_code_redemptions_amount_check
    CHECK (discount_applied_cents >= 0 AND discount_applied_cents <= order_amount_cents)
  `);

  // ---------------------------------------------------------------------------
  // Send ledger and metrics
  // ---------------------------------------------------------------------------
  await knex.schema.createTable('campaign_sends', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('uuid_generate_v4()'));
    table.uuid('campaign_id').notNullable().references('id').inTable('campaigns').onDelete('CASCADE');
    table.uuid('customer_id').notNullable();
    table.string('channel_used', 20).notNullable();
    table.string('status', 20).notNullable().defaultTo('pending');
    table.timestamp('sent_at', { useTz: true }).nullable();
    table.timestamp('delivered_at', { useTz: true }).nullable();
    table.timestamp('opened_at', { useTz: true }).nullable();
    table.timestamp('clicked_at', { useTz: true }).nullable();
    table.text('error_message').nullable();
    table.string('promo_code_assigned', 80).nullable();
    table.string('ab_variant', 1).nullable();
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    table.unique(['campaign_id', 'customer_id']);
    table.index(['campaign_id', 'status']);
  });

  await knex.schema.createTable('campaign_metrics', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('uuid_generate_v4()'));
    table.uuid('campaign_id').notNullable().unique().references('id').inTable('campaigns').onDelete('CASCADE');
    table.integer('total_targeted').notNullable().defaultTo(0);
    table.integer('total_sent').notNullable().defaultTo(0);
    table.integer('total_delivered').notNullable().defaultTo(0);
    table.integer('total_failed').notNullable().defaultTo(0);
    table.integer('total_bounced').notNullable().defaultTo(0);
    table.integer('total_opened').notNullable().defaultTo(0);
    table.integer('total_clicked').notNullable().defaultTo(0);
    table.integer('total_redemptions').notNullable().defaultTo(0);
    table.bigInteger('total_discount_cents').notNullable().defaultTo(0);
    table.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  // Audit entries outlive the campaign they describe; no foreign key
  await knex.schema.createTable('campaign_audit_log', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('uuid_generate_v4()'));
    table.uuid('campaign_id').notNullable();
    table.string('action', 30).notNullable();
    table.string('performed_by', 100).notNullable();
    table.jsonb('changes').notNullable().defaultTo('{}');
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    table.index(['campaign_id', 'created_at']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('campaign_audit_log');
  await knex.schema.dropTableIfExists('campaign_metrics');
  await knex.schema.dropTableIfExists('campaign_sends');
  await knex.schema.dropTableIfExists('promo_code_redemptions');
  await knex.schema.dropTableIfExists('promo_codes');
  await knex.schema.dropTableIfExists('campaigns');
  await knex.schema.dropTableIfExists('customer_tag_assignments');
  await knex.schema.dropTableIfExists('customer_tags');
  await knex.schema.dropTableIfExists('customers');
}
