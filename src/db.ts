import knex from 'knex';
import type { Knex } from 'knex';

// ---------------------------------------------------------------------------
// Database client
// ---------------------------------------------------------------------------

export function createDb(filename: string): Knex {
  return knex({
    client: 'better-sqlite3',
    connection: { filename },
    useNullAsDefault: true,
  });
}

// ---------------------------------------------------------------------------
// Schema bootstrap — idempotent, safe to call on every startup
// ---------------------------------------------------------------------------

export async function initDb(db: Knex): Promise<void> {
  // --- incoming_requests ---------------------------------------------------
  // One row per HTTP round trip (written by the request logger).
  if (!(await db.schema.hasTable('incoming_requests'))) {
    await db.schema.createTable('incoming_requests', (t) => {
      t.increments('id').primary();
      t.string('method').notNullable();
      t.text('url').notNullable();
      t.string('ip').nullable();
      t.integer('request_bytes').nullable();
      t.integer('response_status').nullable();
      t.text('response_body').nullable();
      t.integer('duration_ms').nullable();
      t.timestamp('created_at').defaultTo(db.fn.now());
    });
  }

  // --- inventory_runs ------------------------------------------------------
  // Audit log for every selection / reconciliation, from the API or a batch job.
  if (!(await db.schema.hasTable('inventory_runs'))) {
    await db.schema.createTable('inventory_runs', (t) => {
      t.increments('id').primary();
      t.string('run_id').notNullable().unique();
      t.string('mode').notNullable();              // latest | reconcile | full
      t.string('source').notNullable();            // api | batch
      t.integer('input_count').notNullable().defaultTo(0);
      t.integer('output_count').nullable();
      t.integer('matched_count').nullable();
      t.integer('unmatched_count').nullable();
      t.integer('skipped_blank_names').notNullable().defaultTo(0);
      t.string('status').notNullable();            // completed | failed
      t.text('last_error').nullable();
      t.integer('duration_ms').notNullable().defaultTo(0);
      t.string('created_at').notNullable();
    });
  }
}
