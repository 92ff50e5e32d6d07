// src/db/index.ts - local record store (SQLite through knex)
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import knex, { Knex } from 'knex';
import type { Logger } from 'pino';

export const RUN_TABLE = 'run_records';

export interface DatabaseInitOptions {
  filename: string;
  logger?: Logger;
}

function createDbConnection(filename: string): Knex {
  if (filename !== ':memory:') mkdirSync(path.dirname(filename), { recursive: true });
  return knex({
    client: 'better-sqlite3',
    connection: { filename },
    useNullAsDefault: true,
  });
}

async function testConnection(database: Knex, logger?: Logger): Promise<void> {
  try {
    await database.raw('select 1 as ok');
  } catch (err) {
    logger?.error({ err }, 'DB connection test failed');
    throw err;
  }
}

/** Idempotent schema setup; the table is append-only so this only ever creates. */
export async function runMigrations(database: Knex, logger?: Logger): Promise<void> {
  if (await database.schema.hasTable(RUN_TABLE)) {
    logger?.debug({ table: RUN_TABLE }, 'record table already present');
    return;
  }
  await database.schema.createTable(RUN_TABLE, (t) => {
    t.string('id').primary();
    t.string('kind').notNullable();
    t.integer('version').notNullable();
    t.string('created_at').notNullable();
    t.string('session_id').notNullable().index();
    t.text('input_json').notNullable();
    t.string('input_type');
    t.integer('needs_clarification').notNullable().defaultTo(0);
    t.text('follow_up_question');
    t.text('message');
    t.text('explanation');
    t.text('raw_tags').notNullable();
    t.text('justified_tags').notNullable();
    t.text('matched_tags').notNullable();
    t.text('matched_strategies').notNullable();
    t.integer('rating');
    t.text('feedback');
    t.text('rebuttal');
    t.float('confidence_score');
    t.text('justification');
    t.text('suggested_improvements');
    t.text('ultimate_reply');
  });
  logger?.info({ table: RUN_TABLE }, 'record table created');
}

export async function initializeDatabase(options: DatabaseInitOptions): Promise<Knex> {
  const { filename, logger } = options;
  logger?.info({ filename }, 'Initializing record store…');
  const database = createDbConnection(filename);
  try {
    await testConnection(database, logger);
    await runMigrations(database, logger);
  } catch (err) {
    await database.destroy();
    throw err;
  }
  return database;
}

export async function closeDb(database: Knex): Promise<void> {
  await database.destroy();
}
