/**
 * Database Migrations
 *
 * Creates the schedule-of-activities tables on server startup.
 *
 * Tables are created WITHOUT foreign key constraints; the services keep
 * referential integrity themselves (cells and concept mappings follow their
 * visit/activity through deletes and rollbacks).
 */

import { DbExecutor } from './database';
import { logger } from './logger';

/**
 * Run all startup migrations
 * Creates tables with IF NOT EXISTS so they're idempotent
 */
export async function runStartupMigrations(executor: DbExecutor): Promise<void> {
  logger.info('Running startup migrations...');

  const migrations = [
    { name: 'study', fn: createStudyTables },
    { name: 'matrix', fn: createMatrixTables },
    { name: 'design_structure', fn: createDesignTables },
    { name: 'versioning', fn: createVersioningTables },
    { name: 'audit', fn: createAuditTables }
  ];

  for (const migration of migrations) {
    try {
      await migration.fn(executor);
    } catch (error) {
      logger.error(`Migration '${migration.name}' failed`, {
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }

  logger.info(`Startup migrations complete: ${migrations.length} applied`);
}

// ============================================================================
// Study
// ============================================================================
async function createStudyTables(executor: DbExecutor): Promise<void> {
  await executor.query(`
    CREATE TABLE IF NOT EXISTS study (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL,
      study_code TEXT,
      label TEXT,
      description TEXT,
      epoch_seq_counter INTEGER NOT NULL DEFAULT 0,
      created_at TIMESTAMPTZ NOT NULL
    )
  `);
}

// ============================================================================
// Visits, activities, matrix cells, concept mappings
// ============================================================================
async function createMatrixTables(executor: DbExecutor): Promise<void> {
  await executor.query(`
    CREATE TABLE IF NOT EXISTS visit (
      id SERIAL PRIMARY KEY,
      study_id INTEGER NOT NULL,
      name TEXT NOT NULL,
      raw_header TEXT,
      order_index INTEGER NOT NULL,
      epoch_id INTEGER
    )
  `);

  await executor.query(`
    CREATE TABLE IF NOT EXISTS activity (
      id SERIAL PRIMARY KEY,
      study_id INTEGER NOT NULL,
      name TEXT NOT NULL,
      order_index INTEGER NOT NULL,
      activity_uid TEXT NOT NULL
    )
  `);

  await executor.query(`
    CREATE TABLE IF NOT EXISTS cell (
      id SERIAL PRIMARY KEY,
      study_id INTEGER NOT NULL,
      visit_id INTEGER NOT NULL,
      activity_id INTEGER NOT NULL,
      status TEXT NOT NULL
    )
  `);

  // concept_title is captured at assignment time and never refreshed
  await executor.query(`
    CREATE TABLE IF NOT EXISTS activity_concept (
      id SERIAL PRIMARY KEY,
      activity_id INTEGER NOT NULL,
      concept_code TEXT NOT NULL,
      concept_title TEXT NOT NULL
    )
  `);

  await executor.query(`CREATE INDEX IF NOT EXISTS idx_visit_study ON visit(study_id)`);
  await executor.query(`CREATE INDEX IF NOT EXISTS idx_activity_study ON activity(study_id)`);
  await executor.query(`CREATE INDEX IF NOT EXISTS idx_cell_study ON cell(study_id)`);
  await executor.query(`CREATE INDEX IF NOT EXISTS idx_activity_concept_activity ON activity_concept(activity_id)`);
}

// ============================================================================
// Arms, epochs, elements
// ============================================================================
async function createDesignTables(executor: DbExecutor): Promise<void> {
  await executor.query(`
    CREATE TABLE IF NOT EXISTS arm (
      id SERIAL PRIMARY KEY,
      study_id INTEGER NOT NULL,
      name TEXT NOT NULL,
      label TEXT,
      description TEXT,
      type TEXT,
      data_origin_type TEXT,
      order_index INTEGER NOT NULL,
      arm_uid TEXT NOT NULL
    )
  `);

  await executor.query(`
    CREATE TABLE IF NOT EXISTS epoch (
      id SERIAL PRIMARY KEY,
      study_id INTEGER NOT NULL,
      name TEXT NOT NULL,
      order_index INTEGER NOT NULL,
      epoch_seq INTEGER NOT NULL,
      epoch_label TEXT,
      epoch_description TEXT
    )
  `);

  await executor.query(`
    CREATE TABLE IF NOT EXISTS element (
      id SERIAL PRIMARY KEY,
      study_id INTEGER NOT NULL,
      element_uid TEXT NOT NULL,
      name TEXT NOT NULL,
      label TEXT,
      description TEXT,
      testrl TEXT,
      teenrl TEXT,
      order_index INTEGER NOT NULL,
      created_at TIMESTAMPTZ NOT NULL
    )
  `);
}

// ============================================================================
// Freezes (snapshots) and the per-study version lock
// ============================================================================
async function createVersioningTables(executor: DbExecutor): Promise<void> {
  await executor.query(`
    CREATE TABLE IF NOT EXISTS soa_freeze (
      id SERIAL PRIMARY KEY,
      study_id INTEGER NOT NULL,
      version_label TEXT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL,
      snapshot_json TEXT NOT NULL,
      UNIQUE (study_id, version_label)
    )
  `);

  await executor.query(`
    CREATE TABLE IF NOT EXISTS study_version_lock (
      study_id INTEGER PRIMARY KEY,
      locked_at TIMESTAMPTZ NOT NULL
    )
  `);
}

// ============================================================================
// Audit ledger
// ============================================================================
async function createAuditTables(executor: DbExecutor): Promise<void> {
  await executor.query(`
    CREATE TABLE IF NOT EXISTS entity_audit (
      id SERIAL PRIMARY KEY,
      study_id INTEGER NOT NULL,
      entity_type TEXT NOT NULL,
      entity_id INTEGER,
      action TEXT NOT NULL,
      before_json TEXT,
      after_json TEXT,
      performed_at TIMESTAMPTZ NOT NULL
    )
  `);

  await executor.query(`
    CREATE TABLE IF NOT EXISTS rollback_audit (
      id SERIAL PRIMARY KEY,
      study_id INTEGER NOT NULL,
      freeze_id INTEGER NOT NULL,
      performed_at TIMESTAMPTZ NOT NULL,
      visits_restored INTEGER NOT NULL,
      activities_restored INTEGER NOT NULL,
      cells_restored INTEGER NOT NULL,
      concepts_restored INTEGER NOT NULL,
      elements_restored INTEGER NOT NULL
    )
  `);

  await executor.query(`
    CREATE TABLE IF NOT EXISTS reorder_audit (
      id SERIAL PRIMARY KEY,
      study_id INTEGER NOT NULL,
      entity_type TEXT NOT NULL,
      old_order_json TEXT NOT NULL,
      new_order_json TEXT NOT NULL,
      performed_at TIMESTAMPTZ NOT NULL
    )
  `);

  await executor.query(`CREATE INDEX IF NOT EXISTS idx_entity_audit_study ON entity_audit(study_id)`);
}
