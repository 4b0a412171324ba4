/**
 * Audit Ledger Service
 *
 * Append-only records of entity mutations, rollbacks and reorders.
 * Writers are best effort: a failed audit insert is logged and never fails
 * the operation that triggered it.
 */

import { pool } from '../../config/database';
import { logger } from '../../config/logger';
import { toISOTimestamp } from '../../utils/date.util';
import {
  AuditAction,
  AuditEntityType,
  EntityAuditEntry,
  OrderedEntityType,
  ReorderAuditEntry,
  RestoreCounts,
  RollbackAuditEntry
} from '../../types';

interface EntityAuditRow {
  id: number;
  study_id: number;
  entity_type: AuditEntityType;
  entity_id: number | null;
  action: AuditAction;
  before_json: string | null;
  after_json: string | null;
  performed_at: Date | string;
}

interface RollbackAuditRow {
  id: number;
  study_id: number;
  freeze_id: number;
  performed_at: Date | string;
  visits_restored: number;
  activities_restored: number;
  cells_restored: number;
  concepts_restored: number;
  elements_restored: number;
}

interface ReorderAuditRow {
  id: number;
  study_id: number;
  entity_type: OrderedEntityType;
  old_order_json: string;
  new_order_json: string;
  performed_at: Date | string;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const parseJsonColumn = (text: string | null): unknown => {
  if (text === null) return null;
  try {
    return JSON.parse(text);
  } catch (error) {
    logger.warn('Unparseable audit JSON column', { error: errorMessage(error) });
    return text;
  }
};

const parseOrder = (text: string): number[] => {
  const parsed = parseJsonColumn(text);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((value): value is number => typeof value === 'number');
};

const sameOrder = (a: number[], b: number[]): boolean =>
  a.length === b.length && a.every((value, index) => value === b[index]);

/**
 * ============================================================================
 * WRITERS
 * ============================================================================
 */

export const recordEntityAudit = async (
  studyId: number,
  entityType: AuditEntityType,
  action: AuditAction,
  entityId: number | null,
  before?: unknown,
  after?: unknown
): Promise<void> => {
  try {
    await pool.query(
      `INSERT INTO entity_audit (study_id, entity_type, entity_id, action, before_json, after_json, performed_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        studyId,
        entityType,
        entityId,
        action,
        before === undefined ? null : JSON.stringify(before),
        after === undefined ? null : JSON.stringify(after),
        toISOTimestamp()
      ]
    );
  } catch (error) {
    logger.warn('Failed to record entity audit', { studyId, entityType, action, entityId, error: errorMessage(error) });
  }
};

export const recordRollbackAudit = async (
  studyId: number,
  freezeId: number,
  counts: RestoreCounts
): Promise<void> => {
  try {
    await pool.query(
      `INSERT INTO rollback_audit (
         study_id, freeze_id, performed_at,
         visits_restored, activities_restored, cells_restored, concepts_restored, elements_restored
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        studyId,
        freezeId,
        toISOTimestamp(),
        counts.visits_restored,
        counts.activities_restored,
        counts.cells_restored,
        counts.concept_mappings_restored,
        counts.elements_restored
      ]
    );
    logger.info('Rollback audit recorded', { studyId, freezeId });
  } catch (error) {
    logger.warn('Failed to record rollback audit', { studyId, freezeId, error: errorMessage(error) });
  }
};

/**
 * Record a reorder. Identical old and new orders are not recorded.
 */
export const recordReorderAudit = async (
  studyId: number,
  entityType: OrderedEntityType,
  oldOrder: number[],
  newOrder: number[]
): Promise<void> => {
  if (sameOrder(oldOrder, newOrder)) {
    return;
  }

  try {
    await pool.query(
      `INSERT INTO reorder_audit (study_id, entity_type, old_order_json, new_order_json, performed_at)
       VALUES ($1, $2, $3, $4, $5)`,
      [studyId, entityType, JSON.stringify(oldOrder), JSON.stringify(newOrder), toISOTimestamp()]
    );
  } catch (error) {
    logger.warn('Failed to record reorder audit', { studyId, entityType, error: errorMessage(error) });
  }
};

/**
 * ============================================================================
 * READERS (newest first)
 * ============================================================================
 */

export const listEntityAudit = async (
  studyId: number,
  entityType?: AuditEntityType
): Promise<EntityAuditEntry[]> => {
  const params: unknown[] = [studyId];
  let whereClause = 'study_id = $1';

  if (entityType) {
    params.push(entityType);
    whereClause += ` AND entity_type = $${params.length}`;
  }

  const result = await pool.query<EntityAuditRow>(
    `SELECT id, study_id, entity_type, entity_id, action, before_json, after_json, performed_at
     FROM entity_audit
     WHERE ${whereClause}
     ORDER BY id DESC`,
    params
  );

  return result.rows.map(row => ({
    id: row.id,
    study_id: row.study_id,
    entity_type: row.entity_type,
    entity_id: row.entity_id,
    action: row.action,
    before: parseJsonColumn(row.before_json),
    after: parseJsonColumn(row.after_json),
    performed_at: toISOTimestamp(row.performed_at)
  }));
};

export const listRollbackAudit = async (studyId: number): Promise<RollbackAuditEntry[]> => {
  const result = await pool.query<RollbackAuditRow>(
    `SELECT id, study_id, freeze_id, performed_at,
            visits_restored, activities_restored, cells_restored, concepts_restored, elements_restored
     FROM rollback_audit
     WHERE study_id = $1
     ORDER BY id DESC`,
    [studyId]
  );

  return result.rows.map(row => ({ ...row, performed_at: toISOTimestamp(row.performed_at) }));
};

export const listReorderAudit = async (studyId: number): Promise<ReorderAuditEntry[]> => {
  const result = await pool.query<ReorderAuditRow>(
    `SELECT id, study_id, entity_type, old_order_json, new_order_json, performed_at
     FROM reorder_audit
     WHERE study_id = $1
     ORDER BY id DESC`,
    [studyId]
  );

  return result.rows.map(row => ({
    id: row.id,
    study_id: row.study_id,
    entity_type: row.entity_type,
    old_order: parseOrder(row.old_order_json),
    new_order: parseOrder(row.new_order_json),
    performed_at: toISOTimestamp(row.performed_at)
  }));
};

/**
 * ============================================================================
 * CSV EXPORTS
 * ============================================================================
 */

function csvEscape(str: string): string {
  if (!str) return '';
  if (str.includes(',') || str.includes('"') || str.includes('\n')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

const toCsv = (headers: string[], rows: Array<Array<string | number>>): string => {
  let csv = headers.join(',') + '\n';
  for (const row of rows) {
    csv += row.map(value => csvEscape(String(value))).join(',') + '\n';
  }
  return csv;
};

/**
 * Moves between two orders, as `id:oldPos->newPos` for every id whose
 * 1-based position changed.
 */
export const describeMoves = (oldOrder: number[], newOrder: number[]): string => {
  const oldPositions = new Map<number, number>();
  oldOrder.forEach((id, index) => oldPositions.set(id, index + 1));

  const moves: string[] = [];
  newOrder.forEach((id, index) => {
    const oldPosition = oldPositions.get(id);
    if (oldPosition !== undefined && oldPosition !== index + 1) {
      moves.push(`${id}:${oldPosition}->${index + 1}`);
    }
  });
  return moves.join('; ');
};

export const exportRollbackAuditCSV = async (studyId: number): Promise<string> => {
  const entries = await listRollbackAudit(studyId);
  return toCsv(
    ['id', 'freeze_id', 'performed_at', 'visits_restored', 'activities_restored', 'cells_restored', 'concepts_restored', 'elements_restored'],
    entries.map(entry => [
      entry.id,
      entry.freeze_id,
      entry.performed_at,
      entry.visits_restored,
      entry.activities_restored,
      entry.cells_restored,
      entry.concepts_restored,
      entry.elements_restored
    ])
  );
};

export const exportReorderAuditCSV = async (studyId: number): Promise<string> => {
  const entries = await listReorderAudit(studyId);
  return toCsv(
    ['id', 'entity_type', 'performed_at', 'old_order', 'new_order', 'moves'],
    entries.map(entry => [
      entry.id,
      entry.entity_type,
      entry.performed_at,
      entry.old_order.join(','),
      entry.new_order.join(','),
      describeMoves(entry.old_order, entry.new_order)
    ])
  );
};
