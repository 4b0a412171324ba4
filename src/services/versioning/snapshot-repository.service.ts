/**
 * Snapshot Repository
 *
 * Freeze rows are immutable: inserted once, never updated or deleted.
 */

import { pool, DbExecutor } from '../../config/database';
import { logger } from '../../config/logger';
import { NotFoundError } from '../../middleware/errorHandler.middleware';
import { toISOTimestamp } from '../../utils/date.util';
import {
  CORRUPT_SNAPSHOT_MARKER,
  CorruptSnapshot,
  FreezeRecord,
  FreezeSummary,
  LoadedSnapshot,
  SnapshotPayload
} from '../../types';
import { requireStudy } from '../database/study.service';
import { normalizeSnapshotPayload } from './snapshot-schema';

interface FreezeRow {
  id: number;
  study_id: number;
  version_label: string;
  created_at: Date | string;
  snapshot_json: string;
}

export const corruptSnapshot = (): CorruptSnapshot => ({ error: CORRUPT_SNAPSHOT_MARKER });

export const isCorruptSnapshot = (snapshot: LoadedSnapshot): snapshot is CorruptSnapshot =>
  'error' in snapshot;

const loadSnapshot = (row: FreezeRow): LoadedSnapshot => {
  const payload = normalizeSnapshotPayload(row.snapshot_json);
  if (!payload) {
    logger.warn('Corrupt snapshot payload', { freezeId: row.id, studyId: row.study_id });
    return corruptSnapshot();
  }
  return payload;
};

export const insertFreeze = async (
  executor: DbExecutor,
  studyId: number,
  versionLabel: string,
  createdAt: string,
  payload: SnapshotPayload
): Promise<number> => {
  const result = await executor.query<{ id: number }>(
    `INSERT INTO soa_freeze (study_id, version_label, created_at, snapshot_json)
     VALUES ($1, $2, $3, $4)
     RETURNING id`,
    [studyId, versionLabel, createdAt, JSON.stringify(payload)]
  );
  return result.rows[0].id;
};

export const listFreezeLabels = async (studyId: number, executor: DbExecutor = pool): Promise<string[]> => {
  const result = await executor.query<{ version_label: string }>(
    'SELECT version_label FROM soa_freeze WHERE study_id = $1',
    [studyId]
  );
  return result.rows.map(row => row.version_label);
};

/**
 * Freezes of a study, newest first.
 */
export const listFreezes = async (studyId: number): Promise<FreezeSummary[]> => {
  await requireStudy(studyId);
  const result = await pool.query<Omit<FreezeRow, 'snapshot_json'>>(
    `SELECT id, study_id, version_label, created_at
     FROM soa_freeze
     WHERE study_id = $1
     ORDER BY id DESC`,
    [studyId]
  );
  return result.rows.map(row => ({
    id: row.id,
    version_label: row.version_label,
    created_at: toISOTimestamp(row.created_at)
  }));
};

const toFreezeRecord = (row: FreezeRow): FreezeRecord => ({
  id: row.id,
  version_label: row.version_label,
  created_at: toISOTimestamp(row.created_at),
  snapshot: loadSnapshot(row)
});

/**
 * A freeze by id alone, with the study that owns it.
 */
export const findFreeze = async (
  freezeId: number,
  executor: DbExecutor = pool
): Promise<{ studyId: number; freeze: FreezeRecord }> => {
  const result = await executor.query<FreezeRow>(
    `SELECT id, study_id, version_label, created_at, snapshot_json
     FROM soa_freeze
     WHERE id = $1`,
    [freezeId]
  );
  if (result.rows.length === 0) {
    throw new NotFoundError('Freeze not found');
  }

  const row = result.rows[0];
  return { studyId: row.study_id, freeze: toFreezeRecord(row) };
};

/**
 * One freeze of a study with its normalized payload (or the corrupt marker).
 * A freeze belonging to another study is reported as not found.
 */
export const getFreeze = async (
  studyId: number,
  freezeId: number,
  executor: DbExecutor = pool
): Promise<FreezeRecord> => {
  const result = await executor.query<FreezeRow>(
    `SELECT id, study_id, version_label, created_at, snapshot_json
     FROM soa_freeze
     WHERE id = $1 AND study_id = $2`,
    [freezeId, studyId]
  );
  if (result.rows.length === 0) {
    throw new NotFoundError('Freeze not found');
  }

  return toFreezeRecord(result.rows[0]);
};

/**
 * Only the payload of a freeze, or the corrupt marker.
 */
export const getSnapshotPayload = async (studyId: number, freezeId: number): Promise<LoadedSnapshot> => {
  const freeze = await getFreeze(studyId, freezeId);
  return freeze.snapshot;
};
