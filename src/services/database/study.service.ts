/**
 * Study Service
 *
 * A study owns one schedule of activities: its visits, activities, matrix
 * cells, arms, epochs, elements and freezes.
 */

import { pool, DbExecutor } from '../../config/database';
import { logger } from '../../config/logger';
import { NotFoundError } from '../../middleware/errorHandler.middleware';
import { toISOTimestamp } from '../../utils/date.util';
import { Study } from '../../types';
import { recordEntityAudit } from './audit.service';

interface StudyRow {
  id: number;
  name: string;
  study_code: string | null;
  label: string | null;
  description: string | null;
  created_at: Date | string;
}

export interface StudyDetail extends Study {
  counts: {
    visits: number;
    activities: number;
    cells: number;
    arms: number;
    epochs: number;
    elements: number;
    freezes: number;
  };
}

export interface StudyInput {
  name: string;
  study_code?: string | null;
  label?: string | null;
  description?: string | null;
}

const STUDY_COLUMNS = 'id, name, study_code, label, description, created_at';

const toStudy = (row: StudyRow): Study => ({
  id: row.id,
  name: row.name,
  study_code: row.study_code,
  label: row.label,
  description: row.description,
  created_at: toISOTimestamp(row.created_at)
});

const blankToNull = (value: string | null | undefined): string | null => {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
};

/**
 * Load a study or fail with NotFound.
 */
export const requireStudy = async (studyId: number, executor: DbExecutor = pool): Promise<Study> => {
  const result = await executor.query<StudyRow>(`SELECT ${STUDY_COLUMNS} FROM study WHERE id = $1`, [studyId]);
  if (result.rows.length === 0) {
    throw new NotFoundError('Study not found');
  }
  return toStudy(result.rows[0]);
};

export const createStudy = async (input: StudyInput): Promise<Study> => {
  logger.info('Creating study', { name: input.name });

  const createdAt = toISOTimestamp();
  const study = await pool.transaction(async (tx) => {
    const result = await tx.query<StudyRow>(
      `INSERT INTO study (name, study_code, label, description, epoch_seq_counter, created_at)
       VALUES ($1, $2, $3, $4, 0, $5)
       RETURNING ${STUDY_COLUMNS}`,
      [input.name.trim(), blankToNull(input.study_code), blankToNull(input.label), blankToNull(input.description), createdAt]
    );
    const created = toStudy(result.rows[0]);
    await tx.query(
      'INSERT INTO study_version_lock (study_id, locked_at) VALUES ($1, $2)',
      [created.id, createdAt]
    );
    return created;
  });

  await recordEntityAudit(study.id, 'study', 'create', study.id, undefined, study);
  logger.info('Study created', { studyId: study.id });
  return study;
};

export const listStudies = async (): Promise<Study[]> => {
  const result = await pool.query<StudyRow>(`SELECT ${STUDY_COLUMNS} FROM study ORDER BY id`);
  return result.rows.map(toStudy);
};

const countRows = async (sql: string, studyId: number): Promise<number> => {
  const result = await pool.query<{ count: number | string }>(sql, [studyId]);
  return parseInt(String(result.rows[0]?.count ?? 0));
};

export const getStudy = async (studyId: number): Promise<StudyDetail> => {
  const study = await requireStudy(studyId);

  const [visits, activities, cells, arms, epochs, elements, freezes] = await Promise.all([
    countRows('SELECT COUNT(*) AS count FROM visit WHERE study_id = $1', studyId),
    countRows('SELECT COUNT(*) AS count FROM activity WHERE study_id = $1', studyId),
    countRows('SELECT COUNT(*) AS count FROM cell WHERE study_id = $1', studyId),
    countRows('SELECT COUNT(*) AS count FROM arm WHERE study_id = $1', studyId),
    countRows('SELECT COUNT(*) AS count FROM epoch WHERE study_id = $1', studyId),
    countRows('SELECT COUNT(*) AS count FROM element WHERE study_id = $1', studyId),
    countRows('SELECT COUNT(*) AS count FROM soa_freeze WHERE study_id = $1', studyId)
  ]);

  return { ...study, counts: { visits, activities, cells, arms, epochs, elements, freezes } };
};

export const updateStudy = async (studyId: number, updates: Partial<StudyInput>): Promise<Study> => {
  const before = await requireStudy(studyId);

  const result = await pool.query<StudyRow>(
    `UPDATE study SET name = $2, study_code = $3, label = $4, description = $5
     WHERE id = $1
     RETURNING ${STUDY_COLUMNS}`,
    [
      studyId,
      updates.name !== undefined ? updates.name.trim() : before.name,
      updates.study_code !== undefined ? blankToNull(updates.study_code) : before.study_code,
      updates.label !== undefined ? blankToNull(updates.label) : before.label,
      updates.description !== undefined ? blankToNull(updates.description) : before.description
    ]
  );
  const after = toStudy(result.rows[0]);

  await recordEntityAudit(studyId, 'study', 'update', studyId, before, after);
  logger.info('Study updated', { studyId });
  return after;
};
