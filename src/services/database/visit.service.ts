/**
 * Visit Service
 *
 * Visits are the columns of the schedule matrix.
 */

import { pool, DbExecutor } from '../../config/database';
import { logger } from '../../config/logger';
import { BadRequestError, NotFoundError } from '../../middleware/errorHandler.middleware';
import { ReorderResult, Visit } from '../../types';
import { recordEntityAudit } from './audit.service';
import { nextOrderIndex, reindex, reorder } from './ordering.service';
import { requireStudy } from './study.service';

export interface VisitInput {
  name: string;
  raw_header?: string | null;
  epoch_id?: number | null;
}

export interface VisitUpdateResult extends Visit {
  updated_fields: string[];
}

const VISIT_COLUMNS = 'id, study_id, name, raw_header, order_index, epoch_id';

const assertEpochInStudy = async (studyId: number, epochId: number, executor: DbExecutor = pool): Promise<void> => {
  const result = await executor.query('SELECT id FROM epoch WHERE id = $1 AND study_id = $2', [epochId, studyId]);
  if (result.rows.length === 0) {
    throw new BadRequestError('Invalid epoch_id for this study', { epoch_id: epochId });
  }
};

export const listVisits = async (studyId: number): Promise<Visit[]> => {
  await requireStudy(studyId);
  const result = await pool.query<Visit>(
    `SELECT ${VISIT_COLUMNS} FROM visit WHERE study_id = $1 ORDER BY order_index, id`,
    [studyId]
  );
  return result.rows;
};

export const getVisit = async (studyId: number, visitId: number, executor: DbExecutor = pool): Promise<Visit> => {
  const result = await executor.query<Visit>(
    `SELECT ${VISIT_COLUMNS} FROM visit WHERE id = $1 AND study_id = $2`,
    [visitId, studyId]
  );
  if (result.rows.length === 0) {
    throw new NotFoundError('Visit not found');
  }
  return result.rows[0];
};

export const createVisit = async (studyId: number, input: VisitInput): Promise<Visit> => {
  await requireStudy(studyId);
  if (input.epoch_id !== undefined && input.epoch_id !== null) {
    await assertEpochInStudy(studyId, input.epoch_id);
  }

  const name = input.name.trim();
  const rawHeader = input.raw_header && input.raw_header.trim() ? input.raw_header.trim() : name;
  const orderIndex = await nextOrderIndex('visit', studyId);

  const result = await pool.query<Visit>(
    `INSERT INTO visit (study_id, name, raw_header, order_index, epoch_id)
     VALUES ($1, $2, $3, $4, $5)
     RETURNING ${VISIT_COLUMNS}`,
    [studyId, name, rawHeader, orderIndex, input.epoch_id ?? null]
  );
  const visit = result.rows[0];

  await recordEntityAudit(studyId, 'visit', 'create', visit.id, undefined, visit);
  logger.info('Visit created', { studyId, visitId: visit.id, orderIndex });
  return visit;
};

/**
 * Update name, header or epoch. An absent field is left unchanged; a null
 * epoch_id clears the epoch.
 */
export const updateVisit = async (
  studyId: number,
  visitId: number,
  updates: Partial<VisitInput>
): Promise<VisitUpdateResult> => {
  await requireStudy(studyId);
  const before = await getVisit(studyId, visitId);

  if (updates.epoch_id !== undefined && updates.epoch_id !== null) {
    await assertEpochInStudy(studyId, updates.epoch_id);
  }

  const name = updates.name !== undefined ? updates.name.trim() : before.name;
  const rawHeaderSource = updates.raw_header !== undefined ? updates.raw_header : before.raw_header;
  const rawHeader = rawHeaderSource && rawHeaderSource.trim() ? rawHeaderSource.trim() : name;
  const epochId = updates.epoch_id !== undefined ? updates.epoch_id : before.epoch_id;

  const result = await pool.query<Visit>(
    `UPDATE visit SET name = $2, raw_header = $3, epoch_id = $4
     WHERE id = $1
     RETURNING ${VISIT_COLUMNS}`,
    [visitId, name, rawHeader, epochId]
  );
  const after = result.rows[0];

  const updatedFields = (['name', 'raw_header', 'epoch_id'] as const).filter(field => before[field] !== after[field]);

  await recordEntityAudit(studyId, 'visit', 'update', visitId, before, { ...after, updated_fields: updatedFields });
  logger.info('Visit updated', { studyId, visitId, updatedFields });
  return { ...after, updated_fields: [...updatedFields] };
};

/**
 * Delete a visit together with its matrix cells, then close the order gap.
 */
export const deleteVisit = async (studyId: number, visitId: number): Promise<void> => {
  await requireStudy(studyId);
  const before = await getVisit(studyId, visitId);

  await pool.transaction(async (tx) => {
    await tx.query('DELETE FROM cell WHERE visit_id = $1 AND study_id = $2', [visitId, studyId]);
    await tx.query('DELETE FROM visit WHERE id = $1', [visitId]);
    await reindex('visit', studyId, tx);
  });

  await recordEntityAudit(studyId, 'visit', 'delete', visitId, before);
  logger.info('Visit deleted', { studyId, visitId });
};

export const reorderVisits = async (studyId: number, order: number[]): Promise<ReorderResult> => {
  await requireStudy(studyId);
  return reorder('visit', studyId, order);
};
