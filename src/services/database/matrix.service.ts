/**
 * Matrix Service
 *
 * Sparse visit x activity cells. Only non-blank statuses are stored;
 * writing a blank status removes the cell.
 */

import { pool, DbExecutor } from '../../config/database';
import { logger } from '../../config/logger';
import { BadRequestError } from '../../middleware/errorHandler.middleware';
import { Cell, Matrix } from '../../types';
import { placeholders } from '../../utils/sql.util';
import { activityUid, getActivity, listActivities } from './activity.service';
import { recordEntityAudit } from './audit.service';
import { nextOrderIndex } from './ordering.service';
import { requireStudy } from './study.service';
import { getVisit, listVisits } from './visit.service';

export const TOGGLE_STATUS = 'X';

export interface CellWriteResult {
  cell_id: number | null;
  status: string;
  deleted: boolean;
}

export interface MatrixImportInput {
  visits: Array<{ name: string; raw_header?: string | null }>;
  activities: Array<{ name: string; statuses: Array<string | null> }>;
  reset: boolean;
}

export interface MatrixImportResult {
  visits_added: number;
  activities_added: number;
  cells_added: number;
}

const CELL_COLUMNS = 'id, study_id, visit_id, activity_id, status';

export const getMatrix = async (studyId: number): Promise<Matrix> => {
  const visits = await listVisits(studyId);
  const activities = await listActivities(studyId);
  const cells = await pool.query<Cell>(
    `SELECT ${CELL_COLUMNS} FROM cell WHERE study_id = $1 ORDER BY id`,
    [studyId]
  );
  return { visits, activities, cells: cells.rows };
};

const findCell = async (
  studyId: number,
  visitId: number,
  activityId: number,
  executor: DbExecutor = pool
): Promise<Cell | null> => {
  const result = await executor.query<Cell>(
    `SELECT ${CELL_COLUMNS} FROM cell WHERE study_id = $1 AND visit_id = $2 AND activity_id = $3`,
    [studyId, visitId, activityId]
  );
  return result.rows[0] ?? null;
};

/**
 * Upsert one cell. A blank status clears the cell instead.
 */
export const setCell = async (
  studyId: number,
  visitId: number,
  activityId: number,
  status: string
): Promise<CellWriteResult> => {
  await requireStudy(studyId);
  await getVisit(studyId, visitId);
  await getActivity(studyId, activityId);

  const existing = await findCell(studyId, visitId, activityId);
  const value = status.trim();

  if (value === '') {
    if (!existing) {
      return { cell_id: null, status: '', deleted: false };
    }
    await pool.query('DELETE FROM cell WHERE id = $1', [existing.id]);
    await recordEntityAudit(studyId, 'cell', 'delete', existing.id, existing);
    logger.info('Cell cleared', { studyId, visitId, activityId });
    return { cell_id: existing.id, status: '', deleted: true };
  }

  if (existing) {
    const result = await pool.query<Cell>(
      `UPDATE cell SET status = $2 WHERE id = $1 RETURNING ${CELL_COLUMNS}`,
      [existing.id, value]
    );
    await recordEntityAudit(studyId, 'cell', 'update', existing.id, existing, result.rows[0]);
    return { cell_id: existing.id, status: value, deleted: false };
  }

  const result = await pool.query<Cell>(
    `INSERT INTO cell (study_id, visit_id, activity_id, status)
     VALUES ($1, $2, $3, $4)
     RETURNING ${CELL_COLUMNS}`,
    [studyId, visitId, activityId, value]
  );
  const cell = result.rows[0];
  await recordEntityAudit(studyId, 'cell', 'create', cell.id, undefined, cell);
  return { cell_id: cell.id, status: value, deleted: false };
};

/**
 * Flip a cell between blank and the default status.
 */
export const toggleCell = async (
  studyId: number,
  visitId: number,
  activityId: number
): Promise<CellWriteResult> => {
  await requireStudy(studyId);
  await getVisit(studyId, visitId);
  await getActivity(studyId, activityId);

  const existing = await findCell(studyId, visitId, activityId);
  return setCell(studyId, visitId, activityId, existing ? '' : TOGGLE_STATUS);
};

/**
 * Append (or, with `reset`, replace) visits and activities and fill their
 * cells from per-activity status rows aligned with the visit list.
 */
export const importMatrix = async (studyId: number, input: MatrixImportInput): Promise<MatrixImportResult> => {
  await requireStudy(studyId);

  if (input.visits.length === 0) {
    throw new BadRequestError('visits list empty');
  }
  if (input.activities.length === 0) {
    throw new BadRequestError('activities list empty');
  }
  const visitCount = input.visits.length;
  for (const activity of input.activities) {
    if (activity.statuses.length !== visitCount) {
      throw new BadRequestError(
        `Activity '${activity.name}' statuses length ${activity.statuses.length} != visits length ${visitCount}`
      );
    }
  }

  const result = await pool.transaction(async (tx) => {
    if (input.reset) {
      await tx.query('DELETE FROM cell WHERE study_id = $1', [studyId]);
      const activityIds = (await tx.query<{ id: number }>('SELECT id FROM activity WHERE study_id = $1', [studyId]))
        .rows.map(row => row.id);
      if (activityIds.length > 0) {
        await tx.query(
          `DELETE FROM activity_concept WHERE activity_id IN (${placeholders(activityIds.length)})`,
          activityIds
        );
      }
      await tx.query('DELETE FROM visit WHERE study_id = $1', [studyId]);
      await tx.query('DELETE FROM activity WHERE study_id = $1', [studyId]);
    }

    let visitIndex = (await nextOrderIndex('visit', studyId, tx)) - 1;
    const visitIds: number[] = [];
    for (const visit of input.visits) {
      visitIndex += 1;
      const name = visit.name.trim();
      const rawHeader = visit.raw_header && visit.raw_header.trim() ? visit.raw_header.trim() : name;
      const inserted = await tx.query<{ id: number }>(
        `INSERT INTO visit (study_id, name, raw_header, order_index, epoch_id)
         VALUES ($1, $2, $3, $4, NULL)
         RETURNING id`,
        [studyId, name, rawHeader, visitIndex]
      );
      visitIds.push(inserted.rows[0].id);
    }

    let activityIndex = (await nextOrderIndex('activity', studyId, tx)) - 1;
    let cellsAdded = 0;
    for (const activity of input.activities) {
      activityIndex += 1;
      const inserted = await tx.query<{ id: number }>(
        `INSERT INTO activity (study_id, name, order_index, activity_uid)
         VALUES ($1, $2, $3, $4)
         RETURNING id`,
        [studyId, activity.name.trim(), activityIndex, activityUid(activityIndex)]
      );
      const activityId = inserted.rows[0].id;

      for (let index = 0; index < activity.statuses.length; index++) {
        const status = (activity.statuses[index] ?? '').trim();
        if (status === '') continue;
        await tx.query(
          'INSERT INTO cell (study_id, visit_id, activity_id, status) VALUES ($1, $2, $3, $4)',
          [studyId, visitIds[index], activityId, status]
        );
        cellsAdded += 1;
      }
    }

    return { visits_added: visitIds.length, activities_added: input.activities.length, cells_added: cellsAdded };
  });

  await recordEntityAudit(studyId, 'cell', 'create', null, undefined, { import: result, reset: input.reset });
  logger.info('Matrix imported', { studyId, ...result, reset: input.reset });
  return result;
};
