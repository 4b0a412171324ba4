/**
 * Epoch Service
 *
 * epoch_seq comes from the study's epoch_seq_counter, so a number freed by
 * a delete is never handed out again.
 */

import { pool } from '../../config/database';
import { logger } from '../../config/logger';
import { NotFoundError } from '../../middleware/errorHandler.middleware';
import { Epoch, ReorderResult } from '../../types';
import { recordEntityAudit } from './audit.service';
import { nextOrderIndex, reindex, reorder } from './ordering.service';
import { requireStudy } from './study.service';

export interface EpochInput {
  name: string;
  epoch_label?: string | null;
  epoch_description?: string | null;
}

const EPOCH_COLUMNS = 'id, study_id, name, order_index, epoch_seq, epoch_label, epoch_description';
const EPOCH_FIELDS = ['name', 'epoch_label', 'epoch_description'] as const;

const optional = (value: string | null | undefined): string | null => {
  const trimmed = (value ?? '').trim();
  return trimmed === '' ? null : trimmed;
};

export const listEpochs = async (studyId: number): Promise<Epoch[]> => {
  await requireStudy(studyId);
  const result = await pool.query<Epoch>(
    `SELECT ${EPOCH_COLUMNS} FROM epoch WHERE study_id = $1 ORDER BY order_index, id`,
    [studyId]
  );
  return result.rows;
};

export const getEpoch = async (studyId: number, epochId: number): Promise<Epoch> => {
  const result = await pool.query<Epoch>(
    `SELECT ${EPOCH_COLUMNS} FROM epoch WHERE id = $1 AND study_id = $2`,
    [epochId, studyId]
  );
  if (result.rows.length === 0) {
    throw new NotFoundError('Epoch not found');
  }
  return result.rows[0];
};

export const createEpoch = async (studyId: number, input: EpochInput): Promise<Epoch> => {
  await requireStudy(studyId);

  const epoch = await pool.transaction(async (tx) => {
    const counter = await tx.query<{ epoch_seq_counter: number }>(
      'UPDATE study SET epoch_seq_counter = epoch_seq_counter + 1 WHERE id = $1 RETURNING epoch_seq_counter',
      [studyId]
    );
    const epochSeq = counter.rows[0].epoch_seq_counter;
    const orderIndex = await nextOrderIndex('epoch', studyId, tx);

    const result = await tx.query<Epoch>(
      `INSERT INTO epoch (study_id, name, order_index, epoch_seq, epoch_label, epoch_description)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${EPOCH_COLUMNS}`,
      [studyId, input.name.trim(), orderIndex, epochSeq, optional(input.epoch_label), optional(input.epoch_description)]
    );
    return result.rows[0];
  });

  await recordEntityAudit(studyId, 'epoch', 'create', epoch.id, undefined, epoch);
  logger.info('Epoch created', { studyId, epochId: epoch.id, epochSeq: epoch.epoch_seq });
  return epoch;
};

export const updateEpoch = async (
  studyId: number,
  epochId: number,
  updates: Partial<EpochInput>
): Promise<Epoch & { updated_fields: string[] }> => {
  await requireStudy(studyId);
  const before = await getEpoch(studyId, epochId);

  const result = await pool.query<Epoch>(
    `UPDATE epoch SET name = $2, epoch_label = $3, epoch_description = $4
     WHERE id = $1
     RETURNING ${EPOCH_COLUMNS}`,
    [
      epochId,
      updates.name !== undefined ? updates.name.trim() : before.name,
      updates.epoch_label !== undefined ? optional(updates.epoch_label) : before.epoch_label,
      updates.epoch_description !== undefined ? optional(updates.epoch_description) : before.epoch_description
    ]
  );
  const after = result.rows[0];
  const updatedFields: string[] = EPOCH_FIELDS.filter(field => before[field] !== after[field]);

  await recordEntityAudit(studyId, 'epoch', 'update', epochId, before, { ...after, updated_fields: updatedFields });
  logger.info('Epoch updated', { studyId, epochId, updatedFields });
  return { ...after, updated_fields: updatedFields };
};

/**
 * Delete an epoch. Visits that pointed at it lose their epoch reference.
 */
export const deleteEpoch = async (studyId: number, epochId: number): Promise<void> => {
  await requireStudy(studyId);
  const before = await getEpoch(studyId, epochId);

  await pool.transaction(async (tx) => {
    await tx.query('UPDATE visit SET epoch_id = NULL WHERE epoch_id = $1 AND study_id = $2', [epochId, studyId]);
    await tx.query('DELETE FROM epoch WHERE id = $1', [epochId]);
    await reindex('epoch', studyId, tx);
  });

  await recordEntityAudit(studyId, 'epoch', 'delete', epochId, before);
  logger.info('Epoch deleted', { studyId, epochId });
};

export const reorderEpochs = async (studyId: number, order: number[]): Promise<ReorderResult> => {
  await requireStudy(studyId);
  return reorder('epoch', studyId, order);
};
