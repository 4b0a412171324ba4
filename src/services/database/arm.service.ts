/**
 * Arm Service
 */

import { pool } from '../../config/database';
import { logger } from '../../config/logger';
import { NotFoundError } from '../../middleware/errorHandler.middleware';
import { Arm, ReorderResult } from '../../types';
import { nextSequentialUid } from '../../utils/uid.util';
import { recordEntityAudit } from './audit.service';
import { nextOrderIndex, reindex, reorder } from './ordering.service';
import { requireStudy } from './study.service';

export interface ArmInput {
  name: string;
  label?: string | null;
  description?: string | null;
  type?: string | null;
  data_origin_type?: string | null;
}

export const ARM_UID_PREFIX = 'StudyArm';

const ARM_COLUMNS = 'id, study_id, name, label, description, type, data_origin_type, order_index, arm_uid';
const ARM_FIELDS = ['name', 'label', 'description', 'type', 'data_origin_type'] as const;

const optional = (value: string | null | undefined): string | null => {
  const trimmed = (value ?? '').trim();
  return trimmed === '' ? null : trimmed;
};

export const listArms = async (studyId: number): Promise<Arm[]> => {
  await requireStudy(studyId);
  const result = await pool.query<Arm>(
    `SELECT ${ARM_COLUMNS} FROM arm WHERE study_id = $1 ORDER BY order_index, id`,
    [studyId]
  );
  return result.rows;
};

export const getArm = async (studyId: number, armId: number): Promise<Arm> => {
  const result = await pool.query<Arm>(
    `SELECT ${ARM_COLUMNS} FROM arm WHERE id = $1 AND study_id = $2`,
    [armId, studyId]
  );
  if (result.rows.length === 0) {
    throw new NotFoundError('Arm not found');
  }
  return result.rows[0];
};

/**
 * Create an arm. Its arm_uid takes the smallest free StudyArm_<n> and never
 * changes afterwards.
 */
export const createArm = async (studyId: number, input: ArmInput): Promise<Arm> => {
  await requireStudy(studyId);

  const arm = await pool.transaction(async (tx) => {
    const orderIndex = await nextOrderIndex('arm', studyId, tx);
    const uids = await tx.query<{ arm_uid: string | null }>('SELECT arm_uid FROM arm WHERE study_id = $1', [studyId]);
    const armUid = nextSequentialUid(ARM_UID_PREFIX, uids.rows.map(row => row.arm_uid));

    const result = await tx.query<Arm>(
      `INSERT INTO arm (study_id, name, label, description, type, data_origin_type, order_index, arm_uid)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${ARM_COLUMNS}`,
      [
        studyId,
        input.name.trim(),
        optional(input.label),
        optional(input.description),
        optional(input.type),
        optional(input.data_origin_type),
        orderIndex,
        armUid
      ]
    );
    return result.rows[0];
  });

  await recordEntityAudit(studyId, 'arm', 'create', arm.id, undefined, arm);
  logger.info('Arm created', { studyId, armId: arm.id, armUid: arm.arm_uid });
  return arm;
};

export const updateArm = async (
  studyId: number,
  armId: number,
  updates: Partial<ArmInput>
): Promise<Arm & { updated_fields: string[] }> => {
  await requireStudy(studyId);
  const before = await getArm(studyId, armId);

  const result = await pool.query<Arm>(
    `UPDATE arm SET name = $2, label = $3, description = $4, type = $5, data_origin_type = $6
     WHERE id = $1
     RETURNING ${ARM_COLUMNS}`,
    [
      armId,
      updates.name !== undefined ? updates.name.trim() : before.name,
      updates.label !== undefined ? optional(updates.label) : before.label,
      updates.description !== undefined ? optional(updates.description) : before.description,
      updates.type !== undefined ? optional(updates.type) : before.type,
      updates.data_origin_type !== undefined ? optional(updates.data_origin_type) : before.data_origin_type
    ]
  );
  const after = result.rows[0];
  const updatedFields: string[] = ARM_FIELDS.filter(field => before[field] !== after[field]);

  await recordEntityAudit(studyId, 'arm', 'update', armId, before, { ...after, updated_fields: updatedFields });
  logger.info('Arm updated', { studyId, armId, updatedFields });
  return { ...after, updated_fields: updatedFields };
};

export const deleteArm = async (studyId: number, armId: number): Promise<void> => {
  await requireStudy(studyId);
  const before = await getArm(studyId, armId);

  await pool.transaction(async (tx) => {
    await tx.query('DELETE FROM arm WHERE id = $1', [armId]);
    await reindex('arm', studyId, tx);
  });

  await recordEntityAudit(studyId, 'arm', 'delete', armId, before);
  logger.info('Arm deleted', { studyId, armId });
};

export const reorderArms = async (studyId: number, order: number[]): Promise<ReorderResult> => {
  await requireStudy(studyId);
  return reorder('arm', studyId, order);
};
