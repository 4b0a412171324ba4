/**
 * Element Service
 *
 * Structural elements carry a start rule (testrl) and an end rule (teenrl).
 */

import { pool } from '../../config/database';
import { logger } from '../../config/logger';
import { NotFoundError } from '../../middleware/errorHandler.middleware';
import { Element, ReorderResult } from '../../types';
import { toISOTimestamp } from '../../utils/date.util';
import { nextSequentialUid } from '../../utils/uid.util';
import { recordEntityAudit } from './audit.service';
import { nextOrderIndex, reindex, reorder } from './ordering.service';
import { requireStudy } from './study.service';

export interface ElementInput {
  name: string;
  label?: string | null;
  description?: string | null;
  testrl?: string | null;
  teenrl?: string | null;
}

export interface ElementRow extends Omit<Element, 'created_at'> {
  created_at: Date | string;
}

export const ELEMENT_UID_PREFIX = 'StudyElement';

export const ELEMENT_COLUMNS = 'id, study_id, element_uid, name, label, description, testrl, teenrl, order_index, created_at';
const ELEMENT_FIELDS = ['name', 'label', 'description', 'testrl', 'teenrl'] as const;

const optional = (value: string | null | undefined): string | null => {
  const trimmed = (value ?? '').trim();
  return trimmed === '' ? null : trimmed;
};

export const toElement = (row: ElementRow): Element => ({ ...row, created_at: toISOTimestamp(row.created_at) });

export const listElements = async (studyId: number): Promise<Element[]> => {
  await requireStudy(studyId);
  const result = await pool.query<ElementRow>(
    `SELECT ${ELEMENT_COLUMNS} FROM element WHERE study_id = $1 ORDER BY order_index, id`,
    [studyId]
  );
  return result.rows.map(toElement);
};

export const getElement = async (studyId: number, elementId: number): Promise<Element> => {
  const result = await pool.query<ElementRow>(
    `SELECT ${ELEMENT_COLUMNS} FROM element WHERE id = $1 AND study_id = $2`,
    [elementId, studyId]
  );
  if (result.rows.length === 0) {
    throw new NotFoundError('Element not found');
  }
  return toElement(result.rows[0]);
};

export const createElement = async (studyId: number, input: ElementInput): Promise<Element> => {
  await requireStudy(studyId);

  const element = await pool.transaction(async (tx) => {
    const orderIndex = await nextOrderIndex('element', studyId, tx);
    const uids = await tx.query<{ element_uid: string | null }>(
      'SELECT element_uid FROM element WHERE study_id = $1',
      [studyId]
    );
    const elementUid = nextSequentialUid(ELEMENT_UID_PREFIX, uids.rows.map(row => row.element_uid));

    const result = await tx.query<ElementRow>(
      `INSERT INTO element (study_id, element_uid, name, label, description, testrl, teenrl, order_index, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING ${ELEMENT_COLUMNS}`,
      [
        studyId,
        elementUid,
        input.name.trim(),
        optional(input.label),
        optional(input.description),
        optional(input.testrl),
        optional(input.teenrl),
        orderIndex,
        toISOTimestamp()
      ]
    );
    return toElement(result.rows[0]);
  });

  await recordEntityAudit(studyId, 'element', 'create', element.id, undefined, element);
  logger.info('Element created', { studyId, elementId: element.id, elementUid: element.element_uid });
  return element;
};

export const updateElement = async (
  studyId: number,
  elementId: number,
  updates: Partial<ElementInput>
): Promise<Element & { updated_fields: string[] }> => {
  await requireStudy(studyId);
  const before = await getElement(studyId, elementId);

  const result = await pool.query<ElementRow>(
    `UPDATE element SET name = $2, label = $3, description = $4, testrl = $5, teenrl = $6
     WHERE id = $1
     RETURNING ${ELEMENT_COLUMNS}`,
    [
      elementId,
      updates.name !== undefined ? updates.name.trim() : before.name,
      updates.label !== undefined ? optional(updates.label) : before.label,
      updates.description !== undefined ? optional(updates.description) : before.description,
      updates.testrl !== undefined ? optional(updates.testrl) : before.testrl,
      updates.teenrl !== undefined ? optional(updates.teenrl) : before.teenrl
    ]
  );
  const after = toElement(result.rows[0]);
  const updatedFields: string[] = ELEMENT_FIELDS.filter(field => before[field] !== after[field]);

  await recordEntityAudit(studyId, 'element', 'update', elementId, before, { ...after, updated_fields: updatedFields });
  logger.info('Element updated', { studyId, elementId, updatedFields });
  return { ...after, updated_fields: updatedFields };
};

export const deleteElement = async (studyId: number, elementId: number): Promise<void> => {
  await requireStudy(studyId);
  const before = await getElement(studyId, elementId);

  await pool.transaction(async (tx) => {
    await tx.query('DELETE FROM element WHERE id = $1', [elementId]);
    await reindex('element', studyId, tx);
  });

  await recordEntityAudit(studyId, 'element', 'delete', elementId, before);
  logger.info('Element deleted', { studyId, elementId });
};

export const reorderElements = async (studyId: number, order: number[]): Promise<ReorderResult> => {
  await requireStudy(studyId);
  return reorder('element', studyId, order);
};
