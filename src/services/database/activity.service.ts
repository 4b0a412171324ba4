/**
 * Activity Service
 *
 * Activities are the rows of the schedule matrix. Each activity can carry
 * biomedical concept codes whose titles are captured when assigned.
 */

import { pool, DbExecutor } from '../../config/database';
import { logger } from '../../config/logger';
import { NotFoundError } from '../../middleware/errorHandler.middleware';
import { Activity, ConceptMapping, ReorderResult } from '../../types';
import { fetchBiomedicalConcepts } from '../concepts/concept-catalog.service';
import { recordEntityAudit } from './audit.service';
import { nextOrderIndex, reindex, reorder } from './ordering.service';
import { requireStudy } from './study.service';

export interface BulkCreateResult {
  added: number;
  skipped: number;
  details: {
    added: string[];
    skipped: string[];
  };
}

export interface ConceptAssignmentResult {
  activity_id: number;
  concepts_set: number;
  concepts: ConceptMapping[];
}

export interface ActivityUpdateResult extends Activity {
  updated_fields: string[];
}

const ACTIVITY_COLUMNS = 'id, study_id, name, order_index, activity_uid';

export const activityUid = (orderIndex: number): string => `Activity_${orderIndex}`;

export const listActivities = async (studyId: number): Promise<Activity[]> => {
  await requireStudy(studyId);
  const result = await pool.query<Activity>(
    `SELECT ${ACTIVITY_COLUMNS} FROM activity WHERE study_id = $1 ORDER BY order_index, id`,
    [studyId]
  );
  return result.rows;
};

export const getActivity = async (studyId: number, activityId: number, executor: DbExecutor = pool): Promise<Activity> => {
  const result = await executor.query<Activity>(
    `SELECT ${ACTIVITY_COLUMNS} FROM activity WHERE id = $1 AND study_id = $2`,
    [activityId, studyId]
  );
  if (result.rows.length === 0) {
    throw new NotFoundError('Activity not found');
  }
  return result.rows[0];
};

const insertActivity = async (
  studyId: number,
  name: string,
  orderIndex: number,
  executor: DbExecutor
): Promise<Activity> => {
  const result = await executor.query<Activity>(
    `INSERT INTO activity (study_id, name, order_index, activity_uid)
     VALUES ($1, $2, $3, $4)
     RETURNING ${ACTIVITY_COLUMNS}`,
    [studyId, name, orderIndex, activityUid(orderIndex)]
  );
  return result.rows[0];
};

export const createActivity = async (studyId: number, name: string): Promise<Activity> => {
  await requireStudy(studyId);
  const orderIndex = await nextOrderIndex('activity', studyId);
  const activity = await insertActivity(studyId, name.trim(), orderIndex, pool);

  await recordEntityAudit(studyId, 'activity', 'create', activity.id, undefined, activity);
  logger.info('Activity created', { studyId, activityId: activity.id, orderIndex });
  return activity;
};

/**
 * Append many activities at once. Blank names are ignored; names already
 * present (case-insensitively, including earlier names in the same batch)
 * are skipped.
 */
export const createActivitiesBulk = async (studyId: number, names: string[]): Promise<BulkCreateResult> => {
  await requireStudy(studyId);

  const cleaned = names.map(name => name.trim()).filter(name => name !== '');
  if (cleaned.length === 0) {
    return { added: 0, skipped: 0, details: { added: [], skipped: [] } };
  }

  const { added, skipped } = await pool.transaction(async (tx) => {
    const existingResult = await tx.query<{ name: string }>('SELECT name FROM activity WHERE study_id = $1', [studyId]);
    const existing = new Set(existingResult.rows.map(row => row.name.toLowerCase()));
    let orderIndex = (await nextOrderIndex('activity', studyId, tx)) - 1;

    const addedNames: string[] = [];
    const skippedNames: string[] = [];
    for (const name of cleaned) {
      const key = name.toLowerCase();
      if (existing.has(key)) {
        skippedNames.push(name);
        continue;
      }
      orderIndex += 1;
      await insertActivity(studyId, name, orderIndex, tx);
      existing.add(key);
      addedNames.push(name);
    }
    return { added: addedNames, skipped: skippedNames };
  });

  if (added.length > 0) {
    await recordEntityAudit(studyId, 'activity', 'create', null, undefined, { bulk: added });
  }
  logger.info('Bulk activities created', { studyId, added: added.length, skipped: skipped.length });
  return { added: added.length, skipped: skipped.length, details: { added, skipped } };
};

export const updateActivity = async (
  studyId: number,
  activityId: number,
  updates: { name?: string }
): Promise<ActivityUpdateResult> => {
  await requireStudy(studyId);
  const before = await getActivity(studyId, activityId);

  const name = updates.name !== undefined ? updates.name.trim() : before.name;
  const result = await pool.query<Activity>(
    `UPDATE activity SET name = $2 WHERE id = $1 RETURNING ${ACTIVITY_COLUMNS}`,
    [activityId, name]
  );
  const after = result.rows[0];
  const updatedFields = before.name !== after.name ? ['name'] : [];

  await recordEntityAudit(studyId, 'activity', 'update', activityId, before, { ...after, updated_fields: updatedFields });
  logger.info('Activity updated', { studyId, activityId, updatedFields });
  return { ...after, updated_fields: updatedFields };
};

/**
 * Delete an activity with its cells and concept mappings, then close the
 * order gap. The activity_uid values of the remaining activities are kept.
 */
export const deleteActivity = async (studyId: number, activityId: number): Promise<void> => {
  await requireStudy(studyId);
  const before = await getActivity(studyId, activityId);

  await pool.transaction(async (tx) => {
    await tx.query('DELETE FROM cell WHERE activity_id = $1 AND study_id = $2', [activityId, studyId]);
    await tx.query('DELETE FROM activity_concept WHERE activity_id = $1', [activityId]);
    await tx.query('DELETE FROM activity WHERE id = $1', [activityId]);
    await reindex('activity', studyId, tx);
  });

  await recordEntityAudit(studyId, 'activity', 'delete', activityId, before);
  logger.info('Activity deleted', { studyId, activityId });
};

export const reorderActivities = async (studyId: number, order: number[]): Promise<ReorderResult> => {
  await requireStudy(studyId);
  return reorder('activity', studyId, order);
};

/**
 * ============================================================================
 * CONCEPT MAPPINGS
 * ============================================================================
 */

export const listActivityConcepts = async (studyId: number, activityId: number): Promise<ConceptMapping[]> => {
  await requireStudy(studyId);
  await getActivity(studyId, activityId);
  const result = await pool.query<ConceptMapping>(
    'SELECT id, activity_id, concept_code, concept_title FROM activity_concept WHERE activity_id = $1 ORDER BY id',
    [activityId]
  );
  return result.rows;
};

/**
 * Replace the concept codes of an activity. Titles are looked up once, now;
 * a code the catalog does not know is stored with its code as title.
 */
export const setActivityConcepts = async (
  studyId: number,
  activityId: number,
  conceptCodes: string[]
): Promise<ConceptAssignmentResult> => {
  await requireStudy(studyId);
  await getActivity(studyId, activityId);

  const codes = [...new Set(conceptCodes.map(code => code.trim()).filter(code => code !== ''))];
  const catalog = codes.length > 0 ? await fetchBiomedicalConcepts() : [];
  const titles = new Map(catalog.map(concept => [concept.code, concept.title]));

  const beforeResult = await pool.query<{ concept_code: string }>(
    'SELECT concept_code FROM activity_concept WHERE activity_id = $1 ORDER BY id',
    [activityId]
  );

  const concepts = await pool.transaction(async (tx) => {
    await tx.query('DELETE FROM activity_concept WHERE activity_id = $1', [activityId]);
    const inserted: ConceptMapping[] = [];
    for (const code of codes) {
      const result = await tx.query<ConceptMapping>(
        `INSERT INTO activity_concept (activity_id, concept_code, concept_title)
         VALUES ($1, $2, $3)
         RETURNING id, activity_id, concept_code, concept_title`,
        [activityId, code, titles.get(code) ?? code]
      );
      inserted.push(result.rows[0]);
    }
    return inserted;
  });

  await recordEntityAudit(
    studyId,
    'concept',
    'update',
    activityId,
    { concept_codes: beforeResult.rows.map(row => row.concept_code) },
    { concept_codes: codes }
  );
  logger.info('Activity concepts set', { studyId, activityId, count: concepts.length });
  return { activity_id: activityId, concepts_set: concepts.length, concepts };
};
