/**
 * Rollback Service
 *
 * Replaces the live visits, activities, cells, concept mappings and
 * elements of a study with the content of one of its snapshots. Rows get new
 * ids; cells and concept mappings are carried over through old->new id maps.
 * Arms and epochs are left as they are.
 */

import { pool, DbExecutor } from '../../config/database';
import { logger } from '../../config/logger';
import { BadRequestError, CorruptSnapshotError } from '../../middleware/errorHandler.middleware';
import {
  RestoreCounts,
  RollbackPreview,
  RollbackResult,
  SnapshotActivity,
  SnapshotCell,
  SnapshotElement,
  SnapshotPayload,
  SnapshotVisit
} from '../../types';
import { toISOTimestamp } from '../../utils/date.util';
import { placeholders } from '../../utils/sql.util';
import { nextSequentialUid } from '../../utils/uid.util';
import { activityUid } from '../database/activity.service';
import { recordRollbackAudit } from '../database/audit.service';
import { ELEMENT_UID_PREFIX } from '../database/element.service';
import { requireStudy } from '../database/study.service';
import { findFreeze, isCorruptSnapshot } from './snapshot-repository.service';
import { acquireVersionLock } from './version-lock';

export interface ConceptRestore {
  activityId: number;
  code: string;
  title: string;
}

/**
 * What a rollback would write, computed from the payload alone.
 */
export interface RollbackPlan {
  visits: SnapshotVisit[];
  activities: SnapshotActivity[];
  cells: SnapshotCell[];
  concepts: ConceptRestore[];
  elements: SnapshotElement[];
}

const byOrderIndex = <T extends { order_index: number }>(items: T[]): T[] =>
  items
    .map((item, position) => ({ item, position }))
    .sort((a, b) => a.item.order_index - b.item.order_index || a.position - b.position)
    .map(entry => entry.item);

/**
 * Keep the first entry per captured id.
 */
const uniqueById = <T extends { id: number }>(items: T[]): T[] => {
  const seen = new Set<number>();
  return items.filter(item => {
    if (seen.has(item.id)) return false;
    seen.add(item.id);
    return true;
  });
};

export const planRollback = (payload: SnapshotPayload): RollbackPlan => {
  const visits = byOrderIndex(uniqueById(payload.visits));
  const activities = byOrderIndex(uniqueById(payload.activities));
  const visitIds = new Set(visits.map(visit => visit.id));
  const activityIds = new Set(activities.map(activity => activity.id));

  const cellKeys = new Set<string>();
  const cells = payload.cells.filter(cell => {
    const key = `${cell.visit_id}:${cell.activity_id}`;
    if (cell.status.trim() === '' || !visitIds.has(cell.visit_id) || !activityIds.has(cell.activity_id) || cellKeys.has(key)) {
      return false;
    }
    cellKeys.add(key);
    return true;
  });

  const concepts: ConceptRestore[] = [];
  for (const [key, list] of Object.entries(payload.activity_concepts)) {
    const activityId = parseInt(key);
    if (!activityIds.has(activityId)) continue;
    for (const concept of list) {
      if (!concept.code) continue;
      concepts.push({ activityId, code: concept.code, title: concept.title || concept.code });
    }
  }

  return {
    visits,
    activities,
    cells,
    concepts,
    elements: byOrderIndex(uniqueById(payload.elements))
  };
};

/**
 * Load a snapshot payload that a rollback of `studyId` may apply. An unknown
 * study or freeze id is NotFound; a freeze taken of another study is a
 * mismatch.
 */
const loadRestorablePayload = async (
  studyId: number,
  freezeId: number,
  executor: DbExecutor = pool
): Promise<{ versionLabel: string; payload: SnapshotPayload }> => {
  await requireStudy(studyId, executor);
  const { studyId: ownerId, freeze } = await findFreeze(freezeId, executor);
  if (ownerId !== studyId) {
    throw new BadRequestError('Snapshot study mismatch', { freeze_id: freezeId, snapshot_study_id: ownerId });
  }
  if (isCorruptSnapshot(freeze.snapshot)) {
    throw new CorruptSnapshotError('Snapshot payload is corrupt and cannot be restored', { freeze_id: freezeId });
  }
  if (freeze.snapshot.study_id !== studyId) {
    throw new BadRequestError('Snapshot study mismatch', { freeze_id: freezeId, snapshot_study_id: freeze.snapshot.study_id });
  }
  return { versionLabel: freeze.version_label, payload: freeze.snapshot };
};

const clearLiveContent = async (tx: DbExecutor, studyId: number): Promise<void> => {
  await tx.query('DELETE FROM cell WHERE study_id = $1', [studyId]);

  const activityIds = (await tx.query<{ id: number }>('SELECT id FROM activity WHERE study_id = $1', [studyId]))
    .rows.map(row => row.id);
  if (activityIds.length > 0) {
    await tx.query(`DELETE FROM activity_concept WHERE activity_id IN (${placeholders(activityIds.length)})`, activityIds);
  }

  await tx.query('DELETE FROM activity WHERE study_id = $1', [studyId]);
  await tx.query('DELETE FROM visit WHERE study_id = $1', [studyId]);
  await tx.query('DELETE FROM element WHERE study_id = $1', [studyId]);
};

const restorePlan = async (tx: DbExecutor, studyId: number, plan: RollbackPlan): Promise<RestoreCounts> => {
  const epochIds = new Set(
    (await tx.query<{ id: number }>('SELECT id FROM epoch WHERE study_id = $1', [studyId])).rows.map(row => row.id)
  );

  const visitIdMap = new Map<number, number>();
  for (let index = 0; index < plan.visits.length; index++) {
    const visit = plan.visits[index];
    const epochId = visit.epoch_id !== null && epochIds.has(visit.epoch_id) ? visit.epoch_id : null;
    const result = await tx.query<{ id: number }>(
      `INSERT INTO visit (study_id, name, raw_header, order_index, epoch_id)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING id`,
      [studyId, visit.name, visit.raw_header || visit.name, index + 1, epochId]
    );
    visitIdMap.set(visit.id, result.rows[0].id);
  }

  const activityIdMap = new Map<number, number>();
  for (let index = 0; index < plan.activities.length; index++) {
    const activity = plan.activities[index];
    const result = await tx.query<{ id: number }>(
      `INSERT INTO activity (study_id, name, order_index, activity_uid)
       VALUES ($1, $2, $3, $4)
       RETURNING id`,
      [studyId, activity.name, index + 1, activity.activity_uid || activityUid(index + 1)]
    );
    activityIdMap.set(activity.id, result.rows[0].id);
  }

  let cellsRestored = 0;
  for (const cell of plan.cells) {
    const visitId = visitIdMap.get(cell.visit_id);
    const activityId = activityIdMap.get(cell.activity_id);
    if (visitId === undefined || activityId === undefined) continue;
    await tx.query(
      'INSERT INTO cell (study_id, visit_id, activity_id, status) VALUES ($1, $2, $3, $4)',
      [studyId, visitId, activityId, cell.status.trim()]
    );
    cellsRestored += 1;
  }

  let conceptsRestored = 0;
  for (const concept of plan.concepts) {
    const activityId = activityIdMap.get(concept.activityId);
    if (activityId === undefined) continue;
    await tx.query(
      'INSERT INTO activity_concept (activity_id, concept_code, concept_title) VALUES ($1, $2, $3)',
      [activityId, concept.code, concept.title]
    );
    conceptsRestored += 1;
  }

  const elementUids: string[] = [];
  for (let index = 0; index < plan.elements.length; index++) {
    const element = plan.elements[index];
    const elementUid = element.element_uid || nextSequentialUid(ELEMENT_UID_PREFIX, elementUids);
    elementUids.push(elementUid);
    await tx.query(
      `INSERT INTO element (study_id, element_uid, name, label, description, testrl, teenrl, order_index, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
      [
        studyId,
        elementUid,
        element.name,
        element.label,
        element.description,
        element.testrl,
        element.teenrl,
        index + 1,
        toISOTimestamp(element.created_at)
      ]
    );
  }

  return {
    visits_restored: visitIdMap.size,
    activities_restored: activityIdMap.size,
    cells_restored: cellsRestored,
    concept_mappings_restored: conceptsRestored,
    elements_restored: plan.elements.length
  };
};

/**
 * Restore a study's live schedule from one of its freezes. All or nothing:
 * any failure leaves the live data untouched.
 */
export const rollbackToFreeze = async (studyId: number, freezeId: number): Promise<RollbackResult> => {
  logger.info('Rolling back to freeze', { studyId, freezeId });

  const counts = await pool.transaction(async (tx) => {
    await acquireVersionLock(tx, studyId);
    const { payload } = await loadRestorablePayload(studyId, freezeId, tx);
    const plan = planRollback(payload);

    await clearLiveContent(tx, studyId);
    return restorePlan(tx, studyId, plan);
  });

  logger.info('Rollback complete', { studyId, freezeId, ...counts });
  await recordRollbackAudit(studyId, freezeId, counts);

  return { freeze_id: freezeId, ...counts };
};

/**
 * What rollbackToFreeze would restore, without writing anything.
 */
export const previewRollback = async (studyId: number, freezeId: number): Promise<RollbackPreview> => {
  const { versionLabel, payload } = await loadRestorablePayload(studyId, freezeId);
  const plan = planRollback(payload);

  return {
    freeze_id: freezeId,
    version_label: versionLabel,
    visits_to_restore: plan.visits.length,
    activities_to_restore: plan.activities.length,
    cells_to_restore: plan.cells.length,
    concept_mappings_to_restore: plan.concepts.length,
    elements_to_restore: plan.elements.length
  };
};
