/**
 * Freeze Service
 *
 * Captures the whole live schedule of one study as an immutable snapshot.
 */

import { pool, DbExecutor } from '../../config/database';
import { logger } from '../../config/logger';
import { ConflictError } from '../../middleware/errorHandler.middleware';
import {
  FreezeResult,
  SNAPSHOT_SCHEMA_VERSION,
  SnapshotActivity,
  SnapshotArm,
  SnapshotCell,
  SnapshotConcept,
  SnapshotEpoch,
  SnapshotPayload,
  SnapshotVisit,
  Study
} from '../../types';
import { toISOTimestamp } from '../../utils/date.util';
import { placeholders } from '../../utils/sql.util';
import { ElementRow } from '../database/element.service';
import { requireStudy } from '../database/study.service';
import { insertFreeze, listFreezeLabels } from './snapshot-repository.service';
import { acquireVersionLock } from './version-lock';

/**
 * Smallest `v<n>` (n >= 1) not already taken.
 */
export const nextVersionLabel = (existing: Iterable<string>): string => {
  const taken = new Set(existing);
  let n = 1;
  while (taken.has(`v${n}`)) {
    n += 1;
  }
  return `v${n}`;
};

/**
 * Read every live collection of a study into a snapshot payload.
 */
export const buildSnapshotPayload = async (
  executor: DbExecutor,
  study: Study,
  versionLabel: string,
  frozenAt: string
): Promise<SnapshotPayload> => {
  const studyId = study.id;

  const visits = await executor.query<SnapshotVisit>(
    'SELECT id, name, raw_header, order_index, epoch_id FROM visit WHERE study_id = $1 ORDER BY order_index, id',
    [studyId]
  );
  const activities = await executor.query<SnapshotActivity>(
    'SELECT id, name, order_index, activity_uid FROM activity WHERE study_id = $1 ORDER BY order_index, id',
    [studyId]
  );
  const cells = await executor.query<SnapshotCell>(
    `SELECT visit_id, activity_id, status FROM cell
     WHERE study_id = $1 AND status <> ''
     ORDER BY id`,
    [studyId]
  );
  const arms = await executor.query<SnapshotArm>(
    `SELECT id, name, label, description, type, data_origin_type, order_index, arm_uid
     FROM arm WHERE study_id = $1 ORDER BY order_index, id`,
    [studyId]
  );
  const epochs = await executor.query<SnapshotEpoch>(
    `SELECT id, name, order_index, epoch_seq, epoch_label, epoch_description
     FROM epoch WHERE study_id = $1 ORDER BY order_index, id`,
    [studyId]
  );
  const elements = await executor.query<Omit<ElementRow, 'study_id'>>(
    `SELECT id, element_uid, name, label, description, testrl, teenrl, order_index, created_at
     FROM element WHERE study_id = $1 ORDER BY order_index, id`,
    [studyId]
  );

  const activityConcepts: Record<string, SnapshotConcept[]> = {};
  const activityIds = activities.rows.map(activity => activity.id);
  if (activityIds.length > 0) {
    const mappings = await executor.query<{ activity_id: number; concept_code: string; concept_title: string }>(
      `SELECT activity_id, concept_code, concept_title
       FROM activity_concept
       WHERE activity_id IN (${placeholders(activityIds.length)})
       ORDER BY id`,
      activityIds
    );
    for (const mapping of mappings.rows) {
      const key = String(mapping.activity_id);
      if (!activityConcepts[key]) {
        activityConcepts[key] = [];
      }
      activityConcepts[key].push({ code: mapping.concept_code, title: mapping.concept_title });
    }
  }

  return {
    schema_version: SNAPSHOT_SCHEMA_VERSION,
    study_id: studyId,
    study_name: study.name,
    study_code: study.study_code,
    study_label: study.label,
    study_description: study.description,
    version_label: versionLabel,
    frozen_at: frozenAt,
    visits: visits.rows,
    activities: activities.rows,
    cells: cells.rows,
    arms: arms.rows,
    epochs: epochs.rows,
    elements: elements.rows.map(row => ({ ...row, created_at: toISOTimestamp(row.created_at) })),
    activity_concepts: activityConcepts
  };
};

/**
 * Freeze the live schedule of a study. A blank label gets the next free
 * `v<n>`; an explicit label already used by the study is a conflict.
 */
export const createFreeze = async (studyId: number, versionLabel?: string | null): Promise<FreezeResult> => {
  logger.info('Creating freeze', { studyId, versionLabel });

  // One read snapshot for every collection, so concurrent edits cannot split the payload
  const result = await pool.transaction(async (tx) => {
    await acquireVersionLock(tx, studyId);
    const study = await requireStudy(studyId, tx);

    const existing = await listFreezeLabels(studyId, tx);
    const requested = (versionLabel ?? '').trim();
    const label = requested === '' ? nextVersionLabel(existing) : requested;
    if (existing.includes(label)) {
      throw new ConflictError('Version label already exists for this study', { version_label: label });
    }

    const frozenAt = toISOTimestamp();
    const payload = await buildSnapshotPayload(tx, study, label, frozenAt);
    const snapshotId = await insertFreeze(tx, studyId, label, frozenAt, payload);

    return {
      snapshot_id: snapshotId,
      label,
      counts: { visits: payload.visits.length, activities: payload.activities.length, cells: payload.cells.length }
    };
  }, { isolationLevel: 'REPEATABLE READ' });

  logger.info('Freeze created', { studyId, snapshotId: result.snapshot_id, label: result.label, ...result.counts });
  return { snapshot_id: result.snapshot_id, label: result.label };
};
