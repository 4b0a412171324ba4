/**
 * Diff Service Tests
 */

import { describe, it, expect, beforeAll, beforeEach } from '@jest/globals';
import { testDb } from './utils/test-db';
import { seedSchedule, SeededSchedule } from './fixtures/test-data';
import {
  computeSnapshotDiff,
  createFreeze,
  diffFreezes,
  DiffablePayload,
  isDiffEmpty,
  resolveDiffLimit
} from '../src/services/versioning';
import { createStudy } from '../src/services/database/study.service';
import { createVisit } from '../src/services/database/visit.service';
import { setCell } from '../src/services/database/matrix.service';
import { setActivityConcepts } from '../src/services/database/activity.service';
import { NotFoundError } from '../src/middleware/errorHandler.middleware';
import { SnapshotVisit } from '../src/types';

const emptyPayload = (): DiffablePayload => ({ visits: [], activities: [], cells: [], activity_concepts: {} });

const visit = (id: number): SnapshotVisit => ({
  id,
  name: `Visit ${id}`,
  raw_header: `Visit ${id}`,
  order_index: id,
  epoch_id: null
});

describe('Diff Service', () => {
  describe('computeSnapshotDiff', () => {
    it('should report nothing for identical payloads', () => {
      const payload: DiffablePayload = {
        visits: [visit(1)],
        activities: [{ id: 5, name: 'ECG', order_index: 1, activity_uid: 'Activity_1' }],
        cells: [{ visit_id: 1, activity_id: 5, status: 'X' }],
        activity_concepts: { '5': [{ code: 'C1', title: 'One' }] }
      };

      const diff = computeSnapshotDiff(payload, payload, null);
      expect(isDiffEmpty(diff)).toBe(true);
      expect(diff.visits).toEqual({ added: [], removed: [] });
      expect(diff.concepts).toEqual([]);
    });

    it('should compare visits by id only', () => {
      const left = { ...emptyPayload(), visits: [visit(1), visit(2)] };
      const right = { ...emptyPayload(), visits: [{ ...visit(1), name: 'Renamed' }, visit(3)] };

      const diff = computeSnapshotDiff(left, right, null);
      expect(diff.visits.added.map(item => item.id)).toEqual([3]);
      expect(diff.visits.removed.map(item => item.id)).toEqual([2]);
    });

    it('should report added, removed and changed cells', () => {
      const left = {
        ...emptyPayload(),
        cells: [
          { visit_id: 1, activity_id: 1, status: 'X' },
          { visit_id: 1, activity_id: 2, status: 'X' }
        ]
      };
      const right = {
        ...emptyPayload(),
        cells: [
          { visit_id: 1, activity_id: 1, status: 'O' },
          { visit_id: 2, activity_id: 2, status: 'X' }
        ]
      };

      const diff = computeSnapshotDiff(left, right, null);
      expect(diff.cells.added).toEqual([{ visit_id: 2, activity_id: 2, status: 'X' }]);
      expect(diff.cells.removed).toEqual([{ visit_id: 1, activity_id: 2, status: 'X' }]);
      expect(diff.cells.changed).toEqual([{ visit_id: 1, activity_id: 1, old_status: 'X', new_status: 'O' }]);
    });

    it('should report concept changes per activity in numeric order', () => {
      const left = { ...emptyPayload(), activity_concepts: { '2': [{ code: 'A', title: 'Alpha' }] } };
      const right = {
        ...emptyPayload(),
        activity_concepts: {
          '10': [{ code: 'C', title: 'Gamma' }],
          '2': [
            { code: 'B', title: 'Beta' },
            { code: 'A', title: 'Alpha (revised)' }
          ]
        }
      };

      const diff = computeSnapshotDiff(left, right, null);
      expect(diff.concepts).toEqual([
        {
          activity_id: 2,
          added: ['B'],
          removed: [],
          title_changes: [{ code: 'A', old_title: 'Alpha', new_title: 'Alpha (revised)' }]
        },
        { activity_id: 10, added: ['C'], removed: [], title_changes: [] }
      ]);
      expect(diff.meta.concepts).toEqual({ changes_total: 2, changes_truncated: false });
    });

    it('should truncate long lists and keep exact totals', () => {
      const right = { ...emptyPayload(), visits: Array.from({ length: 120 }, (_, index) => visit(index + 1)) };

      const diff = computeSnapshotDiff(emptyPayload(), right, 50);
      expect(diff.visits.added).toHaveLength(50);
      expect(diff.visits.added[49].id).toBe(50);
      expect(diff.meta.limit).toBe(50);
      expect(diff.meta.visits).toEqual({
        added_total: 120,
        removed_total: 0,
        added_truncated: true,
        removed_truncated: false
      });
      expect(isDiffEmpty(diff)).toBe(false);
    });

    it('should treat a zero or missing limit as unbounded', () => {
      const right = { ...emptyPayload(), visits: Array.from({ length: 120 }, (_, index) => visit(index + 1)) };

      expect(computeSnapshotDiff(emptyPayload(), right, 0).visits.added).toHaveLength(120);
      expect(computeSnapshotDiff(emptyPayload(), right).meta.limit).toBeNull();
    });
  });

  describe('resolveDiffLimit', () => {
    it('should use the mode defaults', () => {
      expect(resolveDiffLimit({ mode: 'interactive' })).toBe(50);
      expect(resolveDiffLimit({ mode: 'export' })).toBe(1000);
    });

    it('should prefer an explicit limit', () => {
      expect(resolveDiffLimit({ limit: 5, mode: 'export' })).toBe(5);
      expect(resolveDiffLimit({ limit: 0, mode: 'interactive' })).toBeNull();
    });

    it('should lift the limit for full output', () => {
      expect(resolveDiffLimit({ limit: 5, full: true, mode: 'interactive' })).toBeNull();
    });
  });

  describe('diffFreezes', () => {
    let seeded: SeededSchedule;

    beforeAll(async () => {
      await testDb.connect();
    });

    beforeEach(async () => {
      testDb.reset();
      seeded = await seedSchedule();
    });

    it('should diff two freezes of a study', async () => {
      const studyId = seeded.study.id;
      const [screening, baseline] = seeded.visits;
      const [consent, vitals] = seeded.activities;

      const v1 = await createFreeze(studyId);
      const week4 = await createVisit(studyId, { name: 'Week 4' });
      await setCell(studyId, baseline.id, vitals.id, 'X');
      await setCell(studyId, screening.id, consent.id, '');
      await setActivityConcepts(studyId, vitals.id, ['C49677']);
      const v2 = await createFreeze(studyId);

      const diff = await diffFreezes(studyId, v1.snapshot_id, v2.snapshot_id, null);

      expect(diff.left).toEqual(expect.objectContaining({ id: v1.snapshot_id, label: 'v1' }));
      expect(diff.right).toEqual(expect.objectContaining({ id: v2.snapshot_id, label: 'v2' }));
      expect(diff.left.error).toBeUndefined();
      expect(diff.visits.added).toEqual([
        { id: week4.id, name: 'Week 4', raw_header: 'Week 4', order_index: 3, epoch_id: null }
      ]);
      expect(diff.visits.removed).toEqual([]);
      expect(diff.cells.removed).toEqual([{ visit_id: screening.id, activity_id: consent.id, status: 'X' }]);
      expect(diff.cells.changed).toEqual([
        { visit_id: baseline.id, activity_id: vitals.id, old_status: 'O', new_status: 'X' }
      ]);
      expect(diff.concepts).toEqual([
        { activity_id: vitals.id, added: [], removed: ['C25298'], title_changes: [] }
      ]);
    });

    it('should find nothing between two freezes of an unchanged schedule', async () => {
      const studyId = seeded.study.id;
      const v1 = await createFreeze(studyId);
      const v2 = await createFreeze(studyId);

      const diff = await diffFreezes(studyId, v1.snapshot_id, v2.snapshot_id, null);

      expect(isDiffEmpty(diff)).toBe(true);
      expect(diff.cells).toEqual({ added: [], removed: [], changed: [] });
      expect(diff.concepts).toEqual([]);
    });

    it('should compare a corrupt side as empty and flag it', async () => {
      const studyId = seeded.study.id;
      const v1 = await createFreeze(studyId);
      const rows = await testDb.query<{ id: number }>(
        `INSERT INTO soa_freeze (study_id, version_label, created_at, snapshot_json)
         VALUES ($1, $2, $3, $4) RETURNING id`,
        [studyId, 'broken', new Date().toISOString(), '[]']
      );

      const diff = await diffFreezes(studyId, v1.snapshot_id, rows[0].id, 50);

      expect(diff.right.error).toBe('corrupt snapshot');
      expect(diff.left.error).toBeUndefined();
      expect(diff.meta.visits.removed_total).toBe(2);
      expect(diff.meta.activities.removed_total).toBe(3);
      expect(diff.meta.cells.removed_total).toBe(3);
    });

    it('should not diff a freeze of another study', async () => {
      const other = await createStudy({ name: 'Other Study' });
      const mine = await createFreeze(seeded.study.id);
      const theirs = await createFreeze(other.id);

      await expect(diffFreezes(seeded.study.id, mine.snapshot_id, theirs.snapshot_id, null))
        .rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
