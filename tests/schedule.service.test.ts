/**
 * Schedule Service Tests
 *
 * Live editing of a study's schedule:
 * - Studies, visits, activities and concept mappings
 * - Matrix cells and matrix import
 * - Arms, epochs, elements
 * - Ordering
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from '@jest/globals';
import { testDb } from './utils/test-db';
import { CATALOG_FIXTURE, seedSchedule, SeededSchedule } from './fixtures/test-data';
import { config } from '../src/config/environment';
import { clearConceptCache } from '../src/services/concepts/concept-catalog.service';
import * as studyService from '../src/services/database/study.service';
import * as visitService from '../src/services/database/visit.service';
import * as activityService from '../src/services/database/activity.service';
import * as matrixService from '../src/services/database/matrix.service';
import * as armService from '../src/services/database/arm.service';
import * as epochService from '../src/services/database/epoch.service';
import * as elementService from '../src/services/database/element.service';
import { BadRequestError, NotFoundError } from '../src/middleware/errorHandler.middleware';

describe('Schedule Services', () => {
  let seeded: SeededSchedule;
  let studyId: number;

  beforeAll(async () => {
    await testDb.connect();
  });

  beforeEach(async () => {
    testDb.reset();
    seeded = await seedSchedule();
    studyId = seeded.study.id;
  });

  describe('studies', () => {
    it('should store blank optional fields as null', async () => {
      const study = await studyService.createStudy({ name: '  Blank Fields  ', study_code: '   ', label: '' });

      expect(study.name).toBe('Blank Fields');
      expect(study.study_code).toBeNull();
      expect(study.label).toBeNull();
    });

    it('should count everything a study owns', async () => {
      const detail = await studyService.getStudy(studyId);

      expect(detail.counts).toEqual({
        visits: 2,
        activities: 3,
        cells: 3,
        arms: 1,
        epochs: 1,
        elements: 1,
        freezes: 0
      });
    });

    it('should update only the given fields', async () => {
      const updated = await studyService.updateStudy(studyId, { label: 'Phase II' });

      expect(updated.name).toBe('Test Study');
      expect(updated.study_code).toBe('TS-001');
      expect(updated.label).toBe('Phase II');
    });

    it('should fail for an unknown study', async () => {
      await expect(studyService.getStudy(999999)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('visits', () => {
    it('should default the header to the name and append at the end', async () => {
      const visit = await visitService.createVisit(studyId, { name: 'Week 2' });

      expect(visit.raw_header).toBe('Week 2');
      expect(visit.order_index).toBe(3);
    });

    it('should reject an epoch from another study', async () => {
      const other = await studyService.createStudy({ name: 'Other Study' });
      const foreignEpoch = await epochService.createEpoch(other.id, { name: 'Foreign' });

      await expect(visitService.createVisit(studyId, { name: 'Week 2', epoch_id: foreignEpoch.id }))
        .rejects.toBeInstanceOf(BadRequestError);
    });

    it('should report the fields an update changed', async () => {
      const [screening] = seeded.visits;
      const result = await visitService.updateVisit(studyId, screening.id, { name: 'Screening', epoch_id: seeded.epoch.id });

      expect(result.updated_fields).toEqual(['epoch_id']);
      expect(result.epoch_id).toBe(seeded.epoch.id);
    });

    it('should delete a visit with its cells and close the gap', async () => {
      const [screening, baseline] = seeded.visits;
      await visitService.deleteVisit(studyId, screening.id);

      const matrix = await matrixService.getMatrix(studyId);
      expect(matrix.visits.map(visit => [visit.id, visit.order_index])).toEqual([[baseline.id, 1]]);
      expect(matrix.cells.map(cell => cell.visit_id)).toEqual([baseline.id]);
    });

    it('should not find a visit through another study', async () => {
      const other = await studyService.createStudy({ name: 'Other Study' });
      await expect(visitService.getVisit(other.id, seeded.visits[0].id)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('activities', () => {
    it('should number activity uids by creation position', async () => {
      const activity = await activityService.createActivity(studyId, 'ECG');
      expect(activity.activity_uid).toBe('Activity_4');
      expect(activity.order_index).toBe(4);
    });

    it('should add activities in bulk and skip duplicates', async () => {
      const result = await activityService.createActivitiesBulk(studyId, ['Vital Signs', ' ', 'ECG', 'ecg', 'Urinalysis']);

      expect(result).toEqual({
        added: 2,
        skipped: 2,
        details: { added: ['ECG', 'Urinalysis'], skipped: ['Vital Signs', 'ecg'] }
      });
      const activities = await activityService.listActivities(studyId);
      expect(activities.map(activity => activity.order_index)).toEqual([1, 2, 3, 4, 5]);
    });

    it('should delete an activity with its cells and concepts', async () => {
      const [consent, vitals, labs] = seeded.activities;
      await activityService.deleteActivity(studyId, vitals.id);

      const activities = await activityService.listActivities(studyId);
      expect(activities.map(activity => [activity.id, activity.order_index, activity.activity_uid])).toEqual([
        [consent.id, 1, 'Activity_1'],
        [labs.id, 2, 'Activity_3']
      ]);
      const matrix = await matrixService.getMatrix(studyId);
      expect(matrix.cells.map(cell => cell.activity_id)).toEqual([consent.id]);
      const mappings = await testDb.query('SELECT id FROM activity_concept WHERE activity_id = $1', [vitals.id]);
      expect(mappings).toEqual([]);
    });
  });

  describe('concept mappings', () => {
    beforeEach(() => {
      config.concepts.overrideJson = JSON.stringify(CATALOG_FIXTURE);
      clearConceptCache();
    });

    afterEach(() => {
      config.concepts.overrideJson = '';
      clearConceptCache();
    });

    it('should capture catalog titles and fall back to the code', async () => {
      const [consent] = seeded.activities;
      const result = await activityService.setActivityConcepts(studyId, consent.id, ['C64796', ' C64796 ', 'C99999', '']);

      expect(result.concepts_set).toBe(2);
      expect(result.concepts.map(concept => [concept.concept_code, concept.concept_title])).toEqual([
        ['C64796', 'Body Temperature'],
        ['C99999', 'C99999']
      ]);
    });

    it('should replace the previous codes', async () => {
      const [, vitals] = seeded.activities;
      await activityService.setActivityConcepts(studyId, vitals.id, ['C64796']);

      const concepts = await activityService.listActivityConcepts(studyId, vitals.id);
      expect(concepts.map(concept => concept.concept_code)).toEqual(['C64796']);
    });
  });

  describe('matrix', () => {
    it('should update an existing cell in place', async () => {
      const [screening] = seeded.visits;
      const [consent] = seeded.activities;

      const first = await matrixService.setCell(studyId, screening.id, consent.id, ' O ');
      const matrix = await matrixService.getMatrix(studyId);

      expect(first.status).toBe('O');
      expect(matrix.cells).toHaveLength(3);
    });

    it('should clear a cell with a blank status', async () => {
      const [screening] = seeded.visits;
      const [consent] = seeded.activities;

      const result = await matrixService.setCell(studyId, screening.id, consent.id, '  ');

      expect(result.deleted).toBe(true);
      expect((await matrixService.getMatrix(studyId)).cells).toHaveLength(2);
    });

    it('should treat clearing an empty cell as a no-op', async () => {
      const [, baseline] = seeded.visits;
      const [consent] = seeded.activities;

      const result = await matrixService.setCell(studyId, baseline.id, consent.id, '');
      expect(result).toEqual({ cell_id: null, status: '', deleted: false });
    });

    it('should toggle a cell on and off', async () => {
      const [, baseline] = seeded.visits;
      const [, , labs] = seeded.activities;

      const on = await matrixService.toggleCell(studyId, baseline.id, labs.id);
      const off = await matrixService.toggleCell(studyId, baseline.id, labs.id);

      expect(on.status).toBe(matrixService.TOGGLE_STATUS);
      expect(off.deleted).toBe(true);
    });

    it('should import a matrix replacing the schedule', async () => {
      const result = await matrixService.importMatrix(studyId, {
        visits: [{ name: 'V1' }, { name: 'V2', raw_header: 'Visit 2 (Week 1)' }],
        activities: [
          { name: 'Weight', statuses: ['X', ''] },
          { name: 'Height', statuses: [null, 'X'] }
        ],
        reset: true
      });

      expect(result).toEqual({ visits_added: 2, activities_added: 2, cells_added: 2 });
      const matrix = await matrixService.getMatrix(studyId);
      expect(matrix.visits.map(visit => visit.raw_header)).toEqual(['V1', 'Visit 2 (Week 1)']);
      expect(matrix.activities.map(activity => activity.name)).toEqual(['Weight', 'Height']);
      const orphanConcepts = await testDb.query('SELECT id FROM activity_concept WHERE activity_id = $1', [seeded.activities[1].id]);
      expect(orphanConcepts).toEqual([]);
    });

    it('should append when reset is off', async () => {
      await matrixService.importMatrix(studyId, {
        visits: [{ name: 'Follow-up' }],
        activities: [{ name: 'Adverse Events', statuses: ['X'] }],
        reset: false
      });

      const matrix = await matrixService.getMatrix(studyId);
      expect(matrix.visits.map(visit => visit.order_index)).toEqual([1, 2, 3]);
      expect(matrix.activities[3].activity_uid).toBe('Activity_4');
      expect(matrix.cells).toHaveLength(4);
    });

    it('should reject rows that do not match the visit count', async () => {
      await expect(matrixService.importMatrix(studyId, {
        visits: [{ name: 'V1' }, { name: 'V2' }],
        activities: [{ name: 'Weight', statuses: ['X'] }],
        reset: true
      })).rejects.toThrow("Activity 'Weight' statuses length 1 != visits length 2");

      expect((await matrixService.getMatrix(studyId)).visits).toHaveLength(2);
    });
  });

  describe('arms, epochs, elements', () => {
    it('should reuse the smallest free arm uid', async () => {
      const second = await armService.createArm(studyId, { name: 'Active' });
      await armService.deleteArm(studyId, seeded.arm.id);
      const third = await armService.createArm(studyId, { name: 'High Dose' });

      expect(second.arm_uid).toBe('StudyArm_2');
      expect(third.arm_uid).toBe('StudyArm_1');
    });

    it('should never reuse an epoch sequence number', async () => {
      const second = await epochService.createEpoch(studyId, { name: 'Follow-up' });
      await epochService.deleteEpoch(studyId, second.id);
      const third = await epochService.createEpoch(studyId, { name: 'Extension' });

      expect(second.epoch_seq).toBe(2);
      expect(third.epoch_seq).toBe(3);
    });

    it('should detach visits from a deleted epoch', async () => {
      const [, baseline] = seeded.visits;
      await epochService.deleteEpoch(studyId, seeded.epoch.id);

      const visit = await visitService.getVisit(studyId, baseline.id);
      expect(visit.epoch_id).toBeNull();
    });

    it('should update element rules', async () => {
      const result = await elementService.updateElement(studyId, seeded.element.id, { teenrl: 'Day 7', label: '' });

      expect(result.teenrl).toBe('Day 7');
      expect(result.updated_fields).toEqual(['teenrl']);
    });
  });

  describe('ordering', () => {
    it('should place unlisted ids after the listed ones', async () => {
      const [consent, vitals, labs] = seeded.activities;
      const result = await activityService.reorderActivities(studyId, [labs.id]);

      expect(result).toEqual({
        old_order: [consent.id, vitals.id, labs.id],
        new_order: [labs.id, consent.id, vitals.id]
      });
      const activities = await activityService.listActivities(studyId);
      expect(activities.map(activity => activity.id)).toEqual([labs.id, consent.id, vitals.id]);
    });

    it('should reject duplicate ids', async () => {
      const [screening] = seeded.visits;
      await expect(visitService.reorderVisits(studyId, [screening.id, screening.id]))
        .rejects.toBeInstanceOf(BadRequestError);
    });

    it('should reject ids from another study', async () => {
      const other = await studyService.createStudy({ name: 'Other Study' });
      const foreign = await visitService.createVisit(other.id, { name: 'Foreign' });

      await expect(visitService.reorderVisits(studyId, [foreign.id])).rejects.toBeInstanceOf(BadRequestError);
    });

    it('should reorder epochs', async () => {
      const second = await epochService.createEpoch(studyId, { name: 'Follow-up' });
      await epochService.reorderEpochs(studyId, [second.id, seeded.epoch.id]);

      const epochs = await epochService.listEpochs(studyId);
      expect(epochs.map(epoch => epoch.name)).toEqual(['Follow-up', 'Treatment']);
    });
  });
});
