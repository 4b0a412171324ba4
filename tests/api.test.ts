/**
 * API Tests
 *
 * Exercises the HTTP surface end to end against the in-memory database.
 */

import { describe, it, expect, beforeAll, beforeEach } from '@jest/globals';
import request from 'supertest';
import app from '../src/app';
import { testDb } from './utils/test-db';

interface Created {
  id: number;
}

const createStudy = async (name = 'API Study'): Promise<number> => {
  const response = await request(app).post('/api/studies').send({ name, study_code: 'API-1' });
  expect(response.status).toBe(201);
  const study: Created = response.body.data;
  return study.id;
};

const createVisit = async (studyId: number, name: string): Promise<number> => {
  const response = await request(app).post(`/api/studies/${studyId}/visits`).send({ name });
  expect(response.status).toBe(201);
  const visit: Created = response.body.data;
  return visit.id;
};

const createActivity = async (studyId: number, name: string): Promise<number> => {
  const response = await request(app).post(`/api/studies/${studyId}/activities`).send({ name });
  expect(response.status).toBe(201);
  const activity: Created = response.body.data;
  return activity.id;
};

describe('API', () => {
  beforeAll(async () => {
    await testDb.connect();
  });

  beforeEach(() => {
    testDb.reset();
  });

  describe('health and errors', () => {
    it('should report health', async () => {
      const response = await request(app).get('/health');
      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
    });

    it('should probe the database', async () => {
      const response = await request(app).get('/api/health');
      expect(response.status).toBe(200);
      expect(response.body.services).toEqual({ database: 'connected' });
    });

    it('should echo the request id', async () => {
      const response = await request(app).get('/health').set('X-Request-Id', 'req-123');
      expect(response.headers['x-request-id']).toBe('req-123');
    });

    it('should return 404 for unknown routes', async () => {
      const response = await request(app).get('/api/nowhere');
      expect(response.status).toBe(404);
      expect(response.body).toEqual({ success: false, message: 'Route GET /api/nowhere not found', statusCode: 404 });
    });

    it('should return 404 for an unknown study', async () => {
      const response = await request(app).get('/api/studies/999999');
      expect(response.status).toBe(404);
      expect(response.body.message).toBe('Study not found');
    });

    it('should reject an invalid body', async () => {
      const response = await request(app).post('/api/studies').send({});
      expect(response.status).toBe(400);
      expect(response.body.success).toBe(false);
      expect(response.body.errors[0].field).toBe('name');
    });

    it('should reject a non-numeric study id', async () => {
      const response = await request(app).get('/api/studies/abc/visits');
      expect(response.status).toBe(400);
    });
  });

  describe('schedule editing', () => {
    it('should build a schedule and read it back as a matrix', async () => {
      const studyId = await createStudy();
      const visitId = await createVisit(studyId, 'Screening');
      const activityId = await createActivity(studyId, 'Vital Signs');

      const cell = await request(app)
        .put(`/api/studies/${studyId}/matrix/cells`)
        .send({ visit_id: visitId, activity_id: activityId, status: 'X' });
      expect(cell.status).toBe(200);
      expect(cell.body.data.status).toBe('X');

      const matrix = await request(app).get(`/api/studies/${studyId}/matrix`);
      expect(matrix.body.data.cells).toEqual([
        expect.objectContaining({ visit_id: visitId, activity_id: activityId, status: 'X' })
      ]);
    });

    it('should reorder visits', async () => {
      const studyId = await createStudy();
      const first = await createVisit(studyId, 'Day 1');
      const second = await createVisit(studyId, 'Day 8');

      const response = await request(app)
        .post(`/api/studies/${studyId}/visits/reorder`)
        .send({ order: [second, first] });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ old_order: [first, second], new_order: [second, first] });
    });

    it('should reject a reorder with duplicate ids', async () => {
      const studyId = await createStudy();
      const first = await createVisit(studyId, 'Day 1');

      const response = await request(app)
        .post(`/api/studies/${studyId}/visits/reorder`)
        .send({ order: [first, first] });

      expect(response.status).toBe(400);
    });

    it('should delete an activity', async () => {
      const studyId = await createStudy();
      const activityId = await createActivity(studyId, 'ECG');

      const response = await request(app).delete(`/api/studies/${studyId}/activities/${activityId}`);
      expect(response.status).toBe(200);

      const missing = await request(app).get(`/api/studies/${studyId}/activities/${activityId}`);
      expect(missing.status).toBe(404);
    });
  });

  describe('versioning', () => {
    it('should freeze, diff and roll back', async () => {
      const studyId = await createStudy();
      const visitId = await createVisit(studyId, 'Screening');
      await createActivity(studyId, 'Vital Signs');

      const v1 = await request(app).post(`/api/studies/${studyId}/freezes`).send({});
      expect(v1.status).toBe(201);
      expect(v1.body.data.label).toBe('v1');

      await createVisit(studyId, 'Week 4');
      const v2 = await request(app).post(`/api/studies/${studyId}/freezes`).send({ version_label: '' });
      expect(v2.body.data.label).toBe('v2');

      const diff = await request(app)
        .get(`/api/studies/${studyId}/freezes/diff`)
        .query({ left: v1.body.data.snapshot_id, right: v2.body.data.snapshot_id });
      expect(diff.status).toBe(200);
      expect(diff.body.data.meta.limit).toBe(50);
      expect(diff.body.data.visits.added.map((visit: { name: string }) => visit.name)).toEqual(['Week 4']);

      const exported = await request(app)
        .get(`/api/studies/${studyId}/freezes/diff/export`)
        .query({ left: v1.body.data.snapshot_id, right: v2.body.data.snapshot_id });
      expect(exported.body.data.meta.limit).toBe(1000);
      expect(exported.headers['content-disposition']).toBe(
        `attachment; filename=study-${v1.body.data.snapshot_id}-${v2.body.data.snapshot_id}-diff.json`
      );

      const rollback = await request(app).post(`/api/studies/${studyId}/freezes/${v1.body.data.snapshot_id}/rollback`);
      expect(rollback.status).toBe(200);
      expect(rollback.body.data).toEqual({
        freeze_id: v1.body.data.snapshot_id,
        visits_restored: 1,
        activities_restored: 1,
        cells_restored: 0,
        concept_mappings_restored: 0,
        elements_restored: 0
      });

      const visits = await request(app).get(`/api/studies/${studyId}/visits`);
      expect(visits.body.data.map((visit: { name: string }) => visit.name)).toEqual(['Screening']);
      expect(visits.body.data[0].id).not.toBe(visitId);
    });

    it('should answer a duplicate label with 409', async () => {
      const studyId = await createStudy();
      await request(app).post(`/api/studies/${studyId}/freezes`).send({ version_label: 'baseline' });

      const response = await request(app).post(`/api/studies/${studyId}/freezes`).send({ version_label: 'baseline' });
      expect(response.status).toBe(409);
      expect(response.body.message).toBe('Version label already exists for this study');
    });

    it('should show a corrupt freeze and refuse to restore it', async () => {
      const studyId = await createStudy();
      const rows = await testDb.query<{ id: number }>(
        `INSERT INTO soa_freeze (study_id, version_label, created_at, snapshot_json)
         VALUES ($1, $2, $3, $4) RETURNING id`,
        [studyId, 'broken', new Date().toISOString(), 'nonsense']
      );
      const freezeId = rows[0].id;

      const shown = await request(app).get(`/api/studies/${studyId}/freezes/${freezeId}`);
      expect(shown.status).toBe(200);
      expect(shown.body.data.snapshot).toEqual({ error: 'corrupt snapshot' });

      const payload = await request(app).get(`/api/studies/${studyId}/freezes/${freezeId}/snapshot`);
      expect(payload.status).toBe(200);
      expect(payload.body.data).toEqual({ error: 'corrupt snapshot' });

      const preview = await request(app).get(`/api/studies/${studyId}/freezes/${freezeId}/rollback-preview`);
      expect(preview.status).toBe(422);

      const rollback = await request(app).post(`/api/studies/${studyId}/freezes/${freezeId}/rollback`);
      expect(rollback.status).toBe(422);
    });

    it('should require both sides of a diff', async () => {
      const studyId = await createStudy();
      const response = await request(app).get(`/api/studies/${studyId}/freezes/diff`).query({ left: 1 });
      expect(response.status).toBe(400);
    });
  });

  describe('audit', () => {
    it('should export the rollback ledger as CSV', async () => {
      const studyId = await createStudy();
      const v1 = await request(app).post(`/api/studies/${studyId}/freezes`).send({});
      await request(app).post(`/api/studies/${studyId}/freezes/${v1.body.data.snapshot_id}/rollback`);

      const response = await request(app).get(`/api/studies/${studyId}/audit/rollback/export.csv`);

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toMatch(/^text\/csv/);
      const lines = response.text.trim().split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[1]).toMatch(new RegExp(`^\\d+,${v1.body.data.snapshot_id},[^,]+,0,0,0,0,0$`));
    });

    it('should filter entity audit by type', async () => {
      const studyId = await createStudy();
      await createVisit(studyId, 'Day 1');

      const response = await request(app).get(`/api/studies/${studyId}/audit/entities`).query({ entityType: 'visit' });

      expect(response.status).toBe(200);
      expect(response.body.data).toHaveLength(1);
      expect(response.body.data[0]).toEqual(expect.objectContaining({ entity_type: 'visit', action: 'create' }));
    });
  });

  describe('concept catalog', () => {
    it('should report the catalog status', async () => {
      const response = await request(app).get('/api/concepts/status');
      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
    });
  });
});
