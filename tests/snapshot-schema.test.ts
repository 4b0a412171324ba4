/**
 * Snapshot payload normalization tests
 */

import { describe, it, expect } from '@jest/globals';
import { normalizeSnapshotPayload } from '../src/services/versioning/snapshot-schema';
import { SNAPSHOT_SCHEMA_VERSION } from '../src/types';

describe('normalizeSnapshotPayload', () => {
  it('should read a current payload from JSON text', () => {
    const payload = normalizeSnapshotPayload(JSON.stringify({
      schema_version: 2,
      study_id: 4,
      study_name: 'Current',
      version_label: 'v3',
      frozen_at: '2026-03-01T10:00:00.000Z',
      visits: [{ id: 1, name: 'Day 1', raw_header: 'Day 1', order_index: 1, epoch_id: 2 }],
      activities: [{ id: 7, name: 'ECG', order_index: 1, activity_uid: 'Activity_1' }],
      cells: [{ visit_id: 1, activity_id: 7, status: 'X' }],
      arms: [],
      epochs: [],
      elements: [],
      activity_concepts: { '7': [{ code: 'C1', title: 'One' }] }
    }));

    expect(payload).not.toBeNull();
    expect(payload?.study_id).toBe(4);
    expect(payload?.version_label).toBe('v3');
    expect(payload?.visits).toEqual([{ id: 1, name: 'Day 1', raw_header: 'Day 1', order_index: 1, epoch_id: 2 }]);
    expect(payload?.activity_concepts).toEqual({ '7': [{ code: 'C1', title: 'One' }] });
  });

  it('should upgrade a schema version 1 payload', () => {
    const payload = normalizeSnapshotPayload({
      soa_id: '12',
      soa_name: 'Legacy Study',
      visits: [{ id: '3', name: 'Screening', order_index: '1' }],
      activities: [{ id: 4, name: 'Consent', order_index: 1 }],
      cells: [
        { visit_id: 3, activity_id: 4, status: ' X ' },
        { visit_id: 3, activity_id: 4, status: '   ' }
      ],
      activity_concepts: {
        '4': ['C10', { concept_code: 'C20', concept_title: 'Twenty' }, 'C10'],
        notAnId: ['C30']
      }
    });

    expect(payload).toEqual({
      schema_version: SNAPSHOT_SCHEMA_VERSION,
      study_id: 12,
      study_name: 'Legacy Study',
      study_code: null,
      study_label: null,
      study_description: null,
      version_label: '',
      frozen_at: '',
      visits: [{ id: 3, name: 'Screening', raw_header: null, order_index: 1, epoch_id: null }],
      activities: [{ id: 4, name: 'Consent', order_index: 1, activity_uid: '' }],
      cells: [{ visit_id: 3, activity_id: 4, status: 'X' }],
      arms: [],
      epochs: [],
      elements: [],
      activity_concepts: {
        '4': [
          { code: 'C10', title: '' },
          { code: 'C20', title: 'Twenty' }
        ]
      }
    });
  });

  it('should drop malformed collection entries', () => {
    const payload = normalizeSnapshotPayload({
      study_id: 1,
      visits: [{ name: 'No id' }, 'garbage', { id: 2, name: 'Kept' }],
      activities: 'not a list'
    });

    expect(payload?.visits.map(visit => visit.id)).toEqual([2]);
    expect(payload?.activities).toEqual([]);
  });

  it.each([
    ['invalid JSON text', '{"study_id": '],
    ['a list', [1, 2, 3]],
    ['null', null],
    ['a payload without a study id', { study_name: 'Nameless', visits: [] }]
  ])('should report %s as corrupt', (_label, raw) => {
    expect(normalizeSnapshotPayload(raw)).toBeNull();
  });
});
