/**
 * Snapshot payload schema
 *
 * Every stored payload goes through normalizeSnapshotPayload() once, at load
 * time. Older payloads (schema version 1) used soa_id/soa_name, had no arms,
 * epochs or elements, and could carry ids as numeric strings; they come out
 * in the current shape. Anything that cannot be read as a payload for some
 * study is reported as corrupt (null).
 */

import Joi from 'joi';
import {
  SNAPSHOT_SCHEMA_VERSION,
  SnapshotActivity,
  SnapshotArm,
  SnapshotCell,
  SnapshotConcept,
  SnapshotElement,
  SnapshotEpoch,
  SnapshotPayload,
  SnapshotVisit
} from '../../types';

const itemOptions: Joi.ValidationOptions = {
  convert: true,
  abortEarly: true,
  allowUnknown: true,
  stripUnknown: true
};

const id = Joi.number().integer();
const text = Joi.string().allow('').empty(null);
const nullableText = Joi.string().allow('', null).default(null);
const position = Joi.number().integer().empty(null).default(0);

const visitSchema = Joi.object<SnapshotVisit>({
  id: id.required(),
  name: text.default(''),
  raw_header: nullableText,
  order_index: position,
  epoch_id: id.allow(null).default(null)
});

const activitySchema = Joi.object<SnapshotActivity>({
  id: id.required(),
  name: text.default(''),
  order_index: position,
  activity_uid: text.default('')
});

const cellSchema = Joi.object<SnapshotCell>({
  visit_id: id.required(),
  activity_id: id.required(),
  status: Joi.string().trim().required()
});

const armSchema = Joi.object<SnapshotArm>({
  id: id.required(),
  name: text.default(''),
  label: nullableText,
  description: nullableText,
  type: nullableText,
  data_origin_type: nullableText,
  order_index: position,
  arm_uid: text.default('')
});

const epochSchema = Joi.object<SnapshotEpoch>({
  id: id.required(),
  name: text.default(''),
  order_index: position,
  epoch_seq: Joi.number().integer().empty(null).default(0),
  epoch_label: nullableText,
  epoch_description: nullableText
});

const elementSchema = Joi.object<SnapshotElement>({
  id: id.required(),
  element_uid: text.default(''),
  name: text.default(''),
  label: nullableText,
  description: nullableText,
  testrl: nullableText,
  teenrl: nullableText,
  order_index: position,
  created_at: text.default('')
});

// {code, title}, the older {concept_code, concept_title}, or a bare code
const conceptSchema = Joi.alternatives().try(
  Joi.object<SnapshotConcept>({
    code: Joi.string().trim().required(),
    title: text.default('')
  })
    .rename('concept_code', 'code', { ignoreUndefined: true })
    .rename('concept_title', 'title', { ignoreUndefined: true }),
  Joi.string().trim().required()
);

const headerSchema = Joi.object<{
  schema_version: number;
  study_id: number;
  study_name: string;
  study_code: string | null;
  study_label: string | null;
  study_description: string | null;
  version_label: string;
  frozen_at: string;
}>({
  schema_version: Joi.number().integer().default(1),
  study_id: id.required(),
  study_name: text.default(''),
  study_code: nullableText,
  study_label: nullableText,
  study_description: nullableText,
  version_label: text.default(''),
  frozen_at: text.default('')
})
  .rename('soa_id', 'study_id', { ignoreUndefined: true })
  .rename('soa_name', 'study_name', { ignoreUndefined: true });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Validate every entry of a collection, dropping the ones that do not fit.
 */
const normalizeList = <T>(raw: unknown, schema: Joi.ObjectSchema<T>): T[] => {
  if (!Array.isArray(raw)) return [];
  const items: T[] = [];
  for (const entry of raw) {
    const { error, value } = schema.validate(entry, itemOptions);
    if (!error) {
      items.push(value);
    }
  }
  return items;
};

const normalizeConcepts = (raw: unknown): Record<string, SnapshotConcept[]> => {
  if (!isRecord(raw)) return {};

  const concepts: Record<string, SnapshotConcept[]> = {};
  for (const [key, entries] of Object.entries(raw)) {
    const activityKey = key.trim();
    if (!/^\d+$/.test(activityKey) || !Array.isArray(entries)) continue;

    const seen = new Set<string>();
    const list: SnapshotConcept[] = [];
    for (const entry of entries) {
      const { error, value } = conceptSchema.validate(entry, itemOptions);
      if (error) continue;
      const concept: SnapshotConcept | null =
        typeof value === 'string'
          ? { code: value, title: '' }
          : isRecord(value) && typeof value.code === 'string'
            ? { code: value.code, title: typeof value.title === 'string' ? value.title : '' }
            : null;
      if (!concept || seen.has(concept.code)) continue;
      seen.add(concept.code);
      list.push(concept);
    }
    concepts[String(parseInt(activityKey))] = list;
  }
  return concepts;
};

/**
 * Turn a stored payload (JSON text or parsed value) into the current
 * snapshot schema. Returns null when the payload is corrupt.
 */
export const normalizeSnapshotPayload = (raw: unknown): SnapshotPayload | null => {
  let data = raw;
  if (typeof raw === 'string') {
    try {
      data = JSON.parse(raw);
    } catch {
      return null;
    }
  }
  if (!isRecord(data)) {
    return null;
  }

  const { error, value: header } = headerSchema.validate(data, itemOptions);
  if (error) {
    return null;
  }

  return {
    ...header,
    schema_version: SNAPSHOT_SCHEMA_VERSION,
    visits: normalizeList(data.visits, visitSchema),
    activities: normalizeList(data.activities, activitySchema),
    cells: normalizeList(data.cells, cellSchema).filter(cell => cell.status !== ''),
    arms: normalizeList(data.arms, armSchema),
    epochs: normalizeList(data.epochs, epochSchema),
    elements: normalizeList(data.elements, elementSchema),
    activity_concepts: normalizeConcepts(data.activity_concepts)
  };
};
