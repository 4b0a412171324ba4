/**
 * TypeScript Type Definitions
 *
 * - Live entity rows (one study owns all of them)
 * - Snapshot payload and versioning results
 * - Audit ledger entries
 * - API response envelopes
 */

/**
 * ============================================================================
 * LIVE ENTITIES
 * ============================================================================
 */

export interface Study {
  id: number;
  name: string;
  study_code: string | null;
  label: string | null;
  description: string | null;
  created_at: string;
}

export interface Visit {
  id: number;
  study_id: number;
  name: string;
  raw_header: string | null;
  order_index: number;
  epoch_id: number | null;
}

export interface Activity {
  id: number;
  study_id: number;
  name: string;
  order_index: number;
  activity_uid: string;
}

/**
 * A materialized visit x activity intersection. Blank statuses are never stored.
 */
export interface Cell {
  id: number;
  study_id: number;
  visit_id: number;
  activity_id: number;
  status: string;
}

export interface ConceptMapping {
  id: number;
  activity_id: number;
  concept_code: string;
  /** Title as it was when the code was assigned */
  concept_title: string;
}

export interface Arm {
  id: number;
  study_id: number;
  name: string;
  label: string | null;
  description: string | null;
  type: string | null;
  data_origin_type: string | null;
  order_index: number;
  arm_uid: string;
}

export interface Epoch {
  id: number;
  study_id: number;
  name: string;
  order_index: number;
  epoch_seq: number;
  epoch_label: string | null;
  epoch_description: string | null;
}

export interface Element {
  id: number;
  study_id: number;
  element_uid: string;
  name: string;
  label: string | null;
  description: string | null;
  testrl: string | null;
  teenrl: string | null;
  order_index: number;
  created_at: string;
}

export type OrderedEntityType = 'visit' | 'activity' | 'arm' | 'epoch' | 'element';

export interface ReorderResult {
  old_order: number[];
  new_order: number[];
}

export interface Matrix {
  visits: Visit[];
  activities: Activity[];
  cells: Cell[];
}

/**
 * ============================================================================
 * SNAPSHOTS
 * ============================================================================
 */

export const SNAPSHOT_SCHEMA_VERSION = 2;

export type SnapshotVisit = Omit<Visit, 'study_id'>;
export type SnapshotActivity = Omit<Activity, 'study_id'>;
export type SnapshotCell = Pick<Cell, 'visit_id' | 'activity_id' | 'status'>;
export type SnapshotArm = Omit<Arm, 'study_id'>;
export type SnapshotEpoch = Omit<Epoch, 'study_id'>;
export type SnapshotElement = Omit<Element, 'study_id'>;

export interface SnapshotConcept {
  code: string;
  title: string;
}

/**
 * Complete, self-contained state of one study at freeze time. Ids are the
 * ones that existed at capture time; they may no longer exist live.
 */
export interface SnapshotPayload {
  schema_version: number;
  study_id: number;
  study_name: string;
  study_code: string | null;
  study_label: string | null;
  study_description: string | null;
  version_label: string;
  frozen_at: string;
  visits: SnapshotVisit[];
  activities: SnapshotActivity[];
  cells: SnapshotCell[];
  arms: SnapshotArm[];
  epochs: SnapshotEpoch[];
  elements: SnapshotElement[];
  /** Keyed by captured activity id */
  activity_concepts: Record<string, SnapshotConcept[]>;
}

export const CORRUPT_SNAPSHOT_MARKER = 'corrupt snapshot';

export interface CorruptSnapshot {
  error: typeof CORRUPT_SNAPSHOT_MARKER;
}

export type LoadedSnapshot = SnapshotPayload | CorruptSnapshot;

export interface FreezeSummary {
  id: number;
  version_label: string;
  created_at: string;
}

export interface FreezeRecord extends FreezeSummary {
  snapshot: LoadedSnapshot;
}

export interface FreezeResult {
  snapshot_id: number;
  label: string;
}

/**
 * ============================================================================
 * DIFF
 * ============================================================================
 */

export interface SnapshotRef {
  id: number;
  label: string;
  created_at: string;
  error?: typeof CORRUPT_SNAPSHOT_MARKER;
}

export interface CellStatusChange {
  visit_id: number;
  activity_id: number;
  old_status: string;
  new_status: string;
}

export interface ConceptTitleChange {
  code: string;
  old_title: string;
  new_title: string;
}

export interface ConceptChange {
  activity_id: number;
  added: string[];
  removed: string[];
  title_changes: ConceptTitleChange[];
}

export interface AddRemoveMeta {
  added_total: number;
  removed_total: number;
  added_truncated: boolean;
  removed_truncated: boolean;
}

export interface CellDiffMeta extends AddRemoveMeta {
  changed_total: number;
  changed_truncated: boolean;
}

export interface DiffMeta {
  limit: number | null;
  visits: AddRemoveMeta;
  activities: AddRemoveMeta;
  cells: CellDiffMeta;
  concepts: {
    changes_total: number;
    changes_truncated: boolean;
  };
}

export interface SnapshotDiff {
  visits: { added: SnapshotVisit[]; removed: SnapshotVisit[] };
  activities: { added: SnapshotActivity[]; removed: SnapshotActivity[] };
  cells: { added: SnapshotCell[]; removed: SnapshotCell[]; changed: CellStatusChange[] };
  concepts: ConceptChange[];
  meta: DiffMeta;
}

export interface DiffResult extends SnapshotDiff {
  left: SnapshotRef;
  right: SnapshotRef;
}

/**
 * ============================================================================
 * ROLLBACK
 * ============================================================================
 */

export interface RestoreCounts {
  visits_restored: number;
  activities_restored: number;
  cells_restored: number;
  concept_mappings_restored: number;
  elements_restored: number;
}

export interface RollbackResult extends RestoreCounts {
  freeze_id: number;
}

export interface RollbackPreview {
  freeze_id: number;
  version_label: string;
  visits_to_restore: number;
  activities_to_restore: number;
  cells_to_restore: number;
  concept_mappings_to_restore: number;
  elements_to_restore: number;
}

/**
 * ============================================================================
 * AUDIT LEDGER
 * ============================================================================
 */

export type AuditEntityType = OrderedEntityType | 'study' | 'cell' | 'concept';

export type AuditAction = 'create' | 'update' | 'delete' | 'reorder';

export interface EntityAuditEntry {
  id: number;
  study_id: number;
  entity_type: AuditEntityType;
  entity_id: number | null;
  action: AuditAction;
  before: unknown;
  after: unknown;
  performed_at: string;
}

export interface RollbackAuditEntry {
  id: number;
  study_id: number;
  freeze_id: number;
  performed_at: string;
  visits_restored: number;
  activities_restored: number;
  cells_restored: number;
  concepts_restored: number;
  elements_restored: number;
}

export interface ReorderAuditEntry {
  id: number;
  study_id: number;
  entity_type: OrderedEntityType;
  old_order: number[];
  new_order: number[];
  performed_at: string;
}

/**
 * ============================================================================
 * API
 * ============================================================================
 */

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
}
