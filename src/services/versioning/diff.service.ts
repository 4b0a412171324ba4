/**
 * Diff Service
 *
 * Structural comparison of two snapshots of the same study.
 *
 * Visits and activities are compared by presence of their captured id only;
 * a renamed visit with the same id is not reported. Cells are keyed by
 * (visit_id, activity_id). Concepts are compared per activity id.
 *
 * Each reported list is cut at `limit` entries while `meta` keeps the exact
 * totals. A null or non-positive limit means no cut.
 */

import { config } from '../../config/environment';
import { logger } from '../../config/logger';
import {
  AddRemoveMeta,
  CellStatusChange,
  ConceptChange,
  ConceptTitleChange,
  DiffResult,
  FreezeRecord,
  SnapshotCell,
  SnapshotConcept,
  SnapshotDiff,
  SnapshotPayload,
  SnapshotRef
} from '../../types';
import { getFreeze, isCorruptSnapshot } from './snapshot-repository.service';

/**
 * The parts of a payload a diff looks at. A corrupt snapshot compares as
 * empty.
 */
export type DiffablePayload = Pick<SnapshotPayload, 'visits' | 'activities' | 'cells' | 'activity_concepts'>;

const EMPTY_PAYLOAD: DiffablePayload = { visits: [], activities: [], cells: [], activity_concepts: {} };

export type DiffMode = 'interactive' | 'export';

interface Truncated<T> {
  items: T[];
  truncated: boolean;
}

const truncate = <T>(items: T[], limit: number | null): Truncated<T> => {
  if (limit !== null && items.length > limit) {
    return { items: items.slice(0, limit), truncated: true };
  }
  return { items, truncated: false };
};

const normalizeLimit = (limit: number | null | undefined): number | null =>
  limit === null || limit === undefined || limit <= 0 ? null : limit;

/**
 * Effective limit for a diff request: `full` lifts it, an explicit limit
 * wins over the mode default.
 */
export const resolveDiffLimit = (options: { limit?: number | null; full?: boolean; mode: DiffMode }): number | null => {
  if (options.full) return null;
  if (options.limit !== undefined && options.limit !== null) return normalizeLimit(options.limit);
  return options.mode === 'export' ? config.versioning.diffExportLimit : config.versioning.diffDefaultLimit;
};

const presenceDiff = <T extends { id: number }>(left: T[], right: T[]): { added: T[]; removed: T[] } => {
  const leftIds = new Set(left.map(item => item.id));
  const rightIds = new Set(right.map(item => item.id));
  return {
    added: right.filter(item => !leftIds.has(item.id)),
    removed: left.filter(item => !rightIds.has(item.id))
  };
};

const cellKey = (cell: SnapshotCell): string => `${cell.visit_id}:${cell.activity_id}`;

const diffCells = (left: SnapshotCell[], right: SnapshotCell[]) => {
  const leftCells = new Map(left.map(cell => [cellKey(cell), cell]));
  const rightCells = new Map(right.map(cell => [cellKey(cell), cell]));

  const added = right.filter(cell => !leftCells.has(cellKey(cell)));
  const removed = left.filter(cell => !rightCells.has(cellKey(cell)));
  const changed: CellStatusChange[] = [];
  for (const cell of right) {
    const previous = leftCells.get(cellKey(cell));
    if (previous && previous.status !== cell.status) {
      changed.push({
        visit_id: cell.visit_id,
        activity_id: cell.activity_id,
        old_status: previous.status,
        new_status: cell.status
      });
    }
  }
  return { added, removed, changed };
};

const sortCodes = (codes: Iterable<string>): string[] => [...codes].sort();

const diffConcepts = (
  left: Record<string, SnapshotConcept[]>,
  right: Record<string, SnapshotConcept[]>
): ConceptChange[] => {
  const activityIds = new Set([...Object.keys(left), ...Object.keys(right)]);
  const changes: ConceptChange[] = [];

  for (const key of activityIds) {
    const leftTitles = new Map((left[key] ?? []).map(concept => [concept.code, concept.title]));
    const rightTitles = new Map((right[key] ?? []).map(concept => [concept.code, concept.title]));

    const added = sortCodes([...rightTitles.keys()].filter(code => !leftTitles.has(code)));
    const removed = sortCodes([...leftTitles.keys()].filter(code => !rightTitles.has(code)));
    const titleChanges: ConceptTitleChange[] = [];
    for (const code of sortCodes([...leftTitles.keys()].filter(code => rightTitles.has(code)))) {
      const oldTitle = leftTitles.get(code);
      const newTitle = rightTitles.get(code);
      if (oldTitle !== undefined && newTitle !== undefined && oldTitle !== newTitle) {
        titleChanges.push({ code, old_title: oldTitle, new_title: newTitle });
      }
    }

    if (added.length > 0 || removed.length > 0 || titleChanges.length > 0) {
      changes.push({ activity_id: parseInt(key), added, removed, title_changes: titleChanges });
    }
  }

  return changes.sort((a, b) => a.activity_id - b.activity_id);
};

const addRemoveMeta = (
  added: Truncated<unknown>,
  removed: Truncated<unknown>,
  totals: { added: number; removed: number }
): AddRemoveMeta => ({
  added_total: totals.added,
  removed_total: totals.removed,
  added_truncated: added.truncated,
  removed_truncated: removed.truncated
});

/**
 * Compare two payloads. Pure: no storage access.
 */
export const computeSnapshotDiff = (
  left: DiffablePayload,
  right: DiffablePayload,
  limit?: number | null
): SnapshotDiff => {
  const effectiveLimit = normalizeLimit(limit);

  const visits = presenceDiff(left.visits, right.visits);
  const activities = presenceDiff(left.activities, right.activities);
  const cells = diffCells(left.cells, right.cells);
  const concepts = diffConcepts(left.activity_concepts, right.activity_concepts);

  const visitsAdded = truncate(visits.added, effectiveLimit);
  const visitsRemoved = truncate(visits.removed, effectiveLimit);
  const activitiesAdded = truncate(activities.added, effectiveLimit);
  const activitiesRemoved = truncate(activities.removed, effectiveLimit);
  const cellsAdded = truncate(cells.added, effectiveLimit);
  const cellsRemoved = truncate(cells.removed, effectiveLimit);
  const cellsChanged = truncate(cells.changed, effectiveLimit);
  const conceptChanges = truncate(concepts, effectiveLimit);

  return {
    visits: { added: visitsAdded.items, removed: visitsRemoved.items },
    activities: { added: activitiesAdded.items, removed: activitiesRemoved.items },
    cells: { added: cellsAdded.items, removed: cellsRemoved.items, changed: cellsChanged.items },
    concepts: conceptChanges.items,
    meta: {
      limit: effectiveLimit,
      visits: addRemoveMeta(visitsAdded, visitsRemoved, { added: visits.added.length, removed: visits.removed.length }),
      activities: addRemoveMeta(activitiesAdded, activitiesRemoved, {
        added: activities.added.length,
        removed: activities.removed.length
      }),
      cells: {
        ...addRemoveMeta(cellsAdded, cellsRemoved, { added: cells.added.length, removed: cells.removed.length }),
        changed_total: cells.changed.length,
        changed_truncated: cellsChanged.truncated
      },
      concepts: {
        changes_total: concepts.length,
        changes_truncated: conceptChanges.truncated
      }
    }
  };
};

/**
 * True when the two snapshots did not differ at all (totals, not the
 * possibly truncated lists).
 */
export const isDiffEmpty = (diff: SnapshotDiff): boolean => {
  const { meta } = diff;
  return (
    meta.visits.added_total === 0 &&
    meta.visits.removed_total === 0 &&
    meta.activities.added_total === 0 &&
    meta.activities.removed_total === 0 &&
    meta.cells.added_total === 0 &&
    meta.cells.removed_total === 0 &&
    meta.cells.changed_total === 0 &&
    meta.concepts.changes_total === 0
  );
};

const toRef = (freeze: FreezeRecord): SnapshotRef => {
  const ref: SnapshotRef = { id: freeze.id, label: freeze.version_label, created_at: freeze.created_at };
  if (isCorruptSnapshot(freeze.snapshot)) {
    ref.error = freeze.snapshot.error;
  }
  return ref;
};

const diffable = (freeze: FreezeRecord): DiffablePayload =>
  isCorruptSnapshot(freeze.snapshot) ? EMPTY_PAYLOAD : freeze.snapshot;

/**
 * Diff two freezes of a study. Either id not belonging to the study is
 * NotFound.
 */
export const diffFreezes = async (
  studyId: number,
  leftId: number,
  rightId: number,
  limit: number | null
): Promise<DiffResult> => {
  const left = await getFreeze(studyId, leftId);
  const right = await getFreeze(studyId, rightId);

  const diff = computeSnapshotDiff(diffable(left), diffable(right), limit);
  logger.info('Computed freeze diff', {
    studyId,
    leftId,
    rightId,
    limit: diff.meta.limit,
    empty: isDiffEmpty(diff)
  });

  return { left: toRef(left), right: toRef(right), ...diff };
};
