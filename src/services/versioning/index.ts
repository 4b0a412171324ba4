/**
 * Versioning Services Index
 *
 * Freeze, snapshot storage, diff and rollback of a study's schedule.
 */

export * from './snapshot-schema';
export * from './snapshot-repository.service';
export * from './freeze.service';
export * from './diff.service';
export * from './rollback.service';
