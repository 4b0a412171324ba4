/**
 * Per-study version lock
 *
 * Freeze and Rollback touch the study's study_version_lock row first thing
 * in their transaction. The row lock is held until commit, so two of them
 * on the same study run one after the other. The first use of a study
 * creates the row; a concurrent first use waits on the conflict instead of
 * failing.
 */

import { DbExecutor } from '../../config/database';
import { toISOTimestamp } from '../../utils/date.util';

export const acquireVersionLock = async (tx: DbExecutor, studyId: number): Promise<void> => {
  await tx.query(
    `INSERT INTO study_version_lock (study_id, locked_at) VALUES ($1, $2)
     ON CONFLICT (study_id) DO UPDATE SET locked_at = $2`,
    [studyId, toISOTimestamp()]
  );
};
