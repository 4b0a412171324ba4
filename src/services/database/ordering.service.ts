/**
 * Ordering Service
 *
 * Keeps `order_index` a dense 1..N sequence per study for every ordered
 * collection (visits, activities, arms, epochs, elements).
 */

import { pool, DbExecutor } from '../../config/database';
import { logger } from '../../config/logger';
import { BadRequestError } from '../../middleware/errorHandler.middleware';
import { OrderedEntityType, ReorderResult } from '../../types';
import { recordEntityAudit, recordReorderAudit } from './audit.service';

const ORDERED_TABLES: Record<OrderedEntityType, string> = {
  visit: 'visit',
  activity: 'activity',
  arm: 'arm',
  epoch: 'epoch',
  element: 'element'
};

interface OrderRow {
  id: number;
  order_index: number;
}

/**
 * Ids of a collection in their current order.
 */
export const getOrder = async (
  entityType: OrderedEntityType,
  studyId: number,
  executor: DbExecutor = pool
): Promise<number[]> => {
  const result = await executor.query<OrderRow>(
    `SELECT id, order_index FROM ${ORDERED_TABLES[entityType]} WHERE study_id = $1 ORDER BY order_index, id`,
    [studyId]
  );
  return result.rows.map(row => row.id);
};

/**
 * The order_index a newly appended row gets.
 */
export const nextOrderIndex = async (
  entityType: OrderedEntityType,
  studyId: number,
  executor: DbExecutor = pool
): Promise<number> => {
  const result = await executor.query<{ max_index: number | string | null }>(
    `SELECT MAX(order_index) AS max_index FROM ${ORDERED_TABLES[entityType]} WHERE study_id = $1`,
    [studyId]
  );
  const current = result.rows[0]?.max_index;
  return (current === null || current === undefined ? 0 : parseInt(String(current))) + 1;
};

const applyOrder = async (
  entityType: OrderedEntityType,
  order: number[],
  executor: DbExecutor
): Promise<void> => {
  const table = ORDERED_TABLES[entityType];
  for (let index = 0; index < order.length; index++) {
    await executor.query(`UPDATE ${table} SET order_index = $1 WHERE id = $2`, [index + 1, order[index]]);
  }
};

/**
 * Close the gaps a delete leaves behind.
 */
export const reindex = async (
  entityType: OrderedEntityType,
  studyId: number,
  executor: DbExecutor = pool
): Promise<void> => {
  const result = await executor.query<OrderRow>(
    `SELECT id, order_index FROM ${ORDERED_TABLES[entityType]} WHERE study_id = $1 ORDER BY order_index, id`,
    [studyId]
  );
  const table = ORDERED_TABLES[entityType];
  for (let index = 0; index < result.rows.length; index++) {
    const row = result.rows[index];
    if (row.order_index !== index + 1) {
      await executor.query(`UPDATE ${table} SET order_index = $1 WHERE id = $2`, [index + 1, row.id]);
    }
  }
};

/**
 * Assign positions 1..N from `order`. Ids of the collection missing from
 * `order` keep their relative order after the listed ones.
 */
export const reorder = async (
  entityType: OrderedEntityType,
  studyId: number,
  order: number[]
): Promise<ReorderResult> => {
  if (order.length === 0) {
    throw new BadRequestError('Order list required');
  }
  if (new Set(order).size !== order.length) {
    throw new BadRequestError(`Order contains duplicate ${entityType} ids`);
  }

  const result = await pool.transaction(async (tx) => {
    const oldOrder = await getOrder(entityType, studyId, tx);
    const existing = new Set(oldOrder);
    const invalid = order.filter(id => !existing.has(id));
    if (invalid.length > 0) {
      throw new BadRequestError(`Order contains invalid ${entityType} id`, { invalid });
    }

    const listed = new Set(order);
    const newOrder = [...order, ...oldOrder.filter(id => !listed.has(id))];
    await applyOrder(entityType, newOrder, tx);
    return { old_order: oldOrder, new_order: newOrder };
  });

  logger.info('Reordered collection', { studyId, entityType, count: result.new_order.length });

  await recordReorderAudit(studyId, entityType, result.old_order, result.new_order);
  await recordEntityAudit(studyId, entityType, 'reorder', null, { old_order: result.old_order }, { new_order: result.new_order });

  return result;
};
