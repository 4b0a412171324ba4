/**
 * Activity Routes
 *
 * Mounted under /api/studies/:studyId/activities
 */

import express from 'express';
import * as controller from '../controllers/activity.controller';
import { validate, activitySchemas, commonSchemas } from '../middleware/validation.middleware';

const router = express.Router({ mergeParams: true });

router.get('/', controller.list);
router.post('/', validate({ body: activitySchemas.create }), controller.create);
router.post('/bulk', validate({ body: activitySchemas.bulk }), controller.createBulk);
router.post('/reorder', validate({ body: commonSchemas.reorder }), controller.reorder);

router.get('/:id', validate({ params: commonSchemas.entityParam }), controller.get);
router.patch('/:id', validate({ params: commonSchemas.entityParam, body: activitySchemas.update }), controller.update);
router.delete('/:id', validate({ params: commonSchemas.entityParam }), controller.remove);

// Concept mappings
router.get('/:id/concepts', validate({ params: commonSchemas.entityParam }), controller.listConcepts);
router.put('/:id/concepts', validate({ params: commonSchemas.entityParam, body: activitySchemas.concepts }), controller.setConcepts);

export default router;
