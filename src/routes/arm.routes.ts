/**
 * Arm Routes
 *
 * Mounted under /api/studies/:studyId/arms
 */

import express from 'express';
import * as controller from '../controllers/arm.controller';
import { validate, armSchemas, commonSchemas } from '../middleware/validation.middleware';

const router = express.Router({ mergeParams: true });

router.get('/', controller.list);
router.post('/', validate({ body: armSchemas.create }), controller.create);
router.post('/reorder', validate({ body: commonSchemas.reorder }), controller.reorder);

router.get('/:id', validate({ params: commonSchemas.entityParam }), controller.get);
router.patch('/:id', validate({ params: commonSchemas.entityParam, body: armSchemas.update }), controller.update);
router.delete('/:id', validate({ params: commonSchemas.entityParam }), controller.remove);

export default router;
