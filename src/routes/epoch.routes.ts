/**
 * Epoch Routes
 *
 * Mounted under /api/studies/:studyId/epochs
 */

import express from 'express';
import * as controller from '../controllers/epoch.controller';
import { validate, epochSchemas, commonSchemas } from '../middleware/validation.middleware';

const router = express.Router({ mergeParams: true });

router.get('/', controller.list);
router.post('/', validate({ body: epochSchemas.create }), controller.create);
router.post('/reorder', validate({ body: commonSchemas.reorder }), controller.reorder);

router.get('/:id', validate({ params: commonSchemas.entityParam }), controller.get);
router.patch('/:id', validate({ params: commonSchemas.entityParam, body: epochSchemas.update }), controller.update);
router.delete('/:id', validate({ params: commonSchemas.entityParam }), controller.remove);

export default router;
