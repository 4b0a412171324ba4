/**
 * Matrix Routes
 *
 * Mounted under /api/studies/:studyId/matrix
 */

import express from 'express';
import * as controller from '../controllers/matrix.controller';
import { validate, matrixSchemas } from '../middleware/validation.middleware';

const router = express.Router({ mergeParams: true });

router.get('/', controller.get);
router.put('/cells', validate({ body: matrixSchemas.setCell }), controller.setCell);
router.post('/cells/toggle', validate({ body: matrixSchemas.toggleCell }), controller.toggleCell);
router.post('/import', validate({ body: matrixSchemas.import }), controller.importMatrix);

export default router;
