/**
 * Audit Routes
 *
 * Mounted under /api/studies/:studyId/audit
 */

import express from 'express';
import * as controller from '../controllers/audit.controller';
import { validate, auditSchemas } from '../middleware/validation.middleware';

const router = express.Router({ mergeParams: true });

router.get('/rollback', controller.getRollbackAudit);
router.get('/rollback/export.csv', controller.exportRollbackCsv);
router.get('/reorder', controller.getReorderAudit);
router.get('/reorder/export.csv', controller.exportReorderCsv);
router.get('/entities', validate({ query: auditSchemas.entityQuery }), controller.getEntityAudit);

export default router;
