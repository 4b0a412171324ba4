/**
 * Study Routes
 *
 * API endpoints for studies and everything nested under one study:
 * - Study CRUD
 * - Visits, activities, matrix cells
 * - Arms, epochs, elements
 * - Freezes, diffs, rollbacks and the audit ledger
 */

import express from 'express';
import * as controller from '../controllers/study.controller';
import { validate, studySchemas, commonSchemas } from '../middleware/validation.middleware';
import visitRoutes from './visit.routes';
import activityRoutes from './activity.routes';
import matrixRoutes from './matrix.routes';
import armRoutes from './arm.routes';
import epochRoutes from './epoch.routes';
import elementRoutes from './element.routes';
import freezeRoutes from './freeze.routes';
import auditRoutes from './audit.routes';

const router = express.Router();

router.get('/', controller.list);
router.post('/', validate({ body: studySchemas.create }), controller.create);
router.get('/:studyId', validate({ params: commonSchemas.studyParam }), controller.get);
router.patch('/:studyId', validate({ params: commonSchemas.studyParam, body: studySchemas.update }), controller.update);

const studyParam = validate({ params: commonSchemas.studyParam });

router.use('/:studyId/visits', studyParam, visitRoutes);
router.use('/:studyId/activities', studyParam, activityRoutes);
router.use('/:studyId/matrix', studyParam, matrixRoutes);
router.use('/:studyId/arms', studyParam, armRoutes);
router.use('/:studyId/epochs', studyParam, epochRoutes);
router.use('/:studyId/elements', studyParam, elementRoutes);
router.use('/:studyId/freezes', studyParam, freezeRoutes);
router.use('/:studyId/audit', studyParam, auditRoutes);

export default router;
