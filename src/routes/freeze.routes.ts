/**
 * Freeze Routes
 *
 * Mounted under /api/studies/:studyId/freezes
 */

import express from 'express';
import * as controller from '../controllers/freeze.controller';
import { validate, freezeSchemas, commonSchemas } from '../middleware/validation.middleware';
import { versioningRateLimiter } from '../middleware/rateLimiter.middleware';

const router = express.Router({ mergeParams: true });

router.get('/', controller.list);
router.post('/', versioningRateLimiter, validate({ body: freezeSchemas.create }), controller.create);

// Diff (registered before /:freezeId)
router.get('/diff', validate({ query: freezeSchemas.diff }), controller.diff);
router.get('/diff/export', validate({ query: freezeSchemas.diff }), controller.exportDiff);

router.get('/:freezeId', validate({ params: commonSchemas.freezeParam }), controller.get);
router.get('/:freezeId/snapshot', validate({ params: commonSchemas.freezeParam }), controller.getSnapshot);
router.get('/:freezeId/rollback-preview', validate({ params: commonSchemas.freezeParam }), controller.rollbackPreview);
router.post('/:freezeId/rollback', versioningRateLimiter, validate({ params: commonSchemas.freezeParam }), controller.rollback);

export default router;
