/**
 * Concept Catalog Routes
 */

import express from 'express';
import * as controller from '../controllers/concept.controller';

const router = express.Router();

router.get('/', controller.list);
router.get('/status', controller.status);
router.post('/refresh', controller.refresh);

export default router;
