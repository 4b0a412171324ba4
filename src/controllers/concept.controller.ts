/**
 * Concept Catalog Controller
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler.middleware';
import * as catalog from '../services/concepts/concept-catalog.service';

export const list = asyncHandler(async (req: Request, res: Response) => {
  const concepts = await catalog.fetchBiomedicalConcepts();
  res.json({ success: true, data: concepts });
});

export const status = asyncHandler(async (req: Request, res: Response) => {
  res.json({ success: true, data: catalog.getCatalogStatus() });
});

export const refresh = asyncHandler(async (req: Request, res: Response) => {
  const result = await catalog.refreshConcepts();
  res.json({ success: true, data: result });
});

export default { list, status, refresh };
