/**
 * Matrix Controller
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler.middleware';
import * as matrixService from '../services/database/matrix.service';
import { toInt } from '../utils/request.util';

export const get = asyncHandler(async (req: Request, res: Response) => {
  const matrix = await matrixService.getMatrix(toInt(req.params.studyId));
  res.json({ success: true, data: matrix });
});

export const setCell = asyncHandler(async (req: Request, res: Response) => {
  const { visit_id, activity_id, status } = req.body;
  const result = await matrixService.setCell(toInt(req.params.studyId), visit_id, activity_id, status);
  res.json({ success: true, data: result });
});

export const toggleCell = asyncHandler(async (req: Request, res: Response) => {
  const { visit_id, activity_id } = req.body;
  const result = await matrixService.toggleCell(toInt(req.params.studyId), visit_id, activity_id);
  res.json({ success: true, data: result });
});

export const importMatrix = asyncHandler(async (req: Request, res: Response) => {
  const result = await matrixService.importMatrix(toInt(req.params.studyId), req.body);
  res.status(201).json({ success: true, data: result });
});

export default { get, setCell, toggleCell, importMatrix };
