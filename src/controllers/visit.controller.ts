/**
 * Visit Controller
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler.middleware';
import * as visitService from '../services/database/visit.service';
import { toInt } from '../utils/request.util';

export const list = asyncHandler(async (req: Request, res: Response) => {
  const visits = await visitService.listVisits(toInt(req.params.studyId));
  res.json({ success: true, data: visits });
});

export const get = asyncHandler(async (req: Request, res: Response) => {
  const visit = await visitService.getVisit(toInt(req.params.studyId), toInt(req.params.id));
  res.json({ success: true, data: visit });
});

export const create = asyncHandler(async (req: Request, res: Response) => {
  const visit = await visitService.createVisit(toInt(req.params.studyId), req.body);
  res.status(201).json({ success: true, data: visit });
});

export const update = asyncHandler(async (req: Request, res: Response) => {
  const visit = await visitService.updateVisit(toInt(req.params.studyId), toInt(req.params.id), req.body);
  res.json({ success: true, data: visit });
});

export const remove = asyncHandler(async (req: Request, res: Response) => {
  const visitId = toInt(req.params.id);
  await visitService.deleteVisit(toInt(req.params.studyId), visitId);
  res.json({ success: true, data: { deleted: true, id: visitId } });
});

export const reorder = asyncHandler(async (req: Request, res: Response) => {
  const result = await visitService.reorderVisits(toInt(req.params.studyId), req.body.order);
  res.json({ success: true, data: result });
});

export default { list, get, create, update, remove, reorder };
