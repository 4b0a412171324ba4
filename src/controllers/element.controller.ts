/**
 * Element Controller
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler.middleware';
import * as elementService from '../services/database/element.service';
import { toInt } from '../utils/request.util';

export const list = asyncHandler(async (req: Request, res: Response) => {
  const items = await elementService.listElements(toInt(req.params.studyId));
  res.json({ success: true, data: items });
});

export const get = asyncHandler(async (req: Request, res: Response) => {
  const item = await elementService.getElement(toInt(req.params.studyId), toInt(req.params.id));
  res.json({ success: true, data: item });
});

export const create = asyncHandler(async (req: Request, res: Response) => {
  const item = await elementService.createElement(toInt(req.params.studyId), req.body);
  res.status(201).json({ success: true, data: item });
});

export const update = asyncHandler(async (req: Request, res: Response) => {
  const item = await elementService.updateElement(toInt(req.params.studyId), toInt(req.params.id), req.body);
  res.json({ success: true, data: item });
});

export const remove = asyncHandler(async (req: Request, res: Response) => {
  const id = toInt(req.params.id);
  await elementService.deleteElement(toInt(req.params.studyId), id);
  res.json({ success: true, data: { deleted: true, id } });
});

export const reorder = asyncHandler(async (req: Request, res: Response) => {
  const result = await elementService.reorderElements(toInt(req.params.studyId), req.body.order);
  res.json({ success: true, data: result });
});

export default { list, get, create, update, remove, reorder };
