/**
 * Study Controller
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler.middleware';
import * as studyService from '../services/database/study.service';
import { toInt } from '../utils/request.util';

export const list = asyncHandler(async (req: Request, res: Response) => {
  const studies = await studyService.listStudies();
  res.json({ success: true, data: studies });
});

export const get = asyncHandler(async (req: Request, res: Response) => {
  const study = await studyService.getStudy(toInt(req.params.studyId));
  res.json({ success: true, data: study });
});

export const create = asyncHandler(async (req: Request, res: Response) => {
  const study = await studyService.createStudy(req.body);
  res.status(201).json({ success: true, data: study });
});

export const update = asyncHandler(async (req: Request, res: Response) => {
  const study = await studyService.updateStudy(toInt(req.params.studyId), req.body);
  res.json({ success: true, data: study });
});

export default { list, get, create, update };
