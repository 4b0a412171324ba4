/**
 * Activity Controller
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler.middleware';
import * as activityService from '../services/database/activity.service';
import { toInt } from '../utils/request.util';

export const list = asyncHandler(async (req: Request, res: Response) => {
  const activities = await activityService.listActivities(toInt(req.params.studyId));
  res.json({ success: true, data: activities });
});

export const get = asyncHandler(async (req: Request, res: Response) => {
  const activity = await activityService.getActivity(toInt(req.params.studyId), toInt(req.params.id));
  res.json({ success: true, data: activity });
});

export const create = asyncHandler(async (req: Request, res: Response) => {
  const activity = await activityService.createActivity(toInt(req.params.studyId), req.body.name);
  res.status(201).json({ success: true, data: activity });
});

export const createBulk = asyncHandler(async (req: Request, res: Response) => {
  const result = await activityService.createActivitiesBulk(toInt(req.params.studyId), req.body.names);
  res.status(201).json({ success: true, data: result });
});

export const update = asyncHandler(async (req: Request, res: Response) => {
  const activity = await activityService.updateActivity(toInt(req.params.studyId), toInt(req.params.id), req.body);
  res.json({ success: true, data: activity });
});

export const remove = asyncHandler(async (req: Request, res: Response) => {
  const activityId = toInt(req.params.id);
  await activityService.deleteActivity(toInt(req.params.studyId), activityId);
  res.json({ success: true, data: { deleted: true, id: activityId } });
});

export const reorder = asyncHandler(async (req: Request, res: Response) => {
  const result = await activityService.reorderActivities(toInt(req.params.studyId), req.body.order);
  res.json({ success: true, data: result });
});

export const listConcepts = asyncHandler(async (req: Request, res: Response) => {
  const concepts = await activityService.listActivityConcepts(toInt(req.params.studyId), toInt(req.params.id));
  res.json({ success: true, data: concepts });
});

export const setConcepts = asyncHandler(async (req: Request, res: Response) => {
  const result = await activityService.setActivityConcepts(
    toInt(req.params.studyId),
    toInt(req.params.id),
    req.body.concept_codes
  );
  res.json({ success: true, data: result });
});

export default { list, get, create, createBulk, update, remove, reorder, listConcepts, setConcepts };
