/**
 * Freeze Controller
 *
 * Freezes, diffs between freezes and rollbacks for one study.
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler.middleware';
import * as versioning from '../services/versioning';
import { DiffMode } from '../services/versioning/diff.service';
import { optionalInt, toInt } from '../utils/request.util';

export const create = asyncHandler(async (req: Request, res: Response) => {
  const result = await versioning.createFreeze(toInt(req.params.studyId), req.body.version_label);
  res.status(201).json({ success: true, data: result });
});

export const list = asyncHandler(async (req: Request, res: Response) => {
  const freezes = await versioning.listFreezes(toInt(req.params.studyId));
  res.json({ success: true, data: freezes });
});

export const get = asyncHandler(async (req: Request, res: Response) => {
  const freeze = await versioning.getFreeze(toInt(req.params.studyId), toInt(req.params.freezeId));
  res.json({ success: true, data: freeze });
});

export const getSnapshot = asyncHandler(async (req: Request, res: Response) => {
  const snapshot = await versioning.getSnapshotPayload(toInt(req.params.studyId), toInt(req.params.freezeId));
  res.json({ success: true, data: snapshot });
});

const diffWith = (mode: DiffMode) =>
  asyncHandler(async (req: Request, res: Response) => {
    const limit = versioning.resolveDiffLimit({
      limit: optionalInt(req.query.limit),
      full: optionalInt(req.query.full) === 1,
      mode
    });
    const diff = await versioning.diffFreezes(
      toInt(req.params.studyId),
      toInt(req.query.left),
      toInt(req.query.right),
      limit
    );

    if (mode === 'export') {
      res.setHeader(
        'Content-Disposition',
        `attachment; filename=study-${diff.left.id}-${diff.right.id}-diff.json`
      );
    }
    res.json({ success: true, data: diff });
  });

export const diff = diffWith('interactive');
export const exportDiff = diffWith('export');

export const rollbackPreview = asyncHandler(async (req: Request, res: Response) => {
  const preview = await versioning.previewRollback(toInt(req.params.studyId), toInt(req.params.freezeId));
  res.json({ success: true, data: preview });
});

export const rollback = asyncHandler(async (req: Request, res: Response) => {
  const result = await versioning.rollbackToFreeze(toInt(req.params.studyId), toInt(req.params.freezeId));
  res.json({ success: true, data: result });
});

export default { create, list, get, getSnapshot, diff, exportDiff, rollbackPreview, rollback };
