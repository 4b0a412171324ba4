/**
 * Audit Controller
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler.middleware';
import * as auditService from '../services/database/audit.service';
import { requireStudy } from '../services/database/study.service';
import { AuditEntityType } from '../types';
import { toInt } from '../utils/request.util';

const AUDIT_ENTITY_TYPES: AuditEntityType[] = ['study', 'visit', 'activity', 'cell', 'concept', 'arm', 'epoch', 'element'];

const entityTypeFilter = (value: unknown): AuditEntityType | undefined =>
  AUDIT_ENTITY_TYPES.find(type => type === value);

export const getRollbackAudit = asyncHandler(async (req: Request, res: Response) => {
  const studyId = toInt(req.params.studyId);
  await requireStudy(studyId);
  const entries = await auditService.listRollbackAudit(studyId);
  res.json({ success: true, data: entries });
});

export const getReorderAudit = asyncHandler(async (req: Request, res: Response) => {
  const studyId = toInt(req.params.studyId);
  await requireStudy(studyId);
  const entries = await auditService.listReorderAudit(studyId);
  res.json({ success: true, data: entries });
});

export const getEntityAudit = asyncHandler(async (req: Request, res: Response) => {
  const studyId = toInt(req.params.studyId);
  await requireStudy(studyId);
  const entries = await auditService.listEntityAudit(studyId, entityTypeFilter(req.query.entityType));
  res.json({ success: true, data: entries });
});

export const exportRollbackCsv = asyncHandler(async (req: Request, res: Response) => {
  const studyId = toInt(req.params.studyId);
  await requireStudy(studyId);
  const csv = await auditService.exportRollbackAuditCSV(studyId);

  res.setHeader('Content-Type', 'text/csv');
  res.setHeader('Content-Disposition', `attachment; filename=study-${studyId}-rollback-audit.csv`);
  res.send(csv);
});

export const exportReorderCsv = asyncHandler(async (req: Request, res: Response) => {
  const studyId = toInt(req.params.studyId);
  await requireStudy(studyId);
  const csv = await auditService.exportReorderAuditCSV(studyId);

  res.setHeader('Content-Type', 'text/csv');
  res.setHeader('Content-Disposition', `attachment; filename=study-${studyId}-reorder-audit.csv`);
  res.send(csv);
});

export default { getRollbackAudit, getReorderAudit, getEntityAudit, exportRollbackCsv, exportReorderCsv };
