/**
 * Validation Middleware
 *
 * Implements request validation using Joi schemas
 * - Validates request body, query params, and URL params
 * - Provides detailed validation error messages
 * - Ensures data integrity before processing
 */

import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { logger } from '../config/logger';

/**
 * Validation schema options
 */
const validationOptions: Joi.ValidationOptions = {
  abortEarly: false, // Return all errors, not just first
  allowUnknown: true, // Allow unknown properties
  stripUnknown: true  // Remove unknown properties
};

const formatDetails = (error: Joi.ValidationError) =>
  error.details.map(detail => ({
    field: detail.path.join('.'),
    message: detail.message,
    type: detail.type
  }));

/**
 * Generic validation middleware factory
 * Creates middleware that validates specific parts of the request
 */
export const validate = (schema: {
  body?: Joi.Schema;
  query?: Joi.ObjectSchema;
  params?: Joi.ObjectSchema;
}) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    // Validate request body
    if (schema.body) {
      const { error, value } = schema.body.validate(req.body, validationOptions);
      if (error) {
        logger.warn('Request body validation failed', { path: req.path, errors: formatDetails(error) });
        res.status(400).json({
          success: false,
          message: 'Validation failed',
          errors: formatDetails(error)
        });
        return;
      }
      req.body = value;
    }

    // Validate query parameters
    if (schema.query) {
      const { error, value } = schema.query.validate(req.query, validationOptions);
      if (error) {
        logger.warn('Query parameter validation failed', { path: req.path, errors: formatDetails(error) });
        res.status(400).json({
          success: false,
          message: 'Query parameter validation failed',
          errors: formatDetails(error)
        });
        return;
      }
      req.query = value;
    }

    // Validate URL parameters
    if (schema.params) {
      const { error, value } = schema.params.validate(req.params, validationOptions);
      if (error) {
        logger.warn('URL parameter validation failed', { path: req.path, errors: formatDetails(error) });
        res.status(400).json({
          success: false,
          message: 'URL parameter validation failed',
          errors: formatDetails(error)
        });
        return;
      }
      req.params = value;
    }

    next();
  };
};

/**
 * ============================================================================
 * VALIDATION SCHEMAS
 * ============================================================================
 */

const id = Joi.number().integer().positive();
const optionalText = Joi.string().trim().allow('', null).max(2000).optional();

/**
 * Common Schemas
 */
export const commonSchemas = {
  studyParam: Joi.object({
    studyId: id.required()
  }),

  entityParam: Joi.object({
    studyId: id.required(),
    id: id.required()
  }),

  freezeParam: Joi.object({
    studyId: id.required(),
    freezeId: id.required()
  }),

  reorder: Joi.object({
    order: Joi.array().items(id).min(1).unique().required()
      .messages({
        'array.min': 'Order list required',
        'array.unique': 'Order list contains duplicate ids'
      })
  })
};

/**
 * Study Schemas
 */
export const studySchemas = {
  create: Joi.object({
    name: Joi.string().trim().required().min(1).max(255)
      .messages({ 'string.empty': 'Study name is required' }),
    study_code: optionalText,
    label: optionalText,
    description: optionalText
  }),

  update: Joi.object({
    name: Joi.string().trim().min(1).max(255).optional(),
    study_code: optionalText,
    label: optionalText,
    description: optionalText
  })
};

/**
 * Visit Schemas
 */
export const visitSchemas = {
  create: Joi.object({
    name: Joi.string().trim().required().min(1).max(255),
    raw_header: optionalText,
    epoch_id: id.allow(null).optional()
  }),

  update: Joi.object({
    name: Joi.string().trim().min(1).max(255).optional(),
    raw_header: optionalText,
    epoch_id: id.allow(null).optional()
  })
};

/**
 * Activity Schemas
 */
export const activitySchemas = {
  create: Joi.object({
    name: Joi.string().trim().required().min(1).max(255)
  }),

  update: Joi.object({
    name: Joi.string().trim().min(1).max(255).optional()
  }),

  bulk: Joi.object({
    names: Joi.array().items(Joi.string().allow('')).required()
  }),

  concepts: Joi.object({
    concept_codes: Joi.array().items(Joi.string().allow('')).required()
  })
};

/**
 * Matrix Schemas
 */
export const matrixSchemas = {
  setCell: Joi.object({
    visit_id: id.required(),
    activity_id: id.required(),
    status: Joi.string().allow('').max(64).required()
  }),

  toggleCell: Joi.object({
    visit_id: id.required(),
    activity_id: id.required()
  }),

  import: Joi.object({
    visits: Joi.array().items(Joi.object({
      name: Joi.string().trim().required().min(1),
      raw_header: optionalText
    })).min(1).required()
      .messages({ 'array.min': 'visits list empty' }),
    activities: Joi.array().items(Joi.object({
      name: Joi.string().trim().required().min(1),
      statuses: Joi.array().items(Joi.string().allow('', null)).required()
    })).min(1).required()
      .messages({ 'array.min': 'activities list empty' }),
    reset: Joi.boolean().default(true)
  })
};

/**
 * Arm Schemas
 */
export const armSchemas = {
  create: Joi.object({
    name: Joi.string().trim().required().min(1).max(255),
    label: optionalText,
    description: optionalText,
    type: optionalText,
    data_origin_type: optionalText
  }),

  update: Joi.object({
    name: Joi.string().trim().min(1).max(255).optional(),
    label: optionalText,
    description: optionalText,
    type: optionalText,
    data_origin_type: optionalText
  })
};

/**
 * Epoch Schemas
 */
export const epochSchemas = {
  create: Joi.object({
    name: Joi.string().trim().required().min(1).max(255),
    epoch_label: optionalText,
    epoch_description: optionalText
  }),

  update: Joi.object({
    name: Joi.string().trim().min(1).max(255).optional(),
    epoch_label: optionalText,
    epoch_description: optionalText
  })
};

/**
 * Element Schemas
 */
export const elementSchemas = {
  create: Joi.object({
    name: Joi.string().trim().required().min(1).max(255),
    label: optionalText,
    description: optionalText,
    testrl: optionalText,
    teenrl: optionalText
  }),

  update: Joi.object({
    name: Joi.string().trim().min(1).max(255).optional(),
    label: optionalText,
    description: optionalText,
    testrl: optionalText,
    teenrl: optionalText
  })
};

/**
 * Freeze / Diff Schemas
 */
export const freezeSchemas = {
  create: Joi.object({
    version_label: Joi.string().allow('', null).max(100).optional()
  }),

  diff: Joi.object({
    left: id.required(),
    right: id.required(),
    limit: Joi.number().integer().min(0).optional(),
    full: Joi.number().integer().valid(0, 1).default(0)
  })
};

/**
 * Audit Schemas
 */
export const auditSchemas = {
  entityQuery: Joi.object({
    entityType: Joi.string().valid('study', 'visit', 'activity', 'cell', 'concept', 'arm', 'epoch', 'element').optional()
  })
};
