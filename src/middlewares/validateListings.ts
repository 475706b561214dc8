import { param, query, validationResult } from 'express-validator';
import { Request, Response, NextFunction } from 'express';
import { env } from '../config/env';
import { formatApiResponse } from '../utils/formatApiResponse';

const validatePageQuery = [
  query('cursor').optional().isString().isLength({ max: 2048 }),
  query('page_size').optional().isInt({ min: 1, max: env.paginationMaxPageSize }),
  query('direction').optional().isIn(['next', 'prev']),
  // callers may only shorten the configured timeout
  query('timeout_ms').optional().isInt({ min: 1, max: env.paginationTimeoutMs }),
];

export const validateListEvents = [
  ...validatePageQuery,
  query('city').optional().isString().trim().isLength({ min: 1, max: 120 }),
  query('state').optional().isString().trim().isLength({ min: 1, max: 120 }),
  query('category').optional().isString().trim().isLength({ min: 1, max: 120 }),
  query('is_online').optional().isBoolean(),
  query('creator_email').optional().isEmail(),
  query('start_date').optional().isISO8601(),
  query('end_date').optional().isISO8601(),
];

export const validateListLocalEvents = [
  ...validatePageQuery,
  query('city').isString().trim().isLength({ min: 1, max: 120 }),
  query('state').isString().trim().isLength({ min: 1, max: 120 }),
];

export const validateListArchivedEvents = [
  ...validatePageQuery,
  query('creator_email').optional().isEmail(),
];

export const validateListUserEvents = [
  ...validatePageQuery,
  param('email').isEmail(),
];

export const validateListUsers = [
  ...validatePageQuery,
  query('role').optional().isString().trim().isLength({ min: 1, max: 60 }),
  query('profession').optional().isString().trim().isLength({ min: 1, max: 120 }),
];

export function handleValidationErrors(req: Request, res: Response, next: NextFunction) {
  const result = validationResult(req);
  if (!result.isEmpty()) {
    return res.status(400).json(
      formatApiResponse('error', 'Validation failed', { errors: result.array() })
    );
  }
  return next();
}
