import { Request } from 'express';
import { env } from '../config/env';
import { PageParams } from '../types/pagination';

export function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

export function queryBoolean(req: Request, key: string): boolean | undefined {
  const value = queryString(req, key);
  if (value === undefined) return undefined;
  return value === 'true' || value === '1';
}

/**
 * Read cursor/page_size/direction/timeout_ms after the validators have run.
 * Missing values take the configured defaults (12 items, forward, the
 * service-wide timeout).
 */
export function readPageParams(req: Request): PageParams {
  const rawSize = queryString(req, 'page_size');
  const pageSize = rawSize ? parseInt(rawSize, 10) : env.paginationDefaultPageSize;
  const rawTimeout = queryString(req, 'timeout_ms');
  return {
    cursor: queryString(req, 'cursor'),
    pageSize,
    direction: queryString(req, 'direction') === 'prev' ? 'prev' : 'next',
    timeoutMs: rawTimeout ? parseInt(rawTimeout, 10) : undefined,
  };
}
