/**
 * Cursor utilities for keyset pagination.
 * A cursor carries only the (sortKey, id) of a boundary item, so resuming a
 * traversal never needs to fetch the cursor document or keep server state.
 */
import { createHmac, timingSafeEqual } from 'crypto';
import { PaginationCursor, SortKey } from '../types/pagination';

export interface CursorCodec {
  encode(cursor: PaginationCursor): string;
  decode(token: string | null | undefined): PaginationCursor | null;
}

// undefined marks a value that is not a sort key
function readSortKey(value: unknown): SortKey | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'object' || Array.isArray(value)) return undefined;
  if (!('seconds' in value) || !('nanoseconds' in value)) return undefined;
  const { seconds, nanoseconds } = value;
  if (typeof seconds !== 'number' || !Number.isInteger(seconds)) return undefined;
  if (typeof nanoseconds !== 'number' || !Number.isInteger(nanoseconds)) return undefined;
  if (nanoseconds < 0 || nanoseconds > 999_999_999) return undefined;
  return { seconds, nanoseconds };
}

function parsePayload(payload: string): PaginationCursor | null {
  try {
    const json = Buffer.from(payload, 'base64url').toString('utf-8');
    const parsed: unknown = JSON.parse(json);
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return null;
    if (!('id' in parsed) || !('sortKey' in parsed)) return null;
    const { id } = parsed;
    if (typeof id !== 'string' || !id) return null;
    const sortKey = readSortKey(parsed.sortKey);
    if (sortKey === undefined) return null;
    return { sortKey, id };
  } catch {
    return null;
  }
}

function sign(payload: string, secret: string): string {
  return createHmac('sha256', secret).update(payload).digest('base64url');
}

/**
 * Build a codec. With a secret, tokens are `<payload>.<hmac>` and any token
 * whose tag does not verify decodes to null.
 */
export function createCursorCodec(options: { secret?: string } = {}): CursorCodec {
  const secret = options.secret || undefined;

  return {
    encode(cursor: PaginationCursor): string {
      const json = JSON.stringify({ sortKey: cursor.sortKey, id: cursor.id });
      const payload = Buffer.from(json, 'utf-8').toString('base64url');
      return secret ? `${payload}.${sign(payload, secret)}` : payload;
    },

    decode(token: string | null | undefined): PaginationCursor | null {
      if (typeof token !== 'string' || !token) return null;
      if (!secret) return parsePayload(token);

      const dot = token.lastIndexOf('.');
      if (dot <= 0) return null;
      const payload = token.slice(0, dot);
      const given = Buffer.from(token.slice(dot + 1), 'utf-8');
      const expected = Buffer.from(sign(payload, secret), 'utf-8');
      if (given.length !== expected.length || !timingSafeEqual(given, expected)) return null;
      return parsePayload(payload);
    },
  };
}
