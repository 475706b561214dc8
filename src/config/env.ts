// Centralized environment configuration
// Loads .env via index.ts (dotenv) at process start

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  // Logging
  logLevel: string;
  requestLogFile?: string; // when set, HTTP access logs go to this file instead of stdout
  // Firebase
  firebaseProjectId?: string;
  // Collections
  eventsCollection: string;
  usersCollection: string;
  // Pagination
  paginationDefaultPageSize: number;
  paginationMaxPageSize: number;
  paginationTimeoutMs: number;
  cursorSigningSecret?: string; // optional HMAC key; unset means unsigned tokens
  // CORS
  allowedOrigins: string[];
}

function normalizeInt(value: string | undefined, fallback: number): number {
  if (value == null || value.trim() === '') return fallback;
  const n = parseInt(value, 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function normalizeList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map((s) => s.trim().replace(/\/$/, '')).filter(Boolean);
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const maxPageSize = Math.min(normalizeInt(source.PAGINATION_MAX_PAGE_SIZE, 100), 100);
  return {
    nodeEnv: source.NODE_ENV || 'development',
    port: normalizeInt(source.PORT, 5001),
    logLevel: source.LOG_LEVEL || 'info',
    requestLogFile: source.REQUEST_LOG_FILE || undefined,
    firebaseProjectId: source.FIREBASE_PROJECT_ID,
    eventsCollection: source.EVENTS_COLLECTION || 'events',
    usersCollection: source.USERS_COLLECTION || 'users',
    paginationDefaultPageSize: Math.min(normalizeInt(source.PAGINATION_DEFAULT_PAGE_SIZE, 12), maxPageSize),
    paginationMaxPageSize: maxPageSize,
    paginationTimeoutMs: normalizeInt(source.PAGINATION_TIMEOUT_MS, 10000),
    cursorSigningSecret: source.CURSOR_SIGNING_SECRET || undefined,
    allowedOrigins: normalizeList(source.ALLOWED_ORIGINS),
  };
}

export const env: EnvConfig = loadEnv();
