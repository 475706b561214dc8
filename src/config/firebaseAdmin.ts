import admin from 'firebase-admin';
import { env } from './env';
import { logger } from '../utils/logger';

function isServiceAccount(value: unknown): value is admin.ServiceAccount {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function parseServiceAccount(json: string, source: string): admin.ServiceAccount | null {
  try {
    const parsed: unknown = JSON.parse(json);
    return isServiceAccount(parsed) ? parsed : null;
  } catch (e) {
    logger.warn({ source, err: String(e) }, '[firebaseAdmin] Ignoring unparseable service account');
    return null;
  }
}

function getServiceAccountFromEnv(): admin.ServiceAccount | null {
  const json = process.env.FIREBASE_SERVICE_ACCOUNT_JSON;
  if (json) {
    return parseServiceAccount(json, 'FIREBASE_SERVICE_ACCOUNT_JSON');
  }
  const b64 = process.env.FIREBASE_SERVICE_ACCOUNT_B64;
  if (b64) {
    return parseServiceAccount(Buffer.from(b64, 'base64').toString('utf8'), 'FIREBASE_SERVICE_ACCOUNT_B64');
  }
  return null;
}

if (!admin.apps.length) {
  const svc = getServiceAccountFromEnv();
  if (svc) {
    admin.initializeApp({ credential: admin.credential.cert(svc), projectId: env.firebaseProjectId });
  } else {
    // Fallback to GOOGLE_APPLICATION_CREDENTIALS or metadata if present in environment
    admin.initializeApp(env.firebaseProjectId ? { projectId: env.firebaseProjectId } : undefined);
  }
}

export const adminDb = admin.firestore();
adminDb.settings({ ignoreUndefinedProperties: true });
