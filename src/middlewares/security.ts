import helmet from 'helmet';
import compression from 'compression';
import hpp from 'hpp';
import cors, { CorsOptions } from 'cors';
import { v4 as uuidv4 } from 'uuid';
import { Request, Response, NextFunction } from 'express';
import { env } from '../config/env';

export const requestId = (req: Request, res: Response, next: NextFunction) => {
  const incoming = req.headers['x-request-id'];
  const id = typeof incoming === 'string' && incoming ? incoming : uuidv4();
  res.setHeader('X-Request-Id', id);
  next();
};

// JSON-only API: no documents are rendered, so lock the content policy down
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    useDefaults: true,
    directives: {
      "default-src": ["'none'"],
      "frame-ancestors": ["'none'"],
    }
  },
  crossOriginResourcePolicy: { policy: 'same-site' },
  referrerPolicy: { policy: 'no-referrer' },
  frameguard: { action: 'deny' },
  hsts: { maxAge: 15552000, includeSubDomains: true, preload: true },
});

// Repeated query keys (?city=a&city=b) collapse to the last value
export const httpParamPollution = hpp();
export const gzipCompression = compression();

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Allow server-to-server (no Origin header) and health checks
    if (!origin) return callback(null, true);
    if (env.allowedOrigins.includes(origin)) return callback(null, true);
    // No list configured outside production means any origin may read
    if (env.allowedOrigins.length === 0 && env.nodeEnv !== 'production') return callback(null, true);
    return callback(null, false);
  },
  methods: ['GET', 'HEAD', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'X-Request-Id', 'Cache-Control'],
  exposedHeaders: ['X-Request-Id'],
  optionsSuccessStatus: 204,
  maxAge: 86400,
};

export const corsPolicy = cors(corsOptions);
