import pinoHttp from 'pino-http';
import { requestLogger } from '../utils/logger';

// Access log per listing request. Runs after `requestId`, so the log id
// matches the X-Request-Id the client sees.
export const httpLogger = pinoHttp({
  logger: requestLogger,
  genReqId: (_req, res) => String(res.getHeader('x-request-id') ?? ''),
  customLogLevel: (_req, res, err) => {
    if (err || res.statusCode >= 500) return 'error';
    if (res.statusCode >= 400) return 'warn';
    return 'info';
  },
  customSuccessMessage: (req, res) => `${req.method} ${req.url} ${res.statusCode}`,
  serializers: {
    req(req) {
      return {
        id: req.id,
        method: req.method,
        url: req.url,
        remoteAddress: req.remoteAddress,
        headers: {
          'user-agent': req.headers['user-agent'],
        },
      };
    },
    res(res) {
      return { statusCode: res.statusCode };
    },
  },
});
