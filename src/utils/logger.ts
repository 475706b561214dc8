import pino from "pino";
import fs from "fs";
import path from "path";
import { env } from "../config/env";

const isDev = env.nodeEnv === "development";

const redact = {
  paths: [
    "req.headers.authorization",
    "req.headers.cookie",
    "password",
    "token",
  ],
  remove: true,
};

export const logger = pino({
  level: env.logLevel || "info",
  transport: isDev
    ? {
        target: "pino-pretty",
        options: { colorize: true, translateTime: true, singleLine: false },
      }
    : undefined,
  base: undefined,
  redact,
});

function createRequestLogger(): pino.Logger {
  if (!env.requestLogFile) {
    return logger.child({ channel: "http" });
  }
  const requestLogPath = path.resolve(process.cwd(), env.requestLogFile);
  fs.mkdirSync(path.dirname(requestLogPath), { recursive: true });
  // Non-blocking async file destination
  const requestDestination = pino.destination({ dest: requestLogPath, sync: false });
  return pino({ level: env.logLevel || "info", base: undefined, redact }, requestDestination);
}

export const requestLogger = createRequestLogger();
