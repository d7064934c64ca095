/**
 * Console logging for the reconciler.
 *
 * One winston root logger, level from LOG_LEVEL; each module logs through a
 * child tagged with its component ([ibkr], [greeks-fetcher], [greeks-cache],
 * [reconcile], [cli]) so a pass can be followed across modules.
 */

import winston from "winston";

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const tag = component ? `[${component}]` : "[system]";
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${timestamp} ${level} ${tag} ${message}${metaStr}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: combine(
    errors({ stack: true }),
    timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), logFormat),
    }),
  ],
});

/** What components log through; a child logger or a test double */
export interface Log {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Create a child logger tagged with a component name */
export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}
