import winston from "winston";

/**
 * Extended logger interface that includes timing functionality
 */
export interface Logger extends winston.Logger {
  time(label: string): void;
  timeEnd(label: string): void;
}

/**
 * Get the list of allowed logger prefixes from LOG_ONLY env var
 * Returns null if no filter is set (all loggers allowed)
 */
const getAllowedLoggers = (): Set<string> | null => {
  const logOnly = process.env.LOG_ONLY;
  if (!logOnly) return null;
  return new Set(logOnly.split(",").map((s) => s.trim()));
};

/**
 * Create a prefixed logger writing to stdout.
 *
 * Level comes from LOG_LEVEL (default `info`). LOG_ONLY takes a comma
 * separated list of prefixes and silences every other logger, e.g.
 * `LOG_ONLY=StreamReader,QueueFlusher`.
 *
 * @param transport optional extra transport, used by tests
 *
 * @example
 * const logger = getLogger("QueueFlusher");
 * logger.time("flush");
 * // ... write the batch
 * logger.timeEnd("flush"); // [QueueFlusher] flush: 12ms
 */
export const getLogger = (
  prefix: string,
  transport?: winston.transport,
): Logger => {
  const allowedLoggers = getAllowedLoggers();

  const filterFormat = winston.format((info) => {
    if (allowedLoggers && !allowedLoggers.has(String(info.label))) {
      return false;
    }
    return info;
  });

  const baseLogger = winston.createLogger({
    level: process.env.LOG_LEVEL || "info",
    format: winston.format.combine(
      winston.format.label({ label: prefix }),
      winston.format.timestamp(),
      filterFormat(),
      winston.format.printf(({ timestamp, level, label, message }) => {
        return `${String(timestamp)} ${level.toUpperCase()} [${String(label)}] ${String(message)}`;
      }),
    ),

    transports: [
      new winston.transports.Console(),
      ...(transport ? [transport] : []),
    ],
  });

  const timers = new Map<string, number>();

  const extendedLogger = Object.assign(baseLogger, {
    time(label: string): void {
      timers.set(label, Date.now());
    },
    timeEnd(label: string): void {
      const startTime = timers.get(label);
      if (startTime === undefined) {
        baseLogger.warn(`Timer '${label}' does not exist`);
        return;
      }
      baseLogger.info(`${label}: ${Date.now() - startTime}ms`);
      timers.delete(label);
    },
  });

  return extendedLogger;
};
