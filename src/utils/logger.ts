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
 * Create a logger writing `[Prefix] message` lines to stdout.
 * In production the level defaults to `info`; set LOG_LEVEL to change it.
 *
 * @example
 * import { getLogger } from "./logger";
 *
 * const logger = getLogger("VpnController");
 * logger.info("Starting openvpn");
 * logger.warn("Launch failed:", error); // winston appends error.message
 * logger.time("scan");
 * logger.timeEnd("scan"); // Logs: scan: 123ms
 *
 * @remarks
 * Filtering (for debugging):
 * - Set LOG_ONLY=WiFiStateReader to only see logs from WiFiStateReader
 * - Set LOG_ONLY=WiFiStateReader,PollingScheduler for multiple services
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
      winston.format.printf((info) => {
        return `[${String(info.label)}] ${String(info.message)}`;
      }),
    ),

    transports: [
      new winston.transports.Console(),
      ...(transport ? [transport] : []),
    ],
  });

  const timers = new Map<string, number>();

  const time = (label: string): void => {
    timers.set(label, Date.now());
  };

  const timeEnd = (label: string): void => {
    const startTime = timers.get(label);
    if (startTime === undefined) {
      baseLogger.warn(`Timer '${label}' does not exist`);
      return;
    }

    baseLogger.debug(`${label}: ${Date.now() - startTime}ms`);
    timers.delete(label);
  };

  return Object.assign(baseLogger, { time, timeEnd });
};
