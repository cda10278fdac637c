import winston from "winston";

/**
 * Extended logger interface that includes timing functionality
 */
export interface Logger extends winston.Logger {
  time(label: string): void;
  timeEnd(label: string): void;
}

const RESERVED_FIELDS = new Set(["label", "message", "level", "timestamp"]);

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
 * Create a prefixed logger. Lines go to stdout as `[Prefix] message`.
 * An extra transport (used by tests) receives the same entries.
 * The level comes from LOG_LEVEL and defaults to `info`.
 * @param transport {winston.transport} optional transport to log to
 *
 * @example
 * import { getLogger } from "./logger";
 *
 * const logger = getLogger("MyService");
 * logger.info("This is an info message");
 * logger.debug("This is a debug message");
 * logger.time("operation");
 * // ... do some work
 * logger.timeEnd("operation"); // Logs: operation: 123ms
 *
 * @remarks
 * The logger supports the following log levels:
 * - `error`: For logging error messages
 * - `warn`: For logging warning messages
 * - `info`: For logging informational messages
 * - `verbose`: For logging verbose messages
 * - `debug`: For logging debug messages
 * - `silly`: For logging silly messages
 *
 * Timing functionality:
 * - `time(label)`: Start a timer with the given label
 * - `timeEnd(label)`: End the timer and log the elapsed time
 *
 * Filtering (for debugging):
 * - Set LOG_ONLY=Rasterizer to only see logs from the Rasterizer
 * - Set LOG_ONLY=Rasterizer,ScreenService for multiple services
 *
 * Metadata passed as the second argument is appended as JSON:
 * `logger.info("Device checked in", { mac })` prints
 * `[DeviceController] Device checked in {"mac":"..."}`
 */

export const getLogger = (
  prefix: string,
  transport?: winston.transport,
): Logger => {
  const allowedLoggers = getAllowedLoggers();

  // Create a filter format that silences non-allowed loggers
  const filterFormat = winston.format((info) => {
    if (
      allowedLoggers &&
      !(typeof info.label === "string" && allowedLoggers.has(info.label))
    ) {
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
        const meta = Object.fromEntries(
          Object.entries(info).filter(([key]) => !RESERVED_FIELDS.has(key)),
        );
        const extra =
          Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
        return `[${String(info.label)}] ${String(info.message)}${extra}`;
      }),
    ),

    transports: [
      new winston.transports.Console(), // Log to stdout by default
      ...(transport ? [transport] : []),
    ],
  });

  // Map to store timer start times
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

    const duration = Date.now() - startTime;
    baseLogger.info(`${label}: ${duration}ms`);
    timers.delete(label);
  };

  return Object.assign(baseLogger, { time, timeEnd });
};
