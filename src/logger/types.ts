/**
 * Logger type definitions
 * @module src/logger/types
 */

/**
 * Log levels in order of severity.
 * debug (0) < info (1) < warn (2) < error (3)
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Priority values for log levels.
 * Higher values = more severe, fewer messages shown.
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * A log event to be processed by transports.
 */
export interface LogEvent {
  level: LogLevel;
  timestamp: Date;
  /** Hierarchical namespace (e.g., "docs:writer", "lint:github") */
  namespace: string;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Transport interface for log output destinations.
 */
export interface Transport {
  readonly name: string;
  write(event: LogEvent): void;
}

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Minimum log level to output (messages below this are filtered) */
  level: LogLevel;
  transports: Transport[];
}

/**
 * Check if a log level should be output given the configured minimum level.
 */
export function shouldLog(
  eventLevel: LogLevel,
  configLevel: LogLevel,
): boolean {
  return LOG_LEVEL_PRIORITY[eventLevel] >= LOG_LEVEL_PRIORITY[configLevel];
}

/**
 * Parse a string to a LogLevel, with validation.
 * @returns LogLevel if valid, undefined otherwise
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.toLowerCase();
  return isValidLogLevel(normalized) ? normalized : undefined;
}

function isValidLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" ||
    value === "error";
}
