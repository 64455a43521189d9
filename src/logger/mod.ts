/**
 * Unified logger module
 * @module src/logger
 */

export type { LogEvent, LoggerConfig, LogLevel, Transport } from "./types.ts";

export { LOG_LEVEL_ENV, Logger } from "./logger.ts";

export { ConsoleTransport } from "./transports/console.ts";
export type { ConsoleTransportOptions } from "./transports/console.ts";
export { NullTransport } from "./transports/null.ts";
