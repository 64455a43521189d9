/**
 * Core Logger implementation
 * @module src/logger/logger
 */

import type { LogEvent, LoggerConfig, LogLevel } from "./types.ts";
import { parseLogLevel, shouldLog } from "./types.ts";
import { ConsoleTransport } from "./transports/console.ts";

export const LOG_LEVEL_ENV = "REPO_AUTOMATION_LOG_LEVEL";

function defaultConfig(): LoggerConfig {
  return {
    level: "info",
    transports: [new ConsoleTransport()],
  };
}

/**
 * Unified logger with log level filtering and configurable transports.
 *
 * @example
 * ```ts
 * Logger.configure({ level: "debug" });
 *
 * const log = Logger.create("docs:writer");
 * log.info("Generated README", { path: "docs/README.md" });
 * ```
 */
export class Logger {
  private static globalConfig: LoggerConfig = defaultConfig();
  private static initialized = false;

  private constructor(private readonly namespace: string) {}

  // ===========================================================================
  // Static Configuration
  // ===========================================================================

  /**
   * Configure the global logger settings.
   * An explicit level wins over REPO_AUTOMATION_LOG_LEVEL.
   */
  static configure(config: Partial<LoggerConfig>): void {
    const envLevel = parseLogLevel(process.env[LOG_LEVEL_ENV]);
    const level = config.level ?? envLevel ?? Logger.globalConfig.level;

    Logger.globalConfig = {
      ...Logger.globalConfig,
      ...config,
      level,
    };
    Logger.initialized = true;
  }

  /**
   * Reset logger to default configuration.
   * Primarily used for testing.
   */
  static reset(): void {
    Logger.globalConfig = defaultConfig();
    Logger.initialized = false;
  }

  // ===========================================================================
  // Factory Methods
  // ===========================================================================

  /**
   * Create a logger instance for a specific namespace.
   *
   * Loggers read the global configuration on every call, so loggers created
   * at module load pick up a later `configure`.
   */
  static create(namespace: string): Logger {
    if (!Logger.initialized) {
      Logger.configure({});
    }
    return new Logger(namespace);
  }

  // ===========================================================================
  // Logging Methods
  // ===========================================================================

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    const config = Logger.globalConfig;
    if (!shouldLog(level, config.level)) {
      return;
    }

    const event: LogEvent = {
      level,
      timestamp: new Date(),
      namespace: this.namespace,
      message,
      ...(data !== undefined && { data }),
    };

    for (const transport of config.transports) {
      transport.write(event);
    }
  }
}
