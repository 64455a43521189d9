/**
 * Console transport for colored terminal output
 * @module src/logger/transports/console
 */

import pc from "picocolors";
import type { LogEvent, LogLevel, Transport } from "../types.ts";

type Colors = ReturnType<typeof pc.createColors>;
type ColorFn = (s: string) => string;

/**
 * Options for ConsoleTransport.
 */
export interface ConsoleTransportOptions {
  /** Enable/disable colors (default: picocolors' TTY/NO_COLOR detection) */
  colors?: boolean;
  /** Include timestamp in output (default: false) */
  timestamps?: boolean;
  /** Include log level for debug/warn/error (default: true) */
  showLevel?: boolean;
  /** Output sinks, console.log/console.error unless overridden */
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

/**
 * Console transport that outputs colored log messages.
 *
 * Format: `[namespace] message` with optional data
 * - debug/info go to stdout
 * - warn/error go to stderr
 */
export class ConsoleTransport implements Transport {
  readonly name = "console";
  private readonly colors: Colors;
  private readonly showTimestamps: boolean;
  private readonly showLevel: boolean;
  private readonly stdout: (line: string) => void;
  private readonly stderr: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.colors = pc.createColors(options.colors ?? pc.isColorSupported);
    this.showTimestamps = options.timestamps ?? false;
    this.showLevel = options.showLevel ?? true;
    this.stdout = options.stdout ?? ((line) => console.log(line));
    this.stderr = options.stderr ?? ((line) => console.error(line));
  }

  write(event: LogEvent): void {
    const formatted = this.format(event);

    if (event.level === "error" || event.level === "warn") {
      this.stderr(formatted);
    } else {
      this.stdout(formatted);
    }
  }

  private format(event: LogEvent): string {
    const c = this.colors;
    const parts: string[] = [];

    if (this.showTimestamps) {
      const time = event.timestamp.toISOString().slice(11, 23); // HH:MM:SS.mmm
      parts.push(c.gray(`[${time}]`));
    }

    if (this.showLevel && event.level !== "info") {
      parts.push(this.levelColor(event.level)(`[${event.level.toUpperCase()}]`));
    }

    parts.push(this.namespaceColor(event.namespace)(`[${event.namespace}]`));
    parts.push(event.message);

    if (event.data && Object.keys(event.data).length > 0) {
      parts.push(c.gray(this.formatData(event.data)));
    }

    return parts.join(" ");
  }

  private levelColor(level: LogLevel): ColorFn {
    const c = this.colors;
    switch (level) {
      case "debug":
        return c.gray;
      case "info":
        return c.white;
      case "warn":
        return c.yellow;
      case "error":
        return c.red;
    }
  }

  /**
   * Uses the first segment of hierarchical namespaces ("lint:github" -> "lint").
   */
  private namespaceColor(namespace: string): ColorFn {
    const c = this.colors;
    const prefix = namespace.split(":")[0] || namespace;
    switch (prefix) {
      case "docs":
        return c.blue;
      case "lint":
        return c.cyan;
      case "llm":
        return c.magenta;
      case "github":
        return c.green;
      default:
        return c.white;
    }
  }

  /**
   * Compact key=value for small flat data, JSON otherwise.
   */
  private formatData(data: Record<string, unknown>): string {
    const entries = Object.entries(data);

    if (
      entries.length <= 3 && entries.every(([, v]) => isSimpleValue(v))
    ) {
      const pairs = entries.map(([k, v]) => `${k}=${formatValue(v)}`);
      return `(${pairs.join(", ")})`;
    }

    return JSON.stringify(data);
  }
}

function isSimpleValue(value: unknown): boolean {
  return typeof value === "string" || typeof value === "number" ||
    typeof value === "boolean";
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return value.includes(" ") ? `"${value}"` : value;
  }
  return String(value);
}
