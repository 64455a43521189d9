/**
 * Null transport for testing and silent operation
 * @module src/logger/transports/null
 */

import type { LogEvent, Transport } from "../types.ts";

/**
 * A transport that captures log events without outputting them.
 *
 * @example
 * ```ts
 * const transport = new NullTransport();
 * Logger.configure({ level: "debug", transports: [transport] });
 *
 * log.info("test message");
 *
 * expect(transport.events[0]?.message).toBe("test message");
 * ```
 */
export class NullTransport implements Transport {
  readonly name = "null";

  readonly events: LogEvent[] = [];

  write(event: LogEvent): void {
    this.events.push(event);
  }
}
