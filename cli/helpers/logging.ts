/**
 * CLI status output with colored prefixes
 * @module cli/helpers/logging
 */

import pc from "picocolors";
import { isRepoAutomationError } from "../../src/errors.ts";

export interface StatusSink {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleSink: StatusSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

let sink: StatusSink = consoleSink;

/** Redirect status output (tests) */
export function setStatusSink(next: StatusSink | null): void {
  sink = next ?? consoleSink;
}

export const log = {
  success: (msg: string) => sink.out(pc.green(`[OK] ${msg}`)),
  fail: (msg: string) => sink.err(pc.red(`[FAIL] ${msg}`)),
  warn: (msg: string) => sink.out(pc.yellow(`[WARN] ${msg}`)),
  info: (msg: string) => sink.out(pc.gray(msg)),
  summary: (msg: string) => sink.out(pc.bold(msg)),
};

/**
 * Report a fatal error. Errors from this project are expected failures and
 * print their message; anything else prints its stack.
 */
export function reportError(error: unknown): void {
  if (isRepoAutomationError(error)) {
    log.fail(error.message);
    if (error.cause !== undefined) {
      sink.err(pc.dim(`       cause: ${describeCause(error.cause)}`));
    }
    return;
  }

  if (error instanceof Error) {
    log.fail(error.message);
    if (error.stack) sink.err(pc.dim(error.stack));
    return;
  }

  log.fail(String(error));
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
}
