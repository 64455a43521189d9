/**
 * CLI program definition
 * @module cli/program
 */

import { Command } from "commander";
import { Logger } from "../src/logger/mod.ts";
import {
  registerDocsInitCommand,
  registerDocsReadmeCommand,
  registerLintReportCommand,
} from "./commands/mod.ts";

export const VERSION = "0.1.0";

type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
};

export function createCli(): Command {
  const cli = new Command()
    .name("repo-automation")
    .version(VERSION)
    .description(
      "CI automation: documentation README generation and lint reports on pull requests",
    )
    .option("-v, --verbose", "Enable debug logging")
    .option("-q, --quiet", "Only log warnings and errors")
    .hook("preAction", (command) => {
      const { verbose, quiet } = command.opts<GlobalOptions>();
      if (verbose) {
        Logger.configure({ level: "debug" });
      } else if (quiet) {
        Logger.configure({ level: "warn" });
      }
    });

  registerDocsReadmeCommand(cli);
  registerDocsInitCommand(cli);
  registerLintReportCommand(cli);

  return cli;
}
