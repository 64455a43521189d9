#!/usr/bin/env -S npx tsx

/**
 * repo-automation CLI - Main entry point
 *
 * @module cli/repo-automation
 */

import { createCli } from "./program.ts";

await createCli().parseAsync(process.argv);
