#!/usr/bin/env node
// src/cli/index.ts

/**
 * iteration-loop CLI
 *
 * Commands:
 *   start     Start a loop in the workspace
 *   cancel    Cancel the active loop
 *   status    Show the active loop
 *   context   Print the compaction context
 *   serve     Run the MCP server over stdio
 */

import { runCli } from './commands.js';

process.exitCode = await runCli(process.argv.slice(2));
