// src/cli/types.ts

/**
 * CLI Types for the iteration-loop command
 */

export interface CliOptions {
  /** Workspace root (default: ITERATION_LOOP_ROOT or the working directory) */
  dir?: string;
  /** State document path relative to the workspace */
  stateFile?: string;
}

export interface ParsedCliArgs {
  command: string;
  options: CliOptions;
  /** Remaining text, used as the start command input */
  rest: string[];
}

/**
 * Output sinks, replaced in tests.
 */
export interface CliIo {
  out(message: string): void;
  err(message: string): void;
}
