// src/config.ts

/**
 * Runtime configuration, read once from the environment.
 *
 * Invalid values never stop the process: each key falls back to its default.
 */

import { z } from 'zod';
import { DEFAULT_STATE_FILE } from './features/iteration-loop/constants.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).catch('info'),
  ITERATION_LOOP_ROOT: z.string().trim().min(1).optional().catch(undefined),
  ITERATION_LOOP_STATE_FILE: z.string().trim().min(1).default(DEFAULT_STATE_FILE).catch(DEFAULT_STATE_FILE)
});

export interface AppConfig {
  /** pino level for the root logger */
  logLevel: LogLevel;
  /** Workspace used when a caller names none */
  rootDirectory: string;
  /** State document path relative to the workspace */
  stateFile: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    logLevel: parsed.LOG_LEVEL,
    rootDirectory: parsed.ITERATION_LOOP_ROOT ?? process.cwd(),
    stateFile: parsed.ITERATION_LOOP_STATE_FILE
  };
}

export const config = loadConfig();
