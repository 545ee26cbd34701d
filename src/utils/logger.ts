// src/utils/logger.ts

import { pino } from 'pino';
import { config } from '../config.js';

// stdout carries the MCP stdio protocol, so logs go to stderr.
export const logger = pino({ level: config.logLevel }, process.stderr);

export function createLoopLogger(component: string) {
  return logger.child({ component });
}
