// src/features/iteration-loop/storage.ts

/**
 * Iteration Loop State Storage
 *
 * One markdown document per workspace: a YAML header between `---` lines,
 * a blank line, then the task prompt as the body. The document is advisory,
 * so anything unreadable loads as "no loop" instead of failing.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { LoopState } from './types.js';
import { DEFAULT_STATE_FILE, HEADER_DELIMITER } from './constants.js';
import { createLoopLogger } from '../../utils/logger.js';
import { describeError, errorCode } from '../../utils/errors.js';

const log = createLoopLogger('state-store');

const headerSchema = z.object({
  iteration: z.number().int().min(1).default(1),
  max_iterations: z.number().int().min(0).default(0),
  completion_promise: z.union([z.string(), z.number()]).nullable().optional()
});

/**
 * Gets the full path to the state document.
 */
export function getStateFilePath(directory: string, customPath?: string): string {
  return join(directory, customPath ?? DEFAULT_STATE_FILE);
}

/**
 * Builds a normalized state: empty markers become absent, the prompt is trimmed.
 */
export function createLoopState(input: {
  iteration?: number;
  maxIterations: number;
  completionMarker?: string | null;
  taskPrompt: string;
}): LoopState {
  const marker = input.completionMarker;
  return {
    iteration: input.iteration ?? 1,
    maxIterations: input.maxIterations,
    ...(marker ? { completionMarker: marker } : {}),
    taskPrompt: input.taskPrompt.trim()
  };
}

/**
 * Parses a state document. Returns null for anything malformed.
 */
export function parseStateDocument(content: string): LoopState | null {
  const lines = content.split(/\r?\n/);
  if (lines[0]?.trim() !== HEADER_DELIMITER) {
    return null;
  }

  const closing = lines.findIndex((line, index) => index > 0 && line.trim() === HEADER_DELIMITER);
  if (closing < 0) {
    return null;
  }

  let header: unknown;
  try {
    header = yaml.load(lines.slice(1, closing).join('\n'), { schema: yaml.CORE_SCHEMA }) ?? {};
  } catch (error) {
    log.debug({ error: describeError(error) }, 'Unparsable state header');
    return null;
  }

  const fields = headerSchema.safeParse(header);
  if (!fields.success) {
    log.debug({ issues: fields.error.issues.length }, 'Invalid state header fields');
    return null;
  }

  const taskPrompt = lines.slice(closing + 1).join('\n').trim();
  if (!taskPrompt) {
    return null;
  }

  const marker = fields.data.completion_promise;
  return createLoopState({
    iteration: fields.data.iteration,
    maxIterations: fields.data.max_iterations,
    completionMarker: marker === null || marker === undefined ? null : String(marker),
    taskPrompt
  });
}

/**
 * Renders a state as its document text.
 */
export function serializeState(state: LoopState): string {
  const marker = state.completionMarker ? JSON.stringify(state.completionMarker) : 'null';

  return [
    HEADER_DELIMITER,
    `iteration: ${state.iteration}`,
    `max_iterations: ${state.maxIterations}`,
    `completion_promise: ${marker}`,
    HEADER_DELIMITER,
    '',
    state.taskPrompt.trim(),
    ''
  ].join('\n');
}

/**
 * Reads loop state for a workspace.
 * Returns null if no state exists or the document is invalid.
 */
export function loadState(directory: string, customPath?: string): LoopState | null {
  const filePath = getStateFilePath(directory, customPath);

  if (!existsSync(filePath)) {
    return null;
  }

  try {
    return parseStateDocument(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    log.warn({ error: describeError(error), filePath }, 'Failed to read loop state');
    return null;
  }
}

/**
 * Writes loop state, replacing the document atomically.
 * Creates the parent directory when missing. Throws on I/O failure.
 */
export function saveState(directory: string, state: LoopState, customPath?: string): void {
  const filePath = getStateFilePath(directory, customPath);
  const tmpPath = `${filePath}.${process.pid}.tmp`;

  mkdirSync(dirname(filePath), { recursive: true });
  try {
    writeFileSync(tmpPath, serializeState(state), 'utf-8');
    renameSync(tmpPath, filePath);
  } catch (error) {
    rmSync(tmpPath, { force: true });
    throw error;
  }

  log.debug({ filePath, iteration: state.iteration }, 'Loop state written');
}

/**
 * Deletes the state document. A missing document counts as cleared.
 * Returns true only when a document was actually removed.
 */
export function clearState(directory: string, customPath?: string): boolean {
  const filePath = getStateFilePath(directory, customPath);

  try {
    unlinkSync(filePath);
    log.debug({ filePath }, 'Loop state cleared');
    return true;
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') {
      log.warn({ error: describeError(error), filePath }, 'Failed to clear loop state');
    }
    return false;
  }
}
