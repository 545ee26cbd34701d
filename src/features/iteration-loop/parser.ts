// src/features/iteration-loop/parser.ts

/**
 * Start command parsing.
 *
 * Syntax: PROMPT... [--max-iterations N] [--completion-promise TEXT]
 * Flags may appear anywhere. Prompt tokens keep their quotes and order.
 */

import type { ParsedLoopCommand } from './types.js';
import { COMPLETION_PROMISE_FLAG, MAX_ITERATIONS_FLAG } from './constants.js';
import { normalizeMarkerText } from './detector.js';
import { LoopInputError } from '../../utils/errors.js';

const TOKEN_PATTERN = /"[^"]*"|'[^']*'|\S+/g;

/**
 * Splits input into double-quoted, single-quoted or bare tokens.
 */
export function tokenize(input: string): string[] {
  return input.match(TOKEN_PATTERN) ?? [];
}

/**
 * Removes one pair of matching surrounding quotes.
 */
export function stripQuotes(token: string): string {
  if (
    token.length >= 2 &&
    ((token.startsWith('"') && token.endsWith('"')) || (token.startsWith("'") && token.endsWith("'")))
  ) {
    return token.slice(1, -1);
  }
  return token;
}

function flagValue(tokens: string[], index: number): string | undefined {
  const next = tokens[index + 1];
  if (next === undefined || next.startsWith('--')) {
    return undefined;
  }
  return stripQuotes(next);
}

/**
 * Parses the free-text start command into loop parameters.
 * Throws LoopInputError on a missing or invalid flag value or an empty prompt.
 */
export function parseLoopCommand(input: string): ParsedLoopCommand {
  const tokens = tokenize(input);
  const promptParts: string[] = [];
  let maxIterations = 0;
  let completionMarker: string | undefined;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? '';

    if (token === MAX_ITERATIONS_FLAG) {
      const value = flagValue(tokens, i);
      if (value === undefined) {
        throw new LoopInputError(
          `${MAX_ITERATIONS_FLAG} requires a numeric argument (e.g. ${MAX_ITERATIONS_FLAG} 20).`
        );
      }
      const parsed = Number.parseInt(value, 10);
      if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
        throw new LoopInputError(`${MAX_ITERATIONS_FLAG} must be a non-negative integer, got: ${value}`);
      }
      maxIterations = parsed;
      i++;
    } else if (token === COMPLETION_PROMISE_FLAG) {
      // Detected markers are whitespace-normalized; store the same form.
      const value = normalizeMarkerText(flagValue(tokens, i) ?? '');
      if (!value) {
        throw new LoopInputError(
          `${COMPLETION_PROMISE_FLAG} requires a text argument (e.g. ${COMPLETION_PROMISE_FLAG} DONE).`
        );
      }
      completionMarker = value;
      i++;
    } else {
      promptParts.push(token);
    }
  }

  const taskPrompt = promptParts.join(' ').trim();
  if (!taskPrompt) {
    throw new LoopInputError('No prompt provided. Include a task description before any flags.');
  }

  return {
    taskPrompt,
    maxIterations,
    ...(completionMarker !== undefined ? { completionMarker } : {})
  };
}
