// src/features/iteration-loop/detector.ts

/**
 * Completion marker detection in free-form agent output.
 */

import { COMPLETION_TAG_PATTERN } from './constants.js';
import type { SessionMessage } from './types.js';

/**
 * Collapses whitespace runs to single spaces and trims.
 */
export function normalizeMarkerText(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

/**
 * Extracts the text inside the first <promise>...</promise> span.
 * Tag matching ignores case; the interior keeps its case.
 * Returns null when there is no span.
 */
export function extractMarkerText(output: string): string | null {
  const match = output.match(COMPLETION_TAG_PATTERN);
  if (!match) {
    return null;
  }
  return normalizeMarkerText(match[1] ?? '');
}

/**
 * Checks whether the output carries exactly the configured marker.
 *
 * Comparison is case-sensitive on purpose: `DONE` does not match `done`.
 */
export function detectCompletionMarker(output: string, marker: string): boolean {
  const detected = extractMarkerText(output);
  return detected !== null && detected === marker;
}

/**
 * Extracts the text of the last assistant message in a session history.
 */
export function extractLastAssistantText(messages: SessionMessage[]): string {
  const assistants = messages.filter((message) => message.info?.role === 'assistant');
  const last = assistants[assistants.length - 1];
  if (!last?.parts) {
    return '';
  }
  return last.parts
    .filter((part) => part.type === 'text' && typeof part.text === 'string')
    .map((part) => part.text ?? '')
    .join('\n')
    .trim();
}
