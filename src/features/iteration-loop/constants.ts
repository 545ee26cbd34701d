// src/features/iteration-loop/constants.ts

/**
 * Iteration Loop Constants
 */

/** State document path relative to the workspace root */
export const DEFAULT_STATE_FILE = '.opencode/iteration-loop.md';

/** Delimiter line around the state document header */
export const HEADER_DELIMITER = '---';

/** Marker span searched in agent output (first occurrence, any case) */
export const COMPLETION_TAG_PATTERN = /<promise>([\s\S]*?)<\/promise>/i;

/** Flag carrying the iteration cap */
export const MAX_ITERATIONS_FLAG = '--max-iterations';

/** Flag carrying the completion marker */
export const COMPLETION_PROMISE_FLAG = '--completion-promise';

/** Prompt preview length in status reports */
export const STATUS_PROMPT_PREVIEW_LENGTH = 500;
