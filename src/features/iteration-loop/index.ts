// src/features/iteration-loop/index.ts

/**
 * Iteration Loop Feature
 *
 * Re-issues a task prompt on every idle signal until a completion marker
 * is detected or max iterations are reached.
 */

// Types
export type {
  LoopState,
  ParsedLoopCommand,
  LoopPhase,
  FailureReason,
  IdleOutcome,
  HistoryReader,
  PromptDispatcher,
  SessionMessage,
  SessionClient,
  TextPart,
  IterationLoopOptions,
  LoopStartResult,
  LoopCancelResult,
  LoopStatus
} from './types.js';

// Constants
export { DEFAULT_STATE_FILE, COMPLETION_TAG_PATTERN } from './constants.js';

// Storage
export {
  loadState,
  saveState,
  clearState,
  createLoopState,
  parseStateDocument,
  serializeState,
  getStateFilePath
} from './storage.js';

// Detection and parsing
export {
  detectCompletionMarker,
  extractMarkerText,
  extractLastAssistantText
} from './detector.js';
export { parseLoopCommand } from './parser.js';
export { formatLoopStatus } from './prompts.js';

// Manager and controller
export { IterationLoopManager, createIterationLoopManager } from './manager.js';
export { IterationLoopController } from './controller.js';
export type { IterationLoopControllerDeps } from './controller.js';
export { createHistoryReader, createPromptDispatcher } from './session-client.js';
