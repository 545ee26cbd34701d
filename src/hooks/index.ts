// src/hooks/index.ts

export { HookManager } from './manager.js';
export { HOOK_EVENT_TYPES } from './types.js';
export type {
  HookEventType,
  HookPriority,
  HookDecision,
  HookResult,
  HookDefinition,
  HookContextMap,
  HookExecutionSummary,
  HookStats,
  OnSessionIdleContext,
  OnSessionCompactingContext
} from './types.js';
export {
  createIterationLoopHooks,
  registerIterationLoopHooks,
  ITERATION_LOOP_IDLE_HOOK_ID,
  ITERATION_LOOP_COMPACTION_HOOK_ID
} from './builtin/index.js';
export type { IterationLoopHookDeps } from './builtin/index.js';
