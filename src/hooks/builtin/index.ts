// src/hooks/builtin/index.ts

/**
 * Built-in Hooks Index
 */

export {
  createIterationLoopHooks,
  registerIterationLoopHooks,
  ITERATION_LOOP_IDLE_HOOK_ID,
  ITERATION_LOOP_COMPACTION_HOOK_ID
} from './iteration-loop.js';
export type { IterationLoopHookDeps } from './iteration-loop.js';
