// src/hooks/builtin/iteration-loop.ts

/**
 * Iteration Loop Hooks
 *
 * - Session idle: runs one controller transition for the session.
 * - Compaction: keeps the loop facts (iteration, cap, marker) in the
 *   context the host retains, so a summarized conversation still knows
 *   a loop is running. Read-only.
 */

import type { HookDefinition, HookResult } from '../types.js';
import type { HookManager } from '../manager.js';
import type { IterationLoopController, IterationLoopManager } from '../../features/iteration-loop/index.js';
import { logger } from '../../utils/logger.js';

export interface IterationLoopHookDeps {
  controller: IterationLoopController;
  manager: IterationLoopManager;
}

export const ITERATION_LOOP_IDLE_HOOK_ID = 'builtin:iteration-loop:session-idle';
export const ITERATION_LOOP_COMPACTION_HOOK_ID = 'builtin:iteration-loop:compaction';

export function createIterationLoopHooks(
  deps: IterationLoopHookDeps
): [HookDefinition<'onSessionIdle'>, HookDefinition<'onSessionCompacting'>] {
  const idleHook: HookDefinition<'onSessionIdle'> = {
    id: ITERATION_LOOP_IDLE_HOOK_ID,
    name: 'Iteration Loop (Session Idle)',
    description: 'Advances or stops the workspace iteration loop when a session goes idle',
    eventType: 'onSessionIdle',
    priority: 'normal',
    enabled: true,

    handler: async (context): Promise<HookResult> => {
      const outcome = await deps.controller.handleSessionIdle(context.sessionId);
      return {
        decision: 'continue',
        metadata: { ...outcome }
      };
    }
  };

  const compactionHook: HookDefinition<'onSessionCompacting'> = {
    id: ITERATION_LOOP_COMPACTION_HOOK_ID,
    name: 'Iteration Loop (Compaction)',
    description: 'Preserves iteration loop facts across history compaction',
    eventType: 'onSessionCompacting',
    priority: 'high',
    enabled: true,

    handler: async (): Promise<HookResult> => {
      const summary = deps.manager.getCompactionContext();
      if (!summary) {
        return { decision: 'continue' };
      }
      return { decision: 'continue', injectMessage: summary };
    }
  };

  return [idleHook, compactionHook];
}

export function registerIterationLoopHooks(hookManager: HookManager, deps: IterationLoopHookDeps): void {
  const [idleHook, compactionHook] = createIterationLoopHooks(deps);
  hookManager.registerHook(idleHook);
  hookManager.registerHook(compactionHook);
  logger.debug('Iteration loop hooks registered');
}
