// src/hooks/types.ts

/**
 * Hook System Types
 */

export type HookEventType = 'onSessionIdle' | 'onSessionCompacting';

export const HOOK_EVENT_TYPES: readonly HookEventType[] = ['onSessionIdle', 'onSessionCompacting'];

export type HookPriority = 'high' | 'normal' | 'low';

export type HookDecision = 'continue' | 'block';

/**
 * The host reported the agent finished a turn in a session.
 */
export interface OnSessionIdleContext {
  sessionId: string;
  directory: string;
}

/**
 * The host is about to summarize or discard session history.
 */
export interface OnSessionCompactingContext {
  sessionId?: string;
  directory: string;
}

export interface HookContextMap {
  onSessionIdle: OnSessionIdleContext;
  onSessionCompacting: OnSessionCompactingContext;
}

export interface HookResult {
  decision: HookDecision;
  /** Text the host should add to the session or its retained context */
  injectMessage?: string;
  metadata?: Record<string, unknown>;
}

export interface HookDefinition<E extends HookEventType = HookEventType> {
  id: string;
  name: string;
  description?: string;
  eventType: E;
  priority: HookPriority;
  enabled: boolean;
  handler: (context: HookContextMap[E]) => Promise<HookResult>;
}

export interface HookExecutionSummary {
  executed: number;
  blocked: boolean;
  blockedBy?: string;
  injectedMessages: string[];
  results: Array<{ hookId: string; result: HookResult }>;
  errors: Array<{ hookId: string; error: string }>;
}

export interface HookStats {
  totalExecutions: number;
  totalErrors: number;
  totalBlocks: number;
  byHook: Record<string, { executions: number; errors: number; lastError?: string }>;
}
