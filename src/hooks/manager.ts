// src/hooks/manager.ts

/**
 * Hook Manager
 *
 * Registry of hook definitions keyed by event type. Handlers run in
 * priority order; a failing handler is recorded and skipped, and never
 * fails the host event that triggered it.
 */

import type {
  HookContextMap,
  HookDefinition,
  HookEventType,
  HookExecutionSummary,
  HookPriority,
  HookStats
} from './types.js';
import { HOOK_EVENT_TYPES } from './types.js';
import { logger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';

const PRIORITY_ORDER: Record<HookPriority, number> = {
  high: 0,
  normal: 1,
  low: 2
};

type HookRegistry = { [E in HookEventType]: Map<string, HookDefinition<E>> };

export class HookManager {
  private readonly registry: HookRegistry = {
    onSessionIdle: new Map(),
    onSessionCompacting: new Map()
  };

  private stats: HookStats = createEmptyStats();

  registerHook<E extends HookEventType>(hook: HookDefinition<E>): void {
    const bucket: Map<string, HookDefinition<E>> = this.registry[hook.eventType];
    if (bucket.has(hook.id)) {
      logger.warn({ hookId: hook.id }, 'Replacing already registered hook');
    }
    bucket.set(hook.id, hook);
    logger.debug({ hookId: hook.id, eventType: hook.eventType }, 'Hook registered');
  }

  unregisterHook(hookId: string): boolean {
    let removed = false;
    for (const eventType of HOOK_EVENT_TYPES) {
      removed = this.registry[eventType].delete(hookId) || removed;
    }
    return removed;
  }

  setHookEnabled(hookId: string, enabled: boolean): boolean {
    for (const eventType of HOOK_EVENT_TYPES) {
      const hook = this.registry[eventType].get(hookId);
      if (hook) {
        hook.enabled = enabled;
        logger.info({ hookId, enabled }, 'Hook toggled');
        return true;
      }
    }
    return false;
  }

  getHooks<E extends HookEventType>(eventType: E): HookDefinition<E>[] {
    const bucket: Map<string, HookDefinition<E>> = this.registry[eventType];
    return [...bucket.values()].sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]);
  }

  /**
   * Runs every enabled hook of an event type. Stops after a 'block' decision.
   */
  async executeHooks<E extends HookEventType>(
    eventType: E,
    context: HookContextMap[E]
  ): Promise<HookExecutionSummary> {
    const summary: HookExecutionSummary = {
      executed: 0,
      blocked: false,
      injectedMessages: [],
      results: [],
      errors: []
    };

    for (const hook of this.getHooks(eventType)) {
      if (!hook.enabled) {
        continue;
      }

      const hookStats = this.statsFor(hook.id);
      summary.executed++;
      hookStats.executions++;
      this.stats.totalExecutions++;

      try {
        const result = await hook.handler(context);
        summary.results.push({ hookId: hook.id, result });

        if (result.injectMessage) {
          summary.injectedMessages.push(result.injectMessage);
        }

        if (result.decision === 'block') {
          summary.blocked = true;
          summary.blockedBy = hook.id;
          this.stats.totalBlocks++;
          logger.debug({ hookId: hook.id, eventType }, 'Hook blocked event');
          break;
        }
      } catch (error) {
        const message = describeError(error);
        summary.errors.push({ hookId: hook.id, error: message });
        hookStats.errors++;
        hookStats.lastError = message;
        this.stats.totalErrors++;
        logger.error({ hookId: hook.id, eventType, error: message }, 'Hook handler failed');
      }
    }

    return summary;
  }

  getStats(): HookStats {
    return {
      ...this.stats,
      byHook: Object.fromEntries(
        Object.entries(this.stats.byHook).map(([id, entry]) => [id, { ...entry }])
      )
    };
  }

  resetStats(): void {
    this.stats = createEmptyStats();
  }

  private statsFor(hookId: string): HookStats['byHook'][string] {
    const existing = this.stats.byHook[hookId];
    if (existing) {
      return existing;
    }
    const created = { executions: 0, errors: 0 };
    this.stats.byHook[hookId] = created;
    return created;
  }
}

function createEmptyStats(): HookStats {
  return { totalExecutions: 0, totalErrors: 0, totalBlocks: 0, byHook: {} };
}
