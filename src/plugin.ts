// src/plugin.ts

/**
 * Iteration Loop Plugin Bridge
 *
 * Binds a host that emits session events and exposes a session client to
 * the iteration loop hooks. The host calls `event` for every lifecycle
 * event and `experimental.session.compacting` before it compacts history.
 */

import { config } from './config.js';
import { HookManager } from './hooks/manager.js';
import { registerIterationLoopHooks } from './hooks/builtin/index.js';
import {
  IterationLoopController,
  IterationLoopManager,
  createHistoryReader,
  createPromptDispatcher,
  formatLoopStatus
} from './features/iteration-loop/index.js';
import type { IterationLoopOptions, SessionClient } from './features/iteration-loop/index.js';
import { logger } from './utils/logger.js';

export interface HookEventPayload {
  event: {
    type: string;
    properties?: Record<string, unknown>;
  };
}

export interface CompactingInput {
  sessionID?: string;
}

export interface CompactingOutput {
  context: string[];
}

export interface PluginContext {
  directory: string;
  worktree?: string;
  client: SessionClient;
  options?: IterationLoopOptions;
}

export interface IterationLoopTools {
  /** Starts a loop from `PROMPT... [--max-iterations N] [--completion-promise TEXT]` */
  start(input: string): Promise<string>;
  cancel(): Promise<string>;
  status(): Promise<string>;
}

export interface IterationLoopPlugin {
  event(input: HookEventPayload): Promise<void>;
  'experimental.session.compacting'(input: CompactingInput, output: CompactingOutput): Promise<void>;
  tools: IterationLoopTools;
  hooks: HookManager;
}

/**
 * Resolves the session id from event properties.
 */
export function eventSessionId(input: HookEventPayload): string | null {
  const props = input.event.properties;
  if (!props) {
    return null;
  }
  const direct = props.sessionID;
  if (typeof direct === 'string' && direct.trim()) {
    return direct;
  }
  const info = props.info;
  if (typeof info === 'object' && info !== null && 'id' in info) {
    const id = info.id;
    if (typeof id === 'string' && id.trim()) {
      return id;
    }
  }
  return null;
}

export function createIterationLoopPlugin(ctx: PluginContext): IterationLoopPlugin {
  const root = ctx.worktree || ctx.directory;
  const stateFile = ctx.options?.stateFile ?? config.stateFile;

  const manager = new IterationLoopManager(root, { stateFile });
  const controller = new IterationLoopController({
    directory: root,
    stateFile,
    history: createHistoryReader(ctx.client),
    dispatcher: createPromptDispatcher(ctx.client)
  });

  const hooks = new HookManager();
  registerIterationLoopHooks(hooks, { controller, manager });

  logger.debug({ root, stateFile }, 'Iteration loop plugin ready');

  return {
    async event(input: HookEventPayload): Promise<void> {
      if (input.event.type !== 'session.idle') {
        return;
      }
      const sessionId = eventSessionId(input);
      if (!sessionId) {
        return;
      }
      await hooks.executeHooks('onSessionIdle', { sessionId, directory: root });
    },

    async 'experimental.session.compacting'(input: CompactingInput, output: CompactingOutput): Promise<void> {
      const summary = await hooks.executeHooks('onSessionCompacting', {
        ...(input.sessionID ? { sessionId: input.sessionID } : {}),
        directory: root
      });
      output.context.push(...summary.injectedMessages);
    },

    tools: {
      async start(input: string): Promise<string> {
        return manager.startLoop(input).message;
      },
      async cancel(): Promise<string> {
        return manager.cancel().message;
      },
      async status(): Promise<string> {
        return formatLoopStatus(manager.getStatus());
      }
    },

    hooks
  };
}

export default createIterationLoopPlugin;
