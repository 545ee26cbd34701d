// src/features/iteration-loop/controller.ts

/**
 * Iteration Loop Controller
 *
 * Reacts to "session idle" signals. Each signal either advances the loop by
 * one iteration and re-sends the task prompt, or stops it (limit reached,
 * completion marker seen, or a collaborator failed). Stopping always deletes
 * the state document.
 *
 * A session already being handled drops further idle signals until the
 * running handler finishes; dispatching a prompt can itself produce an idle
 * signal before the handler returns.
 */

import type {
  FailureReason,
  HistoryReader,
  IdleOutcome,
  IterationLoopOptions,
  LoopState,
  PromptDispatcher
} from './types.js';
import { clearState, loadState, saveState } from './storage.js';
import { detectCompletionMarker } from './detector.js';
import { buildCompletionNotice, buildContinuationPrompt, buildLimitNotice } from './prompts.js';
import { DEFAULT_STATE_FILE } from './constants.js';
import { createLoopLogger } from '../../utils/logger.js';
import { describeError } from '../../utils/errors.js';

const log = createLoopLogger('controller');

function isSameLoop(a: LoopState, b: LoopState): boolean {
  return (
    a.iteration === b.iteration &&
    a.maxIterations === b.maxIterations &&
    a.completionMarker === b.completionMarker &&
    a.taskPrompt === b.taskPrompt
  );
}

export interface IterationLoopControllerDeps extends IterationLoopOptions {
  /** Workspace root holding the state document */
  directory: string;
  history: HistoryReader;
  dispatcher: PromptDispatcher;
}

export class IterationLoopController {
  private readonly processingSessions = new Set<string>();
  private readonly directory: string;
  private readonly stateFile: string;
  private readonly history: HistoryReader;
  private readonly dispatcher: PromptDispatcher;

  constructor(deps: IterationLoopControllerDeps) {
    this.directory = deps.directory;
    this.stateFile = deps.stateFile ?? DEFAULT_STATE_FILE;
    this.history = deps.history;
    this.dispatcher = deps.dispatcher;
  }

  isProcessing(sessionId: string): boolean {
    return this.processingSessions.has(sessionId);
  }

  /**
   * Runs one transition for an idle session. Never rejects.
   */
  async handleSessionIdle(sessionId: string): Promise<IdleOutcome> {
    if (this.processingSessions.has(sessionId)) {
      log.debug({ sessionId }, 'Idle signal dropped, session already in flight');
      return { phase: 'SKIPPED_IN_FLIGHT', sessionId };
    }

    this.processingSessions.add(sessionId);
    try {
      return await this.transition(sessionId);
    } catch (error) {
      log.error({ sessionId, error: describeError(error) }, 'Iteration loop transition failed');
      return this.fail(sessionId, 'unexpected_error');
    } finally {
      this.processingSessions.delete(sessionId);
    }
  }

  private async transition(sessionId: string): Promise<IdleOutcome> {
    const state = loadState(this.directory, this.stateFile);
    if (!state) {
      return { phase: 'NO_LOOP', sessionId };
    }

    if (state.maxIterations > 0 && state.iteration >= state.maxIterations) {
      clearState(this.directory, this.stateFile);
      log.warn({ sessionId, maxIterations: state.maxIterations }, 'Iteration loop stopped - max iterations reached');
      await this.notify(sessionId, buildLimitNotice(state));
      return { phase: 'STOPPED_BY_LIMIT', sessionId, iteration: state.iteration };
    }

    let assistantText: string | undefined;
    let historyError: unknown;
    try {
      assistantText = await this.history.fetchLatestAssistantText(sessionId);
    } catch (error) {
      historyError = error;
    }

    // The loop may have been cancelled or restarted while history was read.
    const current = loadState(this.directory, this.stateFile);
    if (!current || !isSameLoop(current, state)) {
      log.debug({ sessionId }, 'Loop changed during history read, dropping idle signal');
      return { phase: 'NO_LOOP', sessionId };
    }

    if (assistantText === undefined) {
      log.warn({ sessionId, error: describeError(historyError) }, 'Cannot read session history, stopping loop');
      return this.fail(sessionId, 'history_unavailable', state);
    }

    if (!assistantText.trim()) {
      log.warn({ sessionId }, 'No assistant output to inspect, stopping loop');
      return this.fail(sessionId, 'empty_history', state);
    }

    if (state.completionMarker && detectCompletionMarker(assistantText, state.completionMarker)) {
      clearState(this.directory, this.stateFile);
      log.info({ sessionId, iteration: state.iteration }, 'Iteration loop completed - marker detected');
      await this.notify(sessionId, buildCompletionNotice(state));
      return { phase: 'STOPPED_BY_COMPLETION', sessionId, iteration: state.iteration };
    }

    const next: LoopState = { ...state, iteration: state.iteration + 1 };
    saveState(this.directory, next, this.stateFile);

    try {
      await this.dispatcher.dispatch(sessionId, buildContinuationPrompt(next));
    } catch (error) {
      log.warn({ sessionId, error: describeError(error) }, 'Cannot dispatch continuation prompt, stopping loop');
      return this.fail(sessionId, 'dispatch_failed', next);
    }

    log.info({ sessionId, iteration: next.iteration, maxIterations: next.maxIterations }, 'Iteration loop advanced');
    return { phase: 'ADVANCING', sessionId, iteration: next.iteration };
  }

  private fail(sessionId: string, reason: FailureReason, state?: LoopState): IdleOutcome {
    clearState(this.directory, this.stateFile);
    return {
      phase: 'STOPPED_BY_COLLABORATOR_FAILURE',
      sessionId,
      reason,
      ...(state ? { iteration: state.iteration } : {})
    };
  }

  /**
   * Posts a status notice. The loop is already stopped, so a failure here is
   * only logged.
   */
  private async notify(sessionId: string, text: string): Promise<void> {
    try {
      await this.dispatcher.dispatch(sessionId, text);
    } catch (error) {
      log.warn({ sessionId, error: describeError(error) }, 'Failed to post loop status notice');
    }
  }
}
