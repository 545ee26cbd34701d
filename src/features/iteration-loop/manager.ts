// src/features/iteration-loop/manager.ts

/**
 * Iteration Loop Manager
 *
 * Caller-facing operations on the loop of one workspace: start, cancel,
 * status and the compaction context. None of these advance the loop; that is
 * the controller's job on idle signals.
 */

import type {
  IterationLoopOptions,
  LoopCancelResult,
  LoopStartResult,
  LoopState,
  LoopStatus
} from './types.js';
import { parseLoopCommand } from './parser.js';
import { clearState, createLoopState, getStateFilePath, loadState, saveState } from './storage.js';
import { buildCompactionContext, buildStartConfirmation } from './prompts.js';
import { DEFAULT_STATE_FILE } from './constants.js';
import { createLoopLogger } from '../../utils/logger.js';

const log = createLoopLogger('manager');

export class IterationLoopManager {
  private readonly directory: string;
  private readonly stateFile: string;

  constructor(directory: string, options?: IterationLoopOptions) {
    this.directory = directory;
    this.stateFile = options?.stateFile ?? DEFAULT_STATE_FILE;
  }

  /**
   * Parses the start command and writes the first state (iteration 1).
   * Throws LoopInputError without touching the state on bad input.
   */
  startLoop(input: string): LoopStartResult {
    const parsed = parseLoopCommand(input);
    const previous = loadState(this.directory, this.stateFile);

    const state = createLoopState({
      iteration: 1,
      maxIterations: parsed.maxIterations,
      completionMarker: parsed.completionMarker,
      taskPrompt: parsed.taskPrompt
    });

    saveState(this.directory, state, this.stateFile);

    log.info({
      directory: this.directory,
      maxIterations: state.maxIterations,
      completionMarker: state.completionMarker ?? null,
      replacedIteration: previous?.iteration
    }, 'Iteration loop started');

    if (state.maxIterations === 0) {
      log.warn({ directory: this.directory }, 'Iteration loop has no iteration limit');
    }

    return {
      state,
      ...(previous ? { replacedIteration: previous.iteration } : {}),
      message: buildStartConfirmation(state, this.stateFile, previous?.iteration)
    };
  }

  /**
   * Removes the active loop. Calling it with no loop is not an error.
   */
  cancel(): LoopCancelResult {
    const state = loadState(this.directory, this.stateFile);

    if (!state) {
      // Also removes a document that exists but does not parse.
      clearState(this.directory, this.stateFile);
      return {
        cancelled: false,
        message: `No active iteration loop found (nothing to cancel; no \`${this.stateFile}\` state file).`
      };
    }

    clearState(this.directory, this.stateFile);
    log.info({ directory: this.directory, iteration: state.iteration }, 'Iteration loop cancelled');

    return {
      cancelled: true,
      iteration: state.iteration,
      maxIterations: state.maxIterations,
      message: `Cancelled iteration loop (was at iteration ${state.iteration}, max_iterations=${state.maxIterations}).`
    };
  }

  getState(): LoopState | null {
    return loadState(this.directory, this.stateFile);
  }

  isActive(): boolean {
    return this.getState() !== null;
  }

  getStatus(): LoopStatus {
    const stateFilePath = getStateFilePath(this.directory, this.stateFile);
    const state = this.getState();
    return state ? { active: true, stateFilePath, state } : { active: false, stateFilePath };
  }

  /**
   * Loop facts to keep when the host summarizes history. Read-only.
   */
  getCompactionContext(): string | null {
    const state = this.getState();
    return state ? buildCompactionContext(state) : null;
  }
}

export function createIterationLoopManager(
  directory: string,
  options?: IterationLoopOptions
): IterationLoopManager {
  return new IterationLoopManager(directory, options);
}
