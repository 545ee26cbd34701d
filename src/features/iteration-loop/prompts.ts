// src/features/iteration-loop/prompts.ts

/**
 * Text the loop writes into sessions and returns to callers.
 */

import type { LoopState, LoopStatus } from './types.js';
import { STATUS_PROMPT_PREVIEW_LENGTH } from './constants.js';

function markerLabel(state: LoopState): string {
  return state.completionMarker ?? '(none)';
}

/**
 * Builds the prompt for the next iteration: a short header, then the
 * original task prompt verbatim.
 */
export function buildContinuationPrompt(state: LoopState): string {
  const limit = state.maxIterations > 0 ? `/${state.maxIterations}` : '';

  let reminder: string;
  if (state.completionMarker) {
    reminder = `Completion marker: ${state.completionMarker} (output <promise>${state.completionMarker}</promise> only when the task is truly complete)`;
  } else if (state.maxIterations > 0) {
    reminder = 'No completion marker configured - the loop runs until max iterations are reached.';
  } else {
    reminder = 'No completion marker configured - the loop runs until it is cancelled.';
  }

  return [`🔄 Iteration loop: iteration ${state.iteration}${limit}`, reminder, '', state.taskPrompt].join('\n');
}

export function buildLimitNotice(state: LoopState): string {
  return `🛑 Iteration loop: max iterations (${state.maxIterations}) reached. The loop has been stopped.`;
}

export function buildCompletionNotice(state: LoopState): string {
  return `✅ Iteration loop: detected completion marker "${markerLabel(state)}". The loop has finished.`;
}

/**
 * Confirmation returned to the caller that started a loop.
 */
export function buildStartConfirmation(
  state: LoopState,
  stateFile: string,
  replacedIteration?: number
): string {
  const lines = ['Iteration loop initialized for this workspace.'];

  if (replacedIteration !== undefined) {
    lines.push(`Replaced the previous loop (was at iteration ${replacedIteration}).`);
  }

  lines.push(
    '',
    `Prompt: ${state.taskPrompt}`,
    `Completion marker: ${markerLabel(state)}`
  );

  if (state.maxIterations > 0) {
    lines.push(`Max iterations: ${state.maxIterations}.`);
  } else {
    lines.push('WARNING: No max iterations set (loop may run indefinitely).');
    if (!state.completionMarker) {
      lines.push('WARNING: No completion marker set either; only cancellation will stop this loop.');
    }
  }

  lines.push(
    '',
    'Work on the task now. When the session goes idle, the loop re-issues this prompt until completion or max iterations.',
    `To stop early, cancel the loop or delete \`${stateFile}\`.`
  );

  return lines.join('\n');
}

/**
 * Loop facts kept as durable context when the host compacts history.
 */
export function buildCompactionContext(state: LoopState): string {
  const max = state.maxIterations > 0 ? String(state.maxIterations) : '0 (unbounded)';
  return [
    '## Iteration Loop State',
    `Iteration: ${state.iteration}`,
    `Max iterations: ${max}`,
    `Completion marker: ${markerLabel(state)}`
  ].join('\n');
}

export function formatLoopStatus(status: LoopStatus): string {
  if (!status.active) {
    return [
      '## Iteration Loop Status',
      'Status: inactive',
      'No active iteration loop. Start one with a task prompt and optional flags.'
    ].join('\n');
  }

  const { state } = status;
  const progress =
    state.maxIterations > 0
      ? `${state.iteration}/${state.maxIterations}`
      : `${state.iteration} (unbounded)`;
  const preview =
    state.taskPrompt.length > STATUS_PROMPT_PREVIEW_LENGTH
      ? `${state.taskPrompt.substring(0, STATUS_PROMPT_PREVIEW_LENGTH)}...`
      : state.taskPrompt;

  return [
    '## Iteration Loop Status',
    'Status: active',
    `Iteration: ${progress}`,
    `Completion marker: ${markerLabel(state)}`,
    `State file: ${status.stateFilePath}`,
    '',
    '### Task Prompt',
    preview
  ].join('\n');
}
