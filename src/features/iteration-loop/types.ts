// src/features/iteration-loop/types.ts

/**
 * Iteration Loop Types
 *
 * An iteration loop re-issues one task prompt to an agent every time its
 * session goes idle, until the agent emits the completion marker inside
 * <promise> tags or the iteration budget runs out. State lives in a single
 * document per workspace so the loop survives restarts and compaction.
 */

/**
 * Loop state persisted to the workspace state document.
 */
export interface LoopState {
  /** Current iteration number (starts at 1) */
  iteration: number;

  /** Iteration cap; 0 means unbounded */
  maxIterations: number;

  /** Text that signals completion; absent means the limit is the only stop */
  completionMarker?: string;

  /** Original task prompt, re-sent verbatim every iteration */
  taskPrompt: string;
}

/**
 * Parameters parsed from the free-text start command.
 */
export interface ParsedLoopCommand {
  taskPrompt: string;
  maxIterations: number;
  completionMarker?: string;
}

/**
 * Where the controller ended up after one idle signal.
 */
export type LoopPhase =
  | 'NO_LOOP'
  | 'SKIPPED_IN_FLIGHT'
  | 'ADVANCING'
  | 'STOPPED_BY_LIMIT'
  | 'STOPPED_BY_COMPLETION'
  | 'STOPPED_BY_COLLABORATOR_FAILURE';

export type FailureReason =
  | 'history_unavailable'
  | 'empty_history'
  | 'dispatch_failed'
  | 'unexpected_error';

export interface IdleOutcome {
  phase: LoopPhase;
  sessionId: string;
  /** Iteration the state held when the outcome was decided (after increment when advancing) */
  iteration?: number;
  reason?: FailureReason;
}

/**
 * Reads the most recent agent-authored text of a session.
 * Rejects when the history cannot be read; resolves '' when there is none.
 */
export interface HistoryReader {
  fetchLatestAssistantText(sessionId: string): Promise<string>;
}

/**
 * Sends a message into a session.
 */
export interface PromptDispatcher {
  dispatch(sessionId: string, text: string): Promise<void>;
}

/**
 * Minimal text part of a session message.
 */
export interface TextPart {
  type: string;
  text?: string;
}

/**
 * Minimal session message payload returned by the host.
 */
export interface SessionMessage {
  info?: { role?: string };
  parts?: TextPart[];
}

/**
 * Host client API the loop talks to.
 */
export interface SessionClient {
  session: {
    messages(args: { path: { id: string } }): Promise<SessionMessage[] | { data?: SessionMessage[] }>;
    prompt(args: {
      path: { id: string };
      body: { parts: Array<{ type: 'text'; text: string }> };
    }): Promise<unknown>;
  };
}

/**
 * Options shared by the loop manager and controller.
 */
export interface IterationLoopOptions {
  /** State document path relative to the workspace root */
  stateFile?: string;
}

/**
 * Result of starting a loop.
 */
export interface LoopStartResult {
  state: LoopState;
  /** Iteration the replaced loop was at, when a loop was already active */
  replacedIteration?: number;
  message: string;
}

/**
 * Result of cancelling a loop.
 */
export type LoopCancelResult =
  | { cancelled: false; message: string }
  | { cancelled: true; iteration: number; maxIterations: number; message: string };

/**
 * Read-only view of the workspace loop.
 */
export type LoopStatus =
  | { active: false; stateFilePath: string }
  | { active: true; stateFilePath: string; state: LoopState };
