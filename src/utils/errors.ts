// src/utils/errors.ts

/**
 * Error types shared by the iteration loop surfaces.
 */

/**
 * Rejected initiation input (bad flags, empty prompt). Nothing is written
 * when this is thrown.
 */
export class LoopInputError extends Error {
  readonly code = 'LOOP_INPUT';

  constructor(message: string) {
    super(message);
    this.name = 'LoopInputError';
  }
}

export type CollaboratorName = 'history' | 'dispatch';

/**
 * Failure of a host collaborator. Terminal for the active loop.
 */
export class CollaboratorError extends Error {
  readonly code = 'LOOP_COLLABORATOR';

  constructor(readonly collaborator: CollaboratorName, cause: unknown) {
    super(`${collaborator} collaborator failed: ${describeError(cause)}`, { cause });
    this.name = 'CollaboratorError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads the errno-style code of a filesystem error, if it has one.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
