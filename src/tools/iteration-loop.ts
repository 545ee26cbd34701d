// src/tools/iteration-loop.ts

/**
 * Iteration Loop MCP Tools
 *
 * Start, cancel and inspect the iteration loop of a workspace, and read the
 * loop facts a host should keep when it compacts history.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { config } from '../config.js';
import { IterationLoopManager, formatLoopStatus } from '../features/iteration-loop/index.js';
import { LoopInputError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

const directoryField = z.string().min(1).optional()
  .describe('Workspace root holding the loop state (default: server working directory)');

// Schema definitions
export const iterationLoopStartSchema = z.object({
  input: z.string().min(1)
    .describe('Task prompt and optional flags, e.g. `Build API --max-iterations 20 --completion-promise DONE`'),
  directory: directoryField
});

export const iterationLoopCancelSchema = z.object({
  directory: directoryField
});

export const iterationLoopStatusSchema = z.object({
  directory: directoryField
});

export const iterationLoopContextSchema = z.object({
  directory: directoryField
});

// Tool definitions
export const iterationLoopStartTool = {
  name: 'iteration_loop_start',
  description: `Start an iteration loop for the workspace.

Input syntax: PROMPT... [--max-iterations N] [--completion-promise TEXT]

Examples:
- Build a REST API for todos --max-iterations 50 --completion-promise DONE
- Fix the auth bug --max-iterations 20

The same prompt is re-issued every time the session goes idle, until the agent
outputs <promise>TEXT</promise> or max iterations are reached.`
};

export const iterationLoopCancelTool = {
  name: 'iteration_loop_cancel',
  description: 'Cancel the active iteration loop by removing its state file.'
};

export const iterationLoopStatusTool = {
  name: 'iteration_loop_status',
  description: 'Show the active iteration loop (iteration, limit, completion marker, prompt).'
};

export const iterationLoopContextTool = {
  name: 'iteration_loop_context',
  description: 'Loop facts to keep when conversation history is compacted. Read-only.'
};

function managerFor(directory?: string): IterationLoopManager {
  return new IterationLoopManager(directory ?? config.rootDirectory, { stateFile: config.stateFile });
}

function text(value: string): ToolResponse {
  return { content: [{ type: 'text', text: value }] };
}

function errorResponse(value: string): ToolResponse {
  return { content: [{ type: 'text', text: value }], isError: true };
}

// Handler implementations
export async function handleIterationLoopStart(
  args: z.infer<typeof iterationLoopStartSchema>
): Promise<ToolResponse> {
  try {
    return text(managerFor(args.directory).startLoop(args.input).message);
  } catch (error) {
    if (error instanceof LoopInputError) {
      return errorResponse(`Error: ${error.message}`);
    }
    logger.error({ error: describeError(error) }, 'iteration_loop_start failed');
    return errorResponse(`Error: failed to start iteration loop: ${describeError(error)}`);
  }
}

export async function handleIterationLoopCancel(
  args: z.infer<typeof iterationLoopCancelSchema>
): Promise<ToolResponse> {
  return text(managerFor(args.directory).cancel().message);
}

export async function handleIterationLoopStatus(
  args: z.infer<typeof iterationLoopStatusSchema>
): Promise<ToolResponse> {
  return text(formatLoopStatus(managerFor(args.directory).getStatus()));
}

export async function handleIterationLoopContext(
  args: z.infer<typeof iterationLoopContextSchema>
): Promise<ToolResponse> {
  return text(managerFor(args.directory).getCompactionContext() ?? 'No active iteration loop.');
}

/**
 * Registers iteration loop MCP tools
 */
export function registerIterationLoopTools(server: McpServer): void {
  server.tool(
    iterationLoopStartTool.name,
    iterationLoopStartTool.description,
    iterationLoopStartSchema.shape,
    async (args) => handleIterationLoopStart(args)
  );

  server.tool(
    iterationLoopCancelTool.name,
    iterationLoopCancelTool.description,
    iterationLoopCancelSchema.shape,
    async (args) => handleIterationLoopCancel(args)
  );

  server.tool(
    iterationLoopStatusTool.name,
    iterationLoopStatusTool.description,
    iterationLoopStatusSchema.shape,
    async (args) => handleIterationLoopStatus(args)
  );

  server.tool(
    iterationLoopContextTool.name,
    iterationLoopContextTool.description,
    iterationLoopContextSchema.shape,
    async (args) => handleIterationLoopContext(args)
  );
}
