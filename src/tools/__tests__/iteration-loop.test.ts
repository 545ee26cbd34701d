/**
 * Tests for the iteration loop MCP tools
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import {
  handleIterationLoopCancel,
  handleIterationLoopContext,
  handleIterationLoopStart,
  handleIterationLoopStatus
} from '../iteration-loop.js';
import { createServer } from '../../server.js';
import { loadState } from '../../features/iteration-loop/index.js';

describe('iteration loop tools', () => {
  let workspace: string;

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), 'iteration-loop-tools-'));
  });

  afterEach(() => {
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  describe('handlers', () => {
    it('should start a loop in the given directory', async () => {
      const result = await handleIterationLoopStart({
        input: 'Build a todo API --max-iterations 5 --completion-promise SHIPPED',
        directory: workspace
      });

      expect(result.isError).toBeUndefined();
      expect(result.content[0]?.text.split('\n')[0]).toBe('Iteration loop initialized for this workspace.');
      expect(loadState(workspace)?.completionMarker).toBe('SHIPPED');
    });

    it('should report invalid start input as a tool error', async () => {
      const result = await handleIterationLoopStart({ input: '--max-iterations 3', directory: workspace });

      expect(result).toEqual({
        content: [{ type: 'text', text: 'Error: No prompt provided. Include a task description before any flags.' }],
        isError: true
      });
      expect(loadState(workspace)).toBeNull();
    });

    it('should cancel idempotently', async () => {
      await handleIterationLoopStart({ input: 'Task --max-iterations 4', directory: workspace });

      const first = await handleIterationLoopCancel({ directory: workspace });
      const second = await handleIterationLoopCancel({ directory: workspace });

      expect(first.content[0]?.text).toBe('Cancelled iteration loop (was at iteration 1, max_iterations=4).');
      expect(second.content[0]?.text).toBe(
        'No active iteration loop found (nothing to cancel; no `.opencode/iteration-loop.md` state file).'
      );
    });

    it('should report status', async () => {
      const inactive = await handleIterationLoopStatus({ directory: workspace });
      expect(inactive.content[0]?.text.split('\n')[1]).toBe('Status: inactive');

      await handleIterationLoopStart({ input: 'Task --max-iterations 4', directory: workspace });

      const active = await handleIterationLoopStatus({ directory: workspace });
      expect(active.content[0]?.text.split('\n').slice(1, 4)).toEqual([
        'Status: active',
        'Iteration: 1/4',
        'Completion marker: (none)'
      ]);
    });

    it('should return the compaction context', async () => {
      expect((await handleIterationLoopContext({ directory: workspace })).content[0]?.text).toBe(
        'No active iteration loop.'
      );

      await handleIterationLoopStart({ input: 'Task --completion-promise DONE', directory: workspace });

      expect((await handleIterationLoopContext({ directory: workspace })).content[0]?.text).toBe(
        '## Iteration Loop State\nIteration: 1\nMax iterations: 0 (unbounded)\nCompletion marker: DONE'
      );
    });
  });

  describe('MCP server', () => {
    it('should expose the tools to a connected client', async () => {
      const server = createServer();
      const client = new Client({ name: 'test-client', version: '1.0.0' });
      const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

      await server.connect(serverTransport);
      await client.connect(clientTransport);

      try {
        const { tools } = await client.listTools();
        expect(tools.map((tool) => tool.name).sort()).toEqual([
          'iteration_loop_cancel',
          'iteration_loop_context',
          'iteration_loop_start',
          'iteration_loop_status'
        ]);

        const result = await client.callTool({
          name: 'iteration_loop_start',
          arguments: { input: 'Build a todo API --max-iterations 5', directory: workspace }
        });

        expect(result.isError).toBeFalsy();
        expect(loadState(workspace)).toEqual({ iteration: 1, maxIterations: 5, taskPrompt: 'Build a todo API' });
      } finally {
        await client.close();
        await server.close();
      }
    });
  });
});
