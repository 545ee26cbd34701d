/**
 * Integration tests for the host plugin bridge
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createIterationLoopPlugin, eventSessionId } from '../plugin.js';
import type { CompactingOutput, IterationLoopPlugin } from '../plugin.js';
import { loadState } from '../features/iteration-loop/index.js';
import type { SessionClient, SessionMessage } from '../features/iteration-loop/index.js';
import { ITERATION_LOOP_COMPACTION_HOOK_ID, ITERATION_LOOP_IDLE_HOOK_ID } from '../hooks/index.js';

type MessagesResponse = SessionMessage[] | { data?: SessionMessage[] };
type PromptArgs = Parameters<SessionClient['session']['prompt']>[0];

function history(reply: string): SessionMessage[] {
  return [
    { info: { role: 'user' }, parts: [{ type: 'text', text: 'Build a todo API' }] },
    { info: { role: 'assistant' }, parts: [{ type: 'text', text: reply }] }
  ];
}

function idleEvent(sessionID: string) {
  return { event: { type: 'session.idle', properties: { sessionID } } };
}

describe('iteration loop plugin', () => {
  let workspace: string;
  let messages: Mock<(args: { path: { id: string } }) => Promise<MessagesResponse>>;
  let prompt: Mock<(args: PromptArgs) => Promise<unknown>>;
  let plugin: IterationLoopPlugin;

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), 'iteration-loop-plugin-'));
    messages = vi.fn(async (_args: { path: { id: string } }): Promise<MessagesResponse> => history('Working on it'));
    prompt = vi.fn(async (_args: PromptArgs): Promise<unknown> => ({}));
    plugin = createIterationLoopPlugin({ directory: workspace, client: { session: { messages, prompt } } });
  });

  afterEach(() => {
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  it('should register the idle and compaction hooks', () => {
    expect(plugin.hooks.getHooks('onSessionIdle').map((hook) => hook.id)).toEqual([ITERATION_LOOP_IDLE_HOOK_ID]);
    expect(plugin.hooks.getHooks('onSessionCompacting').map((hook) => hook.id)).toEqual([
      ITERATION_LOOP_COMPACTION_HOOK_ID
    ]);
  });

  it('should start a loop through the tools', async () => {
    const message = await plugin.tools.start('Build a todo API --max-iterations 5 --completion-promise SHIPPED');

    expect(message.split('\n')[0]).toBe('Iteration loop initialized for this workspace.');
    expect(loadState(workspace)).toEqual({
      iteration: 1,
      maxIterations: 5,
      completionMarker: 'SHIPPED',
      taskPrompt: 'Build a todo API'
    });
  });

  it('should reject a start command without a prompt', async () => {
    await expect(plugin.tools.start('--max-iterations 5')).rejects.toThrow(
      'No prompt provided. Include a task description before any flags.'
    );
  });

  it('should advance the loop on session.idle', async () => {
    await plugin.tools.start('Build a todo API --max-iterations 5');

    await plugin.event(idleEvent('ses_1'));

    expect(messages).toHaveBeenCalledWith({ path: { id: 'ses_1' } });
    expect(prompt).toHaveBeenCalledWith({
      path: { id: 'ses_1' },
      body: {
        parts: [{
          type: 'text',
          text: '🔄 Iteration loop: iteration 2/5\n' +
            'No completion marker configured - the loop runs until max iterations are reached.\n' +
            '\n' +
            'Build a todo API'
        }]
      }
    });
    expect(loadState(workspace)?.iteration).toBe(2);
  });

  it('should read the session id from event info', async () => {
    await plugin.tools.start('Build a todo API --max-iterations 5');

    await plugin.event({ event: { type: 'session.idle', properties: { info: { id: 'ses_2' } } } });

    expect(messages).toHaveBeenCalledWith({ path: { id: 'ses_2' } });
  });

  it('should accept history wrapped in a data field', async () => {
    await plugin.tools.start('Build a todo API --max-iterations 5 --completion-promise SHIPPED');
    messages.mockResolvedValueOnce({ data: history('<promise>SHIPPED</promise>') });

    await plugin.event(idleEvent('ses_1'));

    expect(loadState(workspace)).toBeNull();
    expect(prompt).toHaveBeenCalledTimes(1);
  });

  it('should ignore other events and events without a session', async () => {
    await plugin.tools.start('Build a todo API --max-iterations 5');

    await plugin.event({ event: { type: 'session.updated', properties: { sessionID: 'ses_1' } } });
    await plugin.event({ event: { type: 'session.idle' } });

    expect(messages).not.toHaveBeenCalled();
    expect(loadState(workspace)?.iteration).toBe(1);
  });

  it('should advance once for overlapping idle events', async () => {
    await plugin.tools.start('Build a todo API --max-iterations 5');
    const pending: Array<(response: MessagesResponse) => void> = [];
    messages.mockImplementationOnce(
      () => new Promise<MessagesResponse>((resolve) => {
        pending.push(resolve);
      })
    );

    const first = plugin.event(idleEvent('ses_1'));
    await plugin.event(idleEvent('ses_1'));
    pending.forEach((resolve) => resolve(history('Still going')));
    await first;

    expect(messages).toHaveBeenCalledTimes(1);
    expect(prompt).toHaveBeenCalledTimes(1);
    expect(loadState(workspace)?.iteration).toBe(2);
  });

  it('should add the loop facts to compaction context', async () => {
    await plugin.tools.start('Build a todo API --max-iterations 5 --completion-promise SHIPPED');
    const output: CompactingOutput = { context: ['existing'] };

    await plugin['experimental.session.compacting']({ sessionID: 'ses_1' }, output);

    expect(output.context).toEqual([
      'existing',
      '## Iteration Loop State\nIteration: 1\nMax iterations: 5\nCompletion marker: SHIPPED'
    ]);
  });

  it('should leave compaction context alone without a loop', async () => {
    const output: CompactingOutput = { context: [] };

    await plugin['experimental.session.compacting']({}, output);

    expect(output.context).toEqual([]);
  });

  it('should report status and cancel through the tools', async () => {
    await plugin.tools.start('Build a todo API --max-iterations 5');

    expect((await plugin.tools.status()).split('\n')[1]).toBe('Status: active');
    expect(await plugin.tools.cancel()).toBe('Cancelled iteration loop (was at iteration 1, max_iterations=5).');
    expect((await plugin.tools.status()).split('\n')[1]).toBe('Status: inactive');
  });

  it('should keep state in the worktree when one is given', async () => {
    const elsewhere = fs.mkdtempSync(path.join(os.tmpdir(), 'iteration-loop-subdir-'));
    try {
      const scoped = createIterationLoopPlugin({
        directory: elsewhere,
        worktree: workspace,
        client: { session: { messages, prompt } }
      });

      await scoped.tools.start('Task --max-iterations 2');

      expect(loadState(workspace)?.taskPrompt).toBe('Task');
      expect(loadState(elsewhere)).toBeNull();
    } finally {
      fs.rmSync(elsewhere, { recursive: true, force: true });
    }
  });
});

describe('eventSessionId', () => {
  it('should prefer sessionID over info.id', () => {
    expect(eventSessionId({ event: { type: 'session.idle', properties: { sessionID: 'a', info: { id: 'b' } } } })).toBe('a');
  });

  it('should return null for blank or missing ids', () => {
    expect(eventSessionId({ event: { type: 'session.idle', properties: { sessionID: '  ' } } })).toBeNull();
    expect(eventSessionId({ event: { type: 'session.idle', properties: { info: { id: 7 } } } })).toBeNull();
    expect(eventSessionId({ event: { type: 'session.idle' } })).toBeNull();
  });
});
