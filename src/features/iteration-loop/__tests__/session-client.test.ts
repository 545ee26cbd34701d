/**
 * Unit tests for the host session client adapters
 */

import { describe, it, expect, vi } from 'vitest';
import { createHistoryReader, createPromptDispatcher } from '../session-client.js';
import type { SessionClient } from '../types.js';
import { CollaboratorError } from '../../../utils/errors.js';

function failingClient(): SessionClient {
  return {
    session: {
      messages: vi.fn(async () => {
        throw new Error('session not found');
      }),
      prompt: vi.fn(async () => {
        throw new Error('session busy');
      })
    }
  };
}

describe('session client adapters', () => {
  it('should read the last assistant text from a data-wrapped response', async () => {
    const reader = createHistoryReader({
      session: {
        messages: vi.fn(async () => ({
          data: [{ info: { role: 'assistant' }, parts: [{ type: 'text', text: 'done for now' }] }]
        })),
        prompt: vi.fn(async () => ({}))
      }
    });

    await expect(reader.fetchLatestAssistantText('ses_1')).resolves.toBe('done for now');
  });

  it('should wrap history failures', async () => {
    const error = await createHistoryReader(failingClient()).fetchLatestAssistantText('ses_1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CollaboratorError);
    expect(error).toMatchObject({
      collaborator: 'history',
      code: 'LOOP_COLLABORATOR',
      message: 'history collaborator failed: session not found'
    });
  });

  it('should wrap dispatch failures', async () => {
    const error = await createPromptDispatcher(failingClient()).dispatch('ses_1', 'next').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CollaboratorError);
    expect(error).toMatchObject({
      collaborator: 'dispatch',
      message: 'dispatch collaborator failed: session busy'
    });
  });
});
