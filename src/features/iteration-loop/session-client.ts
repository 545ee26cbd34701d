// src/features/iteration-loop/session-client.ts

/**
 * Adapters from the host session client to the controller's collaborators.
 * Both reject with CollaboratorError when the host call fails.
 */

import type { HistoryReader, PromptDispatcher, SessionClient } from './types.js';
import { extractLastAssistantText } from './detector.js';
import { CollaboratorError } from '../../utils/errors.js';

export function createHistoryReader(client: SessionClient): HistoryReader {
  return {
    async fetchLatestAssistantText(sessionId: string): Promise<string> {
      let response: Awaited<ReturnType<SessionClient['session']['messages']>>;
      try {
        response = await client.session.messages({ path: { id: sessionId } });
      } catch (error) {
        throw new CollaboratorError('history', error);
      }
      const messages = Array.isArray(response) ? response : response.data ?? [];
      return extractLastAssistantText(messages);
    }
  };
}

export function createPromptDispatcher(client: SessionClient): PromptDispatcher {
  return {
    async dispatch(sessionId: string, text: string): Promise<void> {
      try {
        await client.session.prompt({
          path: { id: sessionId },
          body: { parts: [{ type: 'text', text }] }
        });
      } catch (error) {
        throw new CollaboratorError('dispatch', error);
      }
    }
  };
}
