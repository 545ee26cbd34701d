// src/index.ts

export * from './features/iteration-loop/index.js';
export * from './hooks/index.js';
export {
  createIterationLoopPlugin,
  eventSessionId
} from './plugin.js';
export type {
  PluginContext,
  IterationLoopPlugin,
  IterationLoopTools,
  HookEventPayload,
  CompactingInput,
  CompactingOutput
} from './plugin.js';
export { createServer, startServer } from './server.js';
export { LoopInputError, CollaboratorError } from './utils/errors.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
