// src/tools/index.ts

export {
  iterationLoopStartTool, iterationLoopStartSchema, handleIterationLoopStart,
  iterationLoopCancelTool, iterationLoopCancelSchema, handleIterationLoopCancel,
  iterationLoopStatusTool, iterationLoopStatusSchema, handleIterationLoopStatus,
  iterationLoopContextTool, iterationLoopContextSchema, handleIterationLoopContext,
  registerIterationLoopTools
} from './iteration-loop.js';
export type { ToolResponse } from './iteration-loop.js';
