// Orchestrator Module - Main exports

export { ToolOrchestrator, createOrchestrator, SYSTEM_PROMPT } from './orchestrator.js';
export { conversationLength, summarizeToolResults, apologize, NO_FINAL_RESPONSE } from './conversation.js';
export { LoopState } from './types.js';
export type { OrchestratorOptions, RoundState, ToolResult, FallbackReason, OrchestratorAnswer } from './types.js';
