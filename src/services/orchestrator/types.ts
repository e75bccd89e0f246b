// Orchestrator Types

export enum LoopState {
  INIT = 'init',
  AWAITING_COMPLETION = 'awaiting_completion',
  DIRECT_ANSWER = 'direct_answer',
  TOOL_ROUND = 'tool_round',
  EXECUTING_TOOLS = 'executing_tools',
  AWAITING_FOLLOWUP = 'awaiting_followup',
  ROUND_LIMIT = 'round_limit',
  DONE = 'done',
  FAILED = 'failed',
}

export interface ToolResult {
  toolUseId: string;
  content: string;
  success: boolean;
}

export interface RoundState {
  round: number;
  maxRounds: number;
  conversationChars: number;
}

export type FallbackReason = 'transport_error' | 'size_limit' | 'round_limit';

export interface OrchestratorOptions {
  maxRounds?: number;
  maxConversationChars?: number;
  summaryResultLimit?: number;
  systemPrompt?: string;
}

export interface OrchestratorAnswer {
  answer: string;
  sources: string[];
}
