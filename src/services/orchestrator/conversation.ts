// Conversation helpers for the tool loop: size accounting, text extraction and
// the deterministic summary used when the loop cannot finish normally

import type {
  CompletionResponse,
  ConversationMessage,
  ToolResultBlock,
  ToolUseBlock,
} from '../../providers/types.js';
import type { FallbackReason, ToolResult } from './types.js';

export const RESULT_SEPARATOR = '\n\n';

export const NO_FINAL_RESPONSE = 'I completed my searches but was unable to generate a final response.';

/** Serialized character length of every turn's content. */
export function conversationLength(messages: ConversationMessage[]): number {
  return messages.reduce(
    (total, m) => total + (typeof m.content === 'string' ? m.content.length : JSON.stringify(m.content).length),
    0,
  );
}

export function extractText(response: CompletionResponse): string {
  return response.content
    .map(block => (block.type === 'text' ? block.text : ''))
    .join('');
}

export function toolUseBlocks(response: CompletionResponse): ToolUseBlock[] {
  return response.content.filter((block): block is ToolUseBlock => block.type === 'tool_use');
}

export function toResultBlock(result: ToolResult): ToolResultBlock {
  return {
    type: 'tool_result',
    tool_use_id: result.toolUseId,
    content: result.content,
    ...(result.success ? {} : { is_error: true }),
  };
}

export function apologize(errorMessage: string): string {
  return `I encountered an error while processing your question: ${errorMessage}. Please try rephrasing your question.`;
}

const LEADS: Record<FallbackReason, string> = {
  transport_error: 'I ran into an error before I could finish my answer.',
  size_limit: 'My searches returned more material than I can work through in one answer.',
  round_limit: 'I reached the maximum number of search rounds.',
};

/**
 * Builds the fallback answer from the successful tool results gathered so far.
 * Round 0, or no successful results, means nothing usable was retrieved.
 */
export function summarizeToolResults(
  results: ToolResult[],
  round: number,
  reason: FallbackReason,
  limit: number
): string {
  const usable = results.filter(r => r.success && r.content.trim().length > 0).slice(0, limit);

  if (round === 0 || usable.length === 0) {
    return `${LEADS[reason]} No tool executions succeeded, so I have no results to share. Please try rephrasing your question.`;
  }

  const rounds = round === 1 ? '1 round' : `${round} rounds`;
  return `${LEADS[reason]} Here are the partial results from ${rounds} of searching:${RESULT_SEPARATOR}${usable
    .map(r => r.content)
    .join(RESULT_SEPARATOR)}`;
}
