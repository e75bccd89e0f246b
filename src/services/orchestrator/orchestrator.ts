// Tool-calling orchestrator
// Drives the completion service through at most `maxRounds` tool rounds and always
// returns text: direct answers, forced closure at the round limit, or a summary fallback.

import { env } from '../../env.js';
import { componentLogger } from '../../logger.js';
import type {
  CompletionClient,
  CompletionResponse,
  ConversationMessage,
  ToolSchema,
} from '../../providers/types.js';
import { describeError } from '../../utils/errors.js';
import type { ToolRegistry } from '../tools/registry.js';
import {
  NO_FINAL_RESPONSE,
  apologize,
  conversationLength,
  extractText,
  summarizeToolResults,
  toResultBlock,
  toolUseBlocks,
} from './conversation.js';
import {
  LoopState,
  type FallbackReason,
  type OrchestratorAnswer,
  type OrchestratorOptions,
  type RoundState,
  type ToolResult,
} from './types.js';

const log = componentLogger('orchestrator');

export const SYSTEM_PROMPT = `You are an assistant for course materials and educational content, with tools for looking up course information.

Tool usage:
- Use search_course_content for questions about specific course content or lesson details
- Use get_course_outline for questions about a course's structure, link, instructor or lesson list
- You may make up to 2 sequential rounds of tool calls; start broad, then refine based on what you found
- Synthesize tool results into accurate, fact-based answers
- If a search yields no results, say so plainly

Response protocol:
- General knowledge questions: answer from your own knowledge without using tools
- Course-specific questions: look the material up first, then answer
- No meta-commentary: give the answer only, without describing your search process or mentioning "the search results"

Every answer should be educational, clear, supported by examples where they help, and well structured.`;

interface LoopContext {
  system: string;
  messages: ConversationMessage[];
  tools?: ToolSchema[];
  registry?: ToolRegistry;
  roundState: RoundState;
  results: ToolResult[];
}

export class ToolOrchestrator {
  private maxRounds: number;
  private maxConversationChars: number;
  private summaryResultLimit: number;
  private systemPrompt: string;

  constructor(private client: CompletionClient, options: OrchestratorOptions = {}) {
    this.maxRounds = Math.max(1, options.maxRounds ?? env.MAX_TOOL_ROUNDS);
    this.maxConversationChars = options.maxConversationChars ?? env.MAX_CONVERSATION_CHARS;
    this.summaryResultLimit = options.summaryResultLimit ?? env.SUMMARY_RESULT_LIMIT;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
  }

  /**
   * Answers `query`, letting the model call tools from `registry`.
   * Never rejects: transport failures and exhausted budgets become text.
   */
  async respond(
    query: string,
    history?: string,
    tools?: ToolSchema[],
    registry?: ToolRegistry
  ): Promise<string> {
    if (!registry) {
      return this.drive(query, history, tools);
    }
    return registry.runExclusive(() => this.drive(query, history, tools, registry));
  }

  /**
   * Like `respond`, but also returns the sources this invocation gathered. Both are
   * read inside the registry's exclusive section, so a session queued behind this
   * one cannot reset the registry before the sources are taken.
   */
  async respondWithSources(
    query: string,
    history: string | undefined,
    tools: ToolSchema[] | undefined,
    registry: ToolRegistry
  ): Promise<OrchestratorAnswer> {
    return registry.runExclusive(async () => {
      const answer = await this.drive(query, history, tools, registry);
      return { answer, sources: registry.allSources() };
    });
  }

  buildSystemPrompt(history?: string): string {
    return history ? `${this.systemPrompt}\n\nPrevious conversation:\n${history}` : this.systemPrompt;
  }

  private async drive(
    query: string,
    history?: string,
    tools?: ToolSchema[],
    registry?: ToolRegistry
  ): Promise<string> {
    const ctx: LoopContext = {
      system: this.buildSystemPrompt(history),
      messages: [{ role: 'user', content: query }],
      tools: tools && tools.length > 0 ? tools : undefined,
      registry,
      roundState: { round: 0, maxRounds: this.maxRounds, conversationChars: 0 },
      results: [],
    };

    registry?.reset();

    let state = LoopState.INIT;
    let response: CompletionResponse | null = null;
    let answer = '';

    while (state !== LoopState.DONE && state !== LoopState.FAILED) {
      log.debug({ state, round: ctx.roundState.round }, 'Loop state');

      switch (state) {
        case LoopState.INIT:
          state = LoopState.AWAITING_COMPLETION;
          break;

        case LoopState.AWAITING_COMPLETION:
          try {
            response = await this.client.complete({
              system: ctx.system,
              messages: ctx.messages,
              ...(ctx.tools ? { tools: ctx.tools, toolChoice: 'auto' as const } : {}),
            });
          } catch (error) {
            log.error({ err: describeError(error) }, 'Initial completion request failed');
            answer = apologize(describeError(error));
            state = LoopState.FAILED;
            break;
          }
          state = response.stopReason === 'tool_use' && ctx.registry && toolUseBlocks(response).length > 0
            ? LoopState.TOOL_ROUND
            : LoopState.DIRECT_ANSWER;
          break;

        case LoopState.DIRECT_ANSWER: {
          const text = response ? extractText(response) : '';
          answer = (text || ctx.roundState.round === 0) ? text : NO_FINAL_RESPONSE;
          state = LoopState.DONE;
          break;
        }

        case LoopState.TOOL_ROUND:
          if (response) {
            ctx.messages.push({ role: 'assistant', content: response.content });
          }
          state = LoopState.EXECUTING_TOOLS;
          break;

        case LoopState.EXECUTING_TOOLS: {
          const roundResults = response && ctx.registry ? await this.executeTools(response, ctx.registry) : [];
          ctx.results.push(...roundResults);
          ctx.messages.push({ role: 'user', content: roundResults.map(toResultBlock) });
          ctx.roundState.round++;
          ctx.roundState.conversationChars = conversationLength(ctx.messages);

          if (ctx.roundState.conversationChars > this.maxConversationChars) {
            log.warn(
              { chars: ctx.roundState.conversationChars, limit: this.maxConversationChars },
              'Conversation too long, summarizing collected results',
            );
            answer = this.fallback(ctx, 'size_limit');
            state = LoopState.DONE;
            break;
          }
          state = LoopState.AWAITING_FOLLOWUP;
          break;
        }

        case LoopState.AWAITING_FOLLOWUP: {
          // Schemas are attached only while the model may still open another round
          const mayContinue = ctx.roundState.round < ctx.roundState.maxRounds;
          try {
            response = await this.client.complete({
              system: ctx.system,
              messages: ctx.messages,
              ...(mayContinue && ctx.tools ? { tools: ctx.tools, toolChoice: 'auto' as const } : {}),
            });
          } catch (error) {
            log.error({ err: describeError(error), round: ctx.roundState.round }, 'Follow-up completion request failed');
            answer = this.fallback(ctx, 'transport_error');
            state = LoopState.FAILED;
            break;
          }

          if (response.stopReason !== 'tool_use' || toolUseBlocks(response).length === 0) {
            state = LoopState.DIRECT_ANSWER;
          } else if (mayContinue) {
            state = LoopState.TOOL_ROUND;
          } else {
            state = LoopState.ROUND_LIMIT;
          }
          break;
        }

        case LoopState.ROUND_LIMIT:
          log.warn({ rounds: ctx.roundState.round }, 'Tool round limit reached, forcing a final answer');
          try {
            const closing = await this.client.complete({ system: ctx.system, messages: ctx.messages });
            answer = extractText(closing) || NO_FINAL_RESPONSE;
            state = LoopState.DONE;
          } catch (error) {
            log.error({ err: describeError(error) }, 'Forced-closure request failed');
            answer = this.fallback(ctx, 'round_limit');
            state = LoopState.FAILED;
          }
          break;

        default:
          state = LoopState.FAILED;
      }
    }

    return answer;
  }

  // One call at a time, in the order the model emitted them
  private async executeTools(response: CompletionResponse, registry: ToolRegistry): Promise<ToolResult[]> {
    const results: ToolResult[] = [];

    for (const block of toolUseBlocks(response)) {
      const outcome = await registry.execute(block.name, block.input);
      results.push({ toolUseId: block.id, content: outcome.content, success: outcome.success });
    }

    return results;
  }

  private fallback(ctx: LoopContext, reason: FallbackReason): string {
    return summarizeToolResults(ctx.results, ctx.roundState.round, reason, this.summaryResultLimit);
  }
}

export function createOrchestrator(client: CompletionClient, options?: OrchestratorOptions): ToolOrchestrator {
  return new ToolOrchestrator(client, options);
}
