// OpenAI Provider
// Chat Completions through the official SDK; works with any OpenAI-compatible endpoint

import OpenAI from 'openai';
import { env } from '../env.js';
import { componentLogger } from '../logger.js';
import { ProviderError, describeError } from '../utils/errors.js';
import type {
  AssistantContent,
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  CompletionSettings,
  ConversationMessage,
  ToolSchema,
} from './types.js';

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;
type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;
type ChatCompletionParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

const log = componentLogger('openai');

/** The slice of the SDK client this provider calls. */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(body: ChatCompletionParams): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAIProviderOptions extends Partial<CompletionSettings> {
  apiKey?: string;
  baseUrl?: string;
  client?: ChatCompletionsApi;
}

function parseArguments(raw: string): Record<string, unknown> {
  if (!raw.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    log.warn({ err: describeError(error) }, 'Tool call arguments are not valid JSON');
  }
  return {};
}

export class OpenAIProvider implements CompletionClient {
  name = 'openai';
  private client: ChatCompletionsApi;
  private settings: CompletionSettings;

  constructor(options: OpenAIProviderOptions = {}) {
    this.settings = {
      model: options.model ?? env.OPENAI_MODEL,
      maxTokens: options.maxTokens ?? env.MAX_TOKENS,
      temperature: options.temperature ?? env.TEMPERATURE,
      timeoutMs: options.timeoutMs ?? env.REQUEST_TIMEOUT_MS,
    };

    if (options.client) {
      this.client = options.client;
      return;
    }

    const apiKey = options.apiKey ?? env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ProviderError(this.name, 'OPENAI_API_KEY not configured');
    }

    const baseURL = options.baseUrl ?? env.OPENAI_BASE_URL;
    this.client = new OpenAI({
      apiKey,
      baseURL: baseURL || undefined,
      timeout: this.settings.timeoutMs,
      // the orchestrator handles transport failures itself
      maxRetries: 0,
    });
  }

  private formatMessages(system: string, messages: ConversationMessage[]): ChatMessage[] {
    const formatted: ChatMessage[] = [{ role: 'system', content: system }];

    for (const m of messages) {
      if (m.role === 'user') {
        if (typeof m.content === 'string') {
          formatted.push({ role: 'user', content: m.content });
        } else {
          for (const result of m.content) {
            formatted.push({ role: 'tool', tool_call_id: result.tool_use_id, content: result.content });
          }
        }
        continue;
      }

      if (typeof m.content === 'string') {
        formatted.push({ role: 'assistant', content: m.content });
        continue;
      }

      const text = m.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('');
      const toolCalls = m.content.flatMap(block =>
        block.type === 'tool_use'
          ? [{
              id: block.id,
              type: 'function' as const,
              function: { name: block.name, arguments: JSON.stringify(block.input) },
            }]
          : [],
      );

      formatted.push({
        role: 'assistant',
        content: text || null,
        ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
      });
    }

    return formatted;
  }

  private formatTools(tools: ToolSchema[]): ChatTool[] {
    return tools.map(tool => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      },
    }));
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const withTools = !!request.tools && request.tools.length > 0;

    const completion = await this.client.chat.completions.create({
      model: this.settings.model,
      max_tokens: this.settings.maxTokens,
      temperature: this.settings.temperature,
      messages: this.formatMessages(request.system, request.messages),
      ...(withTools && request.tools
        ? { tools: this.formatTools(request.tools), tool_choice: request.toolChoice ?? 'auto' }
        : {}),
    });

    const choice = completion.choices[0];
    if (!choice) {
      throw new ProviderError(this.name, 'OpenAI response contained no choices');
    }

    const content: AssistantContent[] = [];
    if (choice.message.content) {
      content.push({ type: 'text', text: choice.message.content });
    }
    for (const call of choice.message.tool_calls ?? []) {
      content.push({
        type: 'tool_use',
        id: call.id,
        name: call.function.name,
        input: parseArguments(call.function.arguments),
      });
    }

    const hasToolCalls = content.some(block => block.type === 'tool_use');

    return {
      stopReason: choice.finish_reason === 'tool_calls' || hasToolCalls ? 'tool_use' : 'end',
      content,
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      },
    };
  }
}
