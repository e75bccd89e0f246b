// Anthropic Provider
// Uses direct REST calls against the Messages API (any compatible base URL works)

import { z } from 'zod';
import { env } from '../env.js';
import { ProviderError } from '../utils/errors.js';
import type {
  AssistantContent,
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  CompletionSettings,
  ConversationMessage,
  ToolSchema,
} from './types.js';

const ANTHROPIC_VERSION = '2023-06-01';

const TextBlockSchema = z.object({ type: z.literal('text'), text: z.string() });

const ToolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string(),
  name: z.string(),
  input: z.record(z.unknown()),
});

const MessagesResponseSchema = z.object({
  stop_reason: z.string().nullable().optional(),
  content: z.array(z.object({ type: z.string() }).passthrough()),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

// thinking blocks and unknown block types are dropped
function toAssistantBlock(block: unknown): AssistantContent | null {
  const text = TextBlockSchema.safeParse(block);
  if (text.success) return text.data;

  const toolUse = ToolUseBlockSchema.safeParse(block);
  if (toolUse.success) return toolUse.data;

  return null;
}

function flattenContent(message: ConversationMessage): string {
  if (message.role === 'user') {
    if (typeof message.content === 'string') return message.content;
    return message.content.map(result => `Tool result:\n${result.content}`).join('\n\n');
  }

  if (typeof message.content === 'string') return message.content;
  return message.content
    .map(block =>
      block.type === 'text' ? block.text : `[Called tool ${block.name} with ${JSON.stringify(block.input)}]`,
    )
    .filter(text => text.length > 0)
    .join('\n');
}

export interface AnthropicProviderOptions extends Partial<CompletionSettings> {
  apiKey?: string;
  baseUrl?: string;
}

export class AnthropicProvider implements CompletionClient {
  name = 'anthropic';
  private apiKey: string;
  private baseUrl: string;
  private settings: CompletionSettings;

  constructor(options: AnthropicProviderOptions = {}) {
    this.apiKey = options.apiKey ?? env.ANTHROPIC_API_KEY;
    if (!this.apiKey) {
      throw new ProviderError(this.name, 'ANTHROPIC_API_KEY not configured');
    }
    this.baseUrl = (options.baseUrl ?? env.ANTHROPIC_BASE_URL).replace(/\/+$/, '');
    this.settings = {
      model: options.model ?? env.ANTHROPIC_MODEL,
      maxTokens: options.maxTokens ?? env.MAX_TOKENS,
      temperature: options.temperature ?? env.TEMPERATURE,
      timeoutMs: options.timeoutMs ?? env.REQUEST_TIMEOUT_MS,
    };
  }

  private formatMessages(messages: ConversationMessage[], withTools: boolean) {
    // Block lists already use the Messages API field names
    if (withTools) {
      return messages.map(m => ({ role: m.role, content: m.content }));
    }
    // Tool blocks are only accepted alongside declared tools; otherwise send them as text
    return messages.map(m => ({ role: m.role, content: flattenContent(m) }));
  }

  private formatTools(tools: ToolSchema[]) {
    return tools.map(tool => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.parameters,
    }));
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const withTools = request.tools !== undefined && request.tools.length > 0;
    const body: Record<string, unknown> = {
      model: this.settings.model,
      max_tokens: this.settings.maxTokens,
      temperature: this.settings.temperature,
      system: request.system,
      messages: this.formatMessages(request.messages, withTools),
    };

    if (request.tools && withTools) {
      body.tools = this.formatTools(request.tools);
      body.tool_choice = { type: request.toolChoice ?? 'auto' };
    }

    const response = await fetch(`${this.baseUrl}/v1/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      body: JSON.stringify(body),
      signal: this.settings.timeoutMs ? AbortSignal.timeout(this.settings.timeoutMs) : undefined,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new ProviderError(this.name, `Anthropic API error (${response.status}): ${error}`, response.status);
    }

    const parsed = MessagesResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError(this.name, `Unexpected Anthropic response: ${parsed.error.message}`);
    }

    const content: AssistantContent[] = [];
    for (const block of parsed.data.content) {
      const mapped = toAssistantBlock(block);
      if (mapped) content.push(mapped);
    }

    const inputTokens = parsed.data.usage?.input_tokens ?? 0;
    const outputTokens = parsed.data.usage?.output_tokens ?? 0;

    return {
      stopReason: parsed.data.stop_reason === 'tool_use' ? 'tool_use' : 'end',
      content,
      usage: {
        promptTokens: inputTokens,
        completionTokens: outputTokens,
        totalTokens: inputTokens + outputTokens,
      },
    };
  }
}
