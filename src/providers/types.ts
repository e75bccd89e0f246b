// Completion provider contract
// Every provider maps its wire format onto these content blocks and stop reasons

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

export type AssistantContent = TextBlock | ToolUseBlock;

export type ConversationMessage =
  | { role: 'user'; content: string | ToolResultBlock[] }
  | { role: 'assistant'; content: string | AssistantContent[] };

export interface ToolSchema {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

export interface JsonSchemaProperty {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description: string;
  enum?: string[];
  default?: string | number | boolean;
}

export type ToolChoice = 'auto';

export type StopReason = 'end' | 'tool_use';

export interface CompletionRequest {
  system: string;
  messages: ConversationMessage[];
  tools?: ToolSchema[];
  toolChoice?: ToolChoice;
}

export interface CompletionUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResponse {
  stopReason: StopReason;
  content: AssistantContent[];
  usage?: CompletionUsage;
}

export interface CompletionClient {
  name: string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface CompletionSettings {
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs?: number;
}
