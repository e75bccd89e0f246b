// Provider Registry
// Central registry for completion providers

import type { CompletionClient } from './types.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAIProvider } from './openai.js';
import { isProviderConfigured } from '../env.js';
import { ProviderError } from '../utils/errors.js';

// Provider instances (lazy initialization)
const providers: Map<string, CompletionClient> = new Map();

function getOrCreateProvider(name: string): CompletionClient | null {
  const cached = providers.get(name);
  if (cached) {
    return cached;
  }

  if (!isProviderConfigured(name)) {
    return null;
  }

  let provider: CompletionClient | null = null;

  switch (name) {
    case 'anthropic':
      provider = new AnthropicProvider();
      break;
    case 'openai':
      provider = new OpenAIProvider();
      break;
    default:
      return null;
  }

  providers.set(name, provider);
  return provider;
}

export function getCompletionClient(name: string): CompletionClient {
  const provider = getOrCreateProvider(name);

  if (!provider) {
    throw new ProviderError(name, `Provider "${name}" is not available or not configured`);
  }

  return provider;
}

export type {
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  ConversationMessage,
  ToolSchema,
} from './types.js';
