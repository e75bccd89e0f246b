// Environment configuration for the course assistant API
// Load provider credentials, loop bounds and store settings from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseFloatInRange(
  value: string | undefined,
  defaultValue: number,
  name: string,
  min: number,
  max: number,
): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed < min || parsed > max) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export type CompletionProviderName = 'anthropic' | 'openai';

function parseProvider(value: string | undefined): CompletionProviderName {
  const name = strEnv(value, 'anthropic').toLowerCase();
  if (name === 'anthropic' || name === 'openai') {
    return name;
  }
  console.error(`Invalid COMPLETION_PROVIDER "${value}", using default anthropic`);
  return 'anthropic';
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8000),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || 'http://localhost:8000,http://127.0.0.1:8000')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Completion service
  COMPLETION_PROVIDER: parseProvider(process.env.COMPLETION_PROVIDER),
  ANTHROPIC_API_KEY: strEnv(process.env.ANTHROPIC_API_KEY),
  ANTHROPIC_BASE_URL: strEnv(process.env.ANTHROPIC_BASE_URL, 'https://api.anthropic.com'),
  ANTHROPIC_MODEL: strEnv(process.env.ANTHROPIC_MODEL, 'claude-sonnet-4-20250514'),
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL),
  OPENAI_MODEL: strEnv(process.env.OPENAI_MODEL, 'gpt-4o-mini'),
  MAX_TOKENS: parsePositiveInt(process.env.MAX_TOKENS, 800, 'MAX_TOKENS'),
  TEMPERATURE: parseFloatInRange(process.env.TEMPERATURE, 0, 'TEMPERATURE', 0, 2),
  REQUEST_TIMEOUT_MS: parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 60000, 'REQUEST_TIMEOUT_MS'),

  // Tool loop bounds
  TOOLS_ENABLED: process.env.TOOLS_ENABLED !== 'false', // Default true
  MAX_TOOL_ROUNDS: parsePositiveInt(process.env.MAX_TOOL_ROUNDS, 2, 'MAX_TOOL_ROUNDS'),
  MAX_CONVERSATION_CHARS: parsePositiveInt(process.env.MAX_CONVERSATION_CHARS, 15000, 'MAX_CONVERSATION_CHARS'),
  SUMMARY_RESULT_LIMIT: parsePositiveInt(process.env.SUMMARY_RESULT_LIMIT, 3, 'SUMMARY_RESULT_LIMIT'),

  // Course store
  COURSES_PATH: strEnv(process.env.COURSES_PATH, 'data/courses.json'),
  EMBEDDING_MODEL: strEnv(process.env.EMBEDDING_MODEL, 'text-embedding-3-small'),
  CHUNK_SIZE: parsePositiveInt(process.env.CHUNK_SIZE, 800, 'CHUNK_SIZE'),
  CHUNK_OVERLAP: parsePositiveInt(process.env.CHUNK_OVERLAP, 100, 'CHUNK_OVERLAP'),
  MAX_RESULTS: parsePositiveInt(process.env.MAX_RESULTS, 5, 'MAX_RESULTS'),

  // Sessions
  MAX_HISTORY: parsePositiveInt(process.env.MAX_HISTORY, 2, 'MAX_HISTORY'),
  SESSION_TTL_MS: parsePositiveInt(process.env.SESSION_TTL_MS, 30 * 60 * 1000, 'SESSION_TTL_MS'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function isProviderConfigured(provider: string): boolean {
  switch (provider) {
    case 'anthropic':
      return !!env.ANTHROPIC_API_KEY;
    case 'openai':
      return !!env.OPENAI_API_KEY;
    default:
      return false;
  }
}

export function listConfiguredProviders(): CompletionProviderName[] {
  const providers: CompletionProviderName[] = ['anthropic', 'openai'];
  return providers.filter(isProviderConfigured);
}

// Log configuration on startup (secrets are never printed)
export function logConfiguration() {
  const configured = listConfiguredProviders();
  console.log('Course Assistant API Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Completion provider: ${env.COMPLETION_PROVIDER}`);
  console.log(`  Configured providers: ${configured.join(', ') || 'none'}`);
  console.log(`  Tools enabled: ${env.TOOLS_ENABLED}`);
  console.log(`  Max tool rounds: ${env.MAX_TOOL_ROUNDS}`);
  console.log(`  Max conversation chars: ${env.MAX_CONVERSATION_CHARS}`);
  console.log(`  Course catalog: ${env.COURSES_PATH}`);
  console.log(`  Embeddings: ${env.OPENAI_API_KEY ? env.EMBEDDING_MODEL : 'disabled (term scoring)'}`);
}
