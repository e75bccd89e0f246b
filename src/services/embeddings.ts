/**
 * Embedding Service
 * Generates embeddings for course chunks and queries through the OpenAI embeddings API
 */

import OpenAI from 'openai';
import { env } from '../env.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('embeddings');

let openaiClient: OpenAI | null = null;

export type EmbedFn = (texts: string[]) => Promise<(number[] | null)[]>;

/**
 * Only creates a client if OPENAI_API_KEY is available
 */
function getOpenAIClient(): OpenAI | null {
  if (openaiClient) {
    return openaiClient;
  }

  if (!env.OPENAI_API_KEY) {
    return null;
  }

  openaiClient = new OpenAI({
    apiKey: env.OPENAI_API_KEY,
    baseURL: env.OPENAI_BASE_URL || undefined,
  });
  return openaiClient;
}

/**
 * Generate embeddings for multiple texts in batches.
 * A failed batch yields nulls for its entries instead of failing the whole call.
 */
export async function generateEmbeddingsBatch(
  texts: string[],
  batchSize = 100
): Promise<(number[] | null)[]> {
  const client = getOpenAIClient();
  if (!client) {
    return texts.map(() => null);
  }

  const embeddings: (number[] | null)[] = [];

  for (let i = 0; i < texts.length; i += batchSize) {
    const batch = texts.slice(i, i + batchSize);

    try {
      const response = await client.embeddings.create({
        model: env.EMBEDDING_MODEL,
        input: batch,
        encoding_format: 'float',
      });

      embeddings.push(...response.data.map((d) => d.embedding));
    } catch (error) {
      log.error({ err: error, from: i, to: i + batch.length }, 'Error generating embeddings for batch');
      embeddings.push(...batch.map(() => null));
    }
  }

  return embeddings;
}

export function areEmbeddingsAvailable(): boolean {
  return !!env.OPENAI_API_KEY;
}

/**
 * Cosine similarity between two vectors; 0 when either has no magnitude
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have the same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  normA = Math.sqrt(normA);
  normB = Math.sqrt(normB);

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (normA * normB);
}
