// Course Assistant API
// Port: 8000 (localhost by default)

// Load environment variables from .env file
import 'dotenv/config';

import { env, logConfiguration } from './env.js';
import { logger } from './logger.js';
import { buildServer } from './app.js';
import { getCompletionClient } from './providers/index.js';
import { CourseStore } from './services/course-store.js';
import { loadCourses, readCourseCatalog } from './services/course-loader.js';
import { areEmbeddingsAvailable, generateEmbeddingsBatch } from './services/embeddings.js';
import { createOrchestrator } from './services/orchestrator/index.js';
import { SessionManager } from './services/sessions.js';
import { RagService } from './services/rag.js';

const PORT = env.PORT;
const HOST = env.HOST;

try {
  const store = new CourseStore({
    chunkSize: env.CHUNK_SIZE,
    chunkOverlap: env.CHUNK_OVERLAP,
    maxResults: env.MAX_RESULTS,
    embed: areEmbeddingsAvailable() ? texts => generateEmbeddingsBatch(texts) : undefined,
  });
  await loadCourses(store, await readCourseCatalog(env.COURSES_PATH));

  const sessions = new SessionManager({ maxHistory: env.MAX_HISTORY, ttlMs: env.SESSION_TTL_MS });
  const orchestrator = createOrchestrator(getCompletionClient(env.COMPLETION_PROVIDER));
  const rag = new RagService({ store, orchestrator, sessions });

  const server = await buildServer({ rag });

  server.addHook('onClose', async () => {
    sessions.destroy();
  });

  await server.listen({ port: PORT, host: HOST });
  console.log(`Course Assistant API listening on http://${HOST}:${PORT}`);
  console.log(`Health: http://${HOST}:${PORT}/v1/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  logger.error({ err }, 'Startup failed');
  process.exit(1);
}
