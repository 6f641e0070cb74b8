// Builds the shared stores and clients for the HTTP server and the MCP server
import type { AppConfig } from '@/config/app.config';
import { createDatabase, databasePath } from '@/db';
import { SqlPlanRepository } from '@/db/plan-repository';
import { VectorProfileMemory } from '@/db/profile-memory';
import type { NutritionToolDeps } from '@/mcp/handlers';
import { createSessionStore } from '@/memory/createSessionStore';
import type { PipelineServices } from '@/pipeline/types';
import { ProviderLlmClient } from '@/services/llm-client';
import type { LlmClient } from '@/services/model-router';
import { OpenAIEmbedder } from '@/services/providers/openai-embedder';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import { SimpleEmbedder } from '@/services/providers/simple-embedder';

export interface StoreHandle extends NutritionToolDeps {
  close(): void;
}

export interface AppServices {
  services: PipelineServices;
  llm: LlmClient;
  close(): Promise<void>;
}

function createEmbedder(config: AppConfig): Embedder {
  return config.embedder === 'openai'
    ? new OpenAIEmbedder(config.openai.apiKey, config.openai.embeddingModel)
    : new SimpleEmbedder(64);
}

/** Profile memory and plan repository over one SQLite database. */
export function createStores(config: AppConfig, filename: string = databasePath(config.dataDir)): StoreHandle {
  const database = createDatabase(filename);
  return {
    memory: new VectorProfileMemory(database.db, createEmbedder(config), { minScore: config.profileRecallMinScore }),
    plans: new SqlPlanRepository(database.db),
    close: () => database.close(),
  };
}

export async function createAppServices(config: AppConfig): Promise<AppServices> {
  const stores = createStores(config);
  const sessions = await createSessionStore(config.sessions);
  const llm = new ProviderLlmClient({
    apiKey: config.openai.apiKey,
    models: { small: config.openai.smallModel, main: config.openai.mainModel },
    retry: config.llmRetry,
  });

  return {
    services: { sessions, memory: stores.memory, plans: stores.plans },
    llm,
    close: async () => {
      await sessions.close();
      stores.close();
    },
  };
}
