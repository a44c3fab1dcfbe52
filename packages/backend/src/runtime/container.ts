import type { AbstractRagStore } from "@chunkgraph/shared";
import { appConfig, type AppConfig } from "../config.js";
import { HybridSearchEngine, searchEngineConfigFrom } from "../search/HybridSearchEngine.js";
import { ChunkStore } from "../services/ChunkStore.js";
import type { AnswerSynthesizer, EmbeddingProvider } from "../services/embeddingTypes.js";
import { HashingEmbeddingProvider } from "../services/HashingEmbeddingProvider.js";
import { IndexRegistry } from "../services/IndexRegistry.js";
import { OpenAIAnswerSynthesizer } from "../services/OpenAIAnswerSynthesizer.js";
import { OpenAIEmbeddingProvider } from "../services/OpenAIEmbeddingProvider.js";
import { RelationshipGraph } from "../services/RelationshipGraph.js";
import { Neo4jRagStore } from "../store/Neo4jRagStore.js";

export interface RuntimeContainer {
  config: AppConfig;
  store: AbstractRagStore;
  embeddings: EmbeddingProvider;
  answerSynthesizer: AnswerSynthesizer | null;
  indexRegistry: IndexRegistry;
  chunkStore: ChunkStore;
  searchEngine: HybridSearchEngine;
  relationshipGraph: RelationshipGraph;
  /** Connects the store once; a failed attempt is retried on the next call. */
  ensureStoreConnected: () => Promise<void>;
}

export interface RuntimeOverrides {
  store?: AbstractRagStore;
  embeddings?: EmbeddingProvider;
  answerSynthesizer?: AnswerSynthesizer | null;
}

export function createEmbeddingProvider(config: AppConfig): EmbeddingProvider {
  if (config.EMBEDDING_PROVIDER === "hashing") {
    return new HashingEmbeddingProvider(config.DEFAULT_EMBEDDING_DIMENSION);
  }
  return OpenAIEmbeddingProvider.fromConfig(config);
}

export function createAnswerSynthesizer(config: AppConfig): AnswerSynthesizer | null {
  return config.ANSWER_SYNTHESIS_ENABLED ? OpenAIAnswerSynthesizer.fromConfig(config) : null;
}

export function createRuntimeContainer(
  config: AppConfig = appConfig,
  overrides: RuntimeOverrides = {}
): RuntimeContainer {
  const store = overrides.store ?? Neo4jRagStore.fromConfig(config);
  const embeddings = overrides.embeddings ?? createEmbeddingProvider(config);
  const answerSynthesizer =
    overrides.answerSynthesizer !== undefined
      ? overrides.answerSynthesizer
      : createAnswerSynthesizer(config);

  let connectPromise: Promise<void> | null = null;
  const ensureStoreConnected = (): Promise<void> => {
    if (connectPromise) {
      return connectPromise;
    }
    connectPromise = store.connect().catch((error: unknown) => {
      connectPromise = null;
      throw error;
    });
    return connectPromise;
  };

  return {
    config,
    store,
    embeddings,
    answerSynthesizer,
    indexRegistry: new IndexRegistry(store, config.DEFAULT_EMBEDDING_DIMENSION),
    chunkStore: new ChunkStore(store, embeddings),
    searchEngine: new HybridSearchEngine(store, embeddings, searchEngineConfigFrom(config)),
    relationshipGraph: new RelationshipGraph(store, config.ANALYTICS_SAMPLE_SIZE),
    ensureStoreConnected
  };
}
