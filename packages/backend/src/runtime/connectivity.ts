import type { AbstractRagStore, ServiceConnectionStatus } from "@chunkgraph/shared";
import type { AppConfig } from "../config.js";
import type { EmbeddingProvider } from "../services/embeddingTypes.js";

export function isNeo4jConfigured(
  config: Pick<AppConfig, "NEO4J_URI" | "NEO4J_USER" | "NEO4J_PASSWORD">
): boolean {
  return (
    config.NEO4J_URI.trim().length > 0 &&
    config.NEO4J_USER.trim().length > 0 &&
    config.NEO4J_PASSWORD.trim().length > 0
  );
}

export function isEmbeddingConfigured(
  config: Pick<AppConfig, "EMBEDDING_PROVIDER" | "EMBEDDING_API_KEY">
): boolean {
  return config.EMBEDDING_PROVIDER === "hashing" || config.EMBEDDING_API_KEY.trim().length > 0;
}

interface Neo4jConnectionOptions {
  store: AbstractRagStore;
  ensureStoreConnected: () => Promise<void>;
  configured: boolean;
}

interface EmbeddingConnectionOptions {
  embeddings: EmbeddingProvider;
  configured: boolean;
  probeText?: string;
}

export async function checkNeo4jConnection(
  options: Neo4jConnectionOptions
): Promise<ServiceConnectionStatus> {
  if (!options.configured) {
    return "not_configured";
  }

  try {
    await options.ensureStoreConnected();
    const healthy = await options.store.healthCheck();
    return healthy ? "ok" : "failed";
  } catch {
    return "failed";
  }
}

export async function checkEmbeddingConnection(
  options: EmbeddingConnectionOptions
): Promise<ServiceConnectionStatus> {
  if (!options.configured) {
    return "not_configured";
  }

  try {
    const vector = await options.embeddings.embed(options.probeText ?? "ping", { dimension: 8 });
    return vector.length > 0 ? "ok" : "failed";
  } catch {
    return "failed";
  }
}
