/**
 * Retrieval exports
 */

import type { Config } from "../core/config.js";
import { ContextRetriever } from "./context-retriever.js";
import { HashingEmbedder, type Embedder } from "./embedder.js";
import { FileFragmentRepository, MemoryFragmentRepository } from "./fragments.js";

export * from "./context-retriever.js";
export * from "./embedder.js";
export * from "./fragments.js";
export { chunkText } from "./chunker.js";
export { renderArtifact, type SessionMeta } from "./render.js";

/**
 * Fragments live beside file-backed sessions; every other store kind keeps
 * them in memory.
 */
export function createContextRetriever(config: Config, embedder?: Embedder): ContextRetriever {
  const { retrieval } = config;
  return new ContextRetriever({
    embedder: embedder ?? new HashingEmbedder(retrieval.dimensions),
    repository:
      config.store.kind === "file"
        ? new FileFragmentRepository(config.store.dataDir)
        : new MemoryFragmentRepository(),
    chunkSize: retrieval.chunkSize,
    chunkOverlap: retrieval.chunkOverlap,
    k: retrieval.k,
    threshold: retrieval.threshold,
    embedTimeoutMs: retrieval.embedTimeoutMs,
  });
}
