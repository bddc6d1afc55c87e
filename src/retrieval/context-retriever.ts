/**
 * Context Retriever
 * Indexes stage artifacts as embedded fragments and returns the most
 * similar ones for a question.
 *
 * INDEX:    artifact → rendered text → chunks → embeddings → fragments
 * RETRIEVE: question → embedding → cosine vs scoped fragments
 *           → keep similarity ≥ threshold
 *           → order by similarity, then newest first → top k
 */

import { logger } from "../core/logger.js";
import { withTimeout } from "../core/retry.js";
import type { StageArtifact } from "../schemas/artifacts.js";
import type { ContextFragment } from "../schemas/session.js";
import { chunkText } from "./chunker.js";
import { cosineSimilarity, type Embedder } from "./embedder.js";
import { fragmentId, MemoryFragmentRepository, type FragmentRepository } from "./fragments.js";
import { renderArtifact, type SessionMeta } from "./render.js";

export type RetrievalScope = { scope: "session"; sessionId: string } | { scope: "all" };

export interface ScoredFragment extends ContextFragment {
  score: number;
}

export interface IndexDocument {
  artifactId: string;
  text: string;
}

export interface ContextRetrieverOptions {
  embedder: Embedder;
  repository?: FragmentRepository;
  chunkSize: number;
  chunkOverlap: number;
  k: number;
  threshold: number;
  embedTimeoutMs: number;
  now?: () => Date;
}

export class ContextRetriever {
  private readonly log = logger.child({ component: "retriever" });
  private readonly repository: FragmentRepository;
  private readonly now: () => Date;

  constructor(private readonly options: ContextRetrieverOptions) {
    this.repository = options.repository ?? new MemoryFragmentRepository();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Index a session's usable artifacts. Failed artifacts carry no payload
   * and are skipped; artifacts of other sessions are ignored.
   */
  async index(
    sessionId: string,
    artifacts: readonly StageArtifact[],
    meta: SessionMeta,
    signal?: AbortSignal
  ): Promise<number> {
    const documents = artifacts
      .filter((a) => a.sessionId === sessionId && a.status !== "failed")
      .map((a) => ({ artifactId: a.id, text: renderArtifact(a, meta) }))
      .filter((d) => d.text.length > 0);

    return this.indexDocuments(sessionId, documents, signal);
  }

  /**
   * Fragment, embed and store raw documents. Fragments already stored under
   * the same (session, artifact, index) are left untouched.
   */
  async indexDocuments(
    sessionId: string,
    documents: readonly IndexDocument[],
    signal?: AbortSignal
  ): Promise<number> {
    const pending: Array<{ id: string; artifactId: string; index: number; text: string }> = [];

    for (const doc of documents) {
      const chunks = chunkText(doc.text, this.options.chunkSize, this.options.chunkOverlap);
      for (const [index, text] of chunks.entries()) {
        const id = fragmentId(sessionId, doc.artifactId, index);
        if (!(await this.repository.has(id))) {
          pending.push({ id, artifactId: doc.artifactId, index, text });
        }
      }
    }

    if (pending.length === 0) return 0;

    const embeddings = await withTimeout(
      "embed",
      this.options.embedTimeoutMs,
      (embedSignal) => this.options.embedder.embed(pending.map((p) => p.text), embedSignal),
      signal
    );

    const createdAt = this.now().toISOString();
    const fragments: ContextFragment[] = pending.map((p, i) => ({
      id: p.id,
      sessionId,
      artifactId: p.artifactId,
      index: p.index,
      text: p.text,
      embedding: embeddings[i] ?? [],
      createdAt,
    }));

    const added = await this.repository.insert(fragments);
    this.log.info("Indexed fragments", { sessionId, added });
    return added;
  }

  async retrieve(
    question: string,
    scope: RetrievalScope = { scope: "all" },
    k: number = this.options.k,
    threshold: number = this.options.threshold
  ): Promise<ScoredFragment[]> {
    const fragments = await this.repository.load(scope.scope === "session" ? scope.sessionId : undefined);
    if (fragments.length === 0 || k <= 0) return [];

    const [queryEmbedding] = await withTimeout("embed", this.options.embedTimeoutMs, (signal) =>
      this.options.embedder.embed([question], signal)
    );
    if (!queryEmbedding) return [];

    const scored = fragments
      .map((fragment) => ({ ...fragment, score: cosineSimilarity(queryEmbedding, fragment.embedding) }))
      .filter((f) => f.score >= threshold)
      .sort(compareScored);

    const results = scored.slice(0, k);
    this.log.debug("Retrieved fragments", {
      scope: scope.scope,
      candidates: fragments.length,
      returned: results.length,
    });
    return results;
  }

  async deleteSession(sessionId: string): Promise<number> {
    const removed = await this.repository.deleteSession(sessionId);
    this.log.info("Deleted session fragments", { sessionId, removed });
    return removed;
  }
}

/**
 * Similarity descending, then newer first, then id for a stable order
 */
function compareScored(a: ScoredFragment, b: ScoredFragment): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
