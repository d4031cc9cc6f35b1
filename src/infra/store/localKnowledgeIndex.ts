import path from "node:path";
import { IndexUnavailableError, errorMessage } from "../../domain/errors.js";
import {
  IndexedChunk,
  IndexStatus,
  KnowledgeBaseStats,
  ScoredChunk,
  SimilaritySearchIndex,
} from "../../domain/knowledgeBase.js";
import { chunkDocument, DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from "../../pipelines/chunking.js";
import type { Logger } from "../../utils/logger.js";
import { Timer } from "../../utils/timing.js";
import { EmbeddingClient } from "../ai/types.js";
import { listDocumentFiles, loadDocumentText } from "../parsers/documentLoader.js";
import { PersistentInMemoryKnowledgeBase } from "./persistentInMemoryKnowledgeBase.js";

const EMBEDDING_BATCH_SIZE = 64;

export interface LocalKnowledgeIndexOptions {
  knowledgeBase: PersistentInMemoryKnowledgeBase;
  embeddings: EmbeddingClient;
  dataDir: string;
  logger: Logger;
  chunkSize?: number;
  chunkOverlap?: number;
}

export interface IndexHealth {
  status: IndexStatus;
  error?: string;
  stats: KnowledgeBaseStats;
}

/**
 * Owns the lifecycle of the local corpus: load the persisted snapshot, or build
 * it from the data directory when none exists. The snapshot is never rebuilt
 * automatically; delete it to force a rebuild.
 */
export class LocalKnowledgeIndex implements SimilaritySearchIndex {
  private state: IndexStatus = "loading";

  private failure: string | null = null;

  private initializing: Promise<void> | null = null;

  constructor(private readonly options: LocalKnowledgeIndexOptions) {}

  status(): IndexStatus {
    return this.state;
  }

  health(): IndexHealth {
    return {
      status: this.state,
      ...(this.failure ? { error: this.failure } : {}),
      stats: this.options.knowledgeBase.stats(),
    };
  }

  initialize(): Promise<void> {
    if (!this.initializing) {
      this.initializing = this.loadOrBuild();
    }
    return this.initializing;
  }

  async similaritySearch(
    query: string,
    topK: number,
    options: { signal?: AbortSignal } = {},
  ): Promise<ScoredChunk[]> {
    if (this.state !== "ready") {
      throw new IndexUnavailableError(
        this.state === "failed" ? `index failed to load (${this.failure})` : "index is still loading",
      );
    }

    const { knowledgeBase, embeddings } = this.options;
    const queryEmbedding =
      embeddings.isEmbeddingConfigured() && knowledgeBase.stats().embedded_chunks > 0
        ? await embeddings.embedQuery(query, options)
        : null;

    return knowledgeBase.search({ query, queryEmbedding, topK });
  }

  private async loadOrBuild(): Promise<void> {
    const { knowledgeBase, logger } = this.options;
    const timer = new Timer();
    try {
      if (await knowledgeBase.initialize()) {
        logger.info(
          { path: knowledgeBase.snapshotPath, chunks: knowledgeBase.stats().chunks, ms: timer.elapsedMs() },
          "index.load",
        );
      } else {
        const chunks = await this.buildChunks();
        if (chunks.length === 0) {
          throw new Error(`no indexable documents found in ${path.resolve(this.options.dataDir)}`);
        }
        await knowledgeBase.replaceAll(chunks);
        logger.info(
          { path: knowledgeBase.snapshotPath, chunks: chunks.length, ms: timer.elapsedMs() },
          "index.build_completed",
        );
      }
      this.state = "ready";
    } catch (error) {
      this.state = "failed";
      this.failure = errorMessage(error);
      logger.error({ err: error }, "index.load_failed");
      throw error;
    }
  }

  private async buildChunks(): Promise<IndexedChunk[]> {
    const { dataDir, embeddings, logger } = this.options;
    const root = path.resolve(dataDir);
    const files = await listDocumentFiles(root);

    const chunks: IndexedChunk[] = [];
    for (const filePath of files) {
      const text = await loadDocumentText(filePath);
      const pieces = chunkDocument(
        text,
        this.options.chunkSize ?? DEFAULT_CHUNK_SIZE,
        this.options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP,
      );
      for (const piece of pieces) {
        const index = chunks.length;
        chunks.push({
          chunk_id: formatChunkId(index),
          source: path.relative(root, filePath).split(path.sep).join("/"),
          section: piece.section,
          index,
          text: piece.text,
          embedding: null,
        });
      }
    }
    logger.info({ files: files.length, chunks: chunks.length }, "index.docs_ready");

    if (embeddings.isEmbeddingConfigured()) {
      for (let start = 0; start < chunks.length; start += EMBEDDING_BATCH_SIZE) {
        const batch = chunks.slice(start, start + EMBEDDING_BATCH_SIZE);
        const vectors = await embeddings.embedTexts(batch.map((chunk) => chunk.text));
        batch.forEach((chunk, offset) => {
          chunk.embedding = vectors[offset] ?? null;
        });
      }
    }

    return chunks;
  }
}

export function formatChunkId(index: number): string {
  return `chunk-${String(index).padStart(4, "0")}`;
}
