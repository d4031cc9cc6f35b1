export interface IndexedChunk {
  chunk_id: string;
  source: string;
  section: string;
  index: number;
  text: string;
  embedding: number[] | null;
}

export interface ScoredChunk {
  chunk: IndexedChunk;
  score: number;
}

export interface ChunkSearchInput {
  query: string;
  queryEmbedding: number[] | null;
  topK: number;
}

export interface KnowledgeBaseStats {
  sources: number;
  chunks: number;
  embedded_chunks: number;
}

export interface KnowledgeBase {
  replaceAll(chunks: IndexedChunk[]): Promise<void>;
  search(input: ChunkSearchInput): Promise<ScoredChunk[]>;
  stats(): KnowledgeBaseStats;
}

export type IndexStatus = "loading" | "ready" | "failed";

/**
 * Similarity search over the pre-built local corpus. Implementations throw
 * `IndexUnavailableError` until the index is loaded.
 */
export interface SimilaritySearchIndex {
  status(): IndexStatus;
  similaritySearch(
    query: string,
    topK: number,
    options?: { signal?: AbortSignal },
  ): Promise<ScoredChunk[]>;
}
