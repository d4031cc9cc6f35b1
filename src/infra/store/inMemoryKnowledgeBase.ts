import {
  ChunkSearchInput,
  IndexedChunk,
  KnowledgeBase,
  KnowledgeBaseStats,
  ScoredChunk,
} from "../../domain/knowledgeBase.js";
import { scoreByTokenOverlap, tokenize, tokenizeForBm25 } from "../../utils/text.js";
import { cosineSimilarity } from "../../utils/vector.js";

export interface InMemoryKnowledgeBaseSnapshot {
  chunks: IndexedChunk[];
}

interface Bm25Document {
  chunk: IndexedChunk;
  tf: Map<string, number>;
  docLength: number;
}

interface Bm25Corpus {
  documents: Bm25Document[];
  docFreq: Map<string, number>;
  avgDocLength: number;
}

const RRF_K = 60;
const BM25_RRF_WEIGHT = 1.05;
const MIN_FUSION_CANDIDATES = 24;

/**
 * Chunk store searched by reciprocal-rank fusion of cosine similarity and BM25.
 * Falls back to BM25 alone when no query embedding is available, and to token
 * overlap when BM25 finds nothing.
 */
export class InMemoryKnowledgeBase implements KnowledgeBase {
  protected chunks: IndexedChunk[] = [];

  private bm25Corpus: Bm25Corpus = buildBm25Corpus([]);

  async replaceAll(chunks: IndexedChunk[]): Promise<void> {
    this.load(chunks);
  }

  stats(): KnowledgeBaseStats {
    return {
      sources: new Set(this.chunks.map((chunk) => chunk.source)).size,
      chunks: this.chunks.length,
      embedded_chunks: this.chunks.filter((chunk) => chunk.embedding !== null).length,
    };
  }

  async search(input: ChunkSearchInput): Promise<ScoredChunk[]> {
    if (input.topK <= 0) {
      return [];
    }

    if (input.queryEmbedding) {
      const hybrid = this.searchByHybrid(input.query, input.queryEmbedding, input.topK);
      if (hybrid.length > 0) {
        return hybrid;
      }
    }

    const bm25 = this.searchByBm25(input.query, input.topK);
    if (bm25.length > 0) {
      return bm25;
    }

    return this.searchByLexical(input.query, input.topK);
  }

  protected exportSnapshot(): InMemoryKnowledgeBaseSnapshot {
    return { chunks: this.chunks.map((chunk) => ({ ...chunk })) };
  }

  protected importSnapshot(snapshot: InMemoryKnowledgeBaseSnapshot): void {
    this.load(snapshot.chunks.map((chunk) => ({ ...chunk })));
  }

  private load(chunks: IndexedChunk[]): void {
    this.chunks = [...chunks].sort((a, b) => a.index - b.index);
    this.bm25Corpus = buildBm25Corpus(this.chunks);
  }

  private searchBySemantic(queryEmbedding: number[], topK: number): ScoredChunk[] {
    const candidates: ScoredChunk[] = [];
    for (const chunk of this.chunks) {
      if (!chunk.embedding) {
        continue;
      }
      const score = cosineSimilarity(queryEmbedding, chunk.embedding);
      if (score > 0) {
        candidates.push({ chunk, score });
      }
    }
    return candidates.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  private searchByHybrid(query: string, queryEmbedding: number[], topK: number): ScoredChunk[] {
    const poolSize = Math.max(topK, MIN_FUSION_CANDIDATES);
    const semantic = this.searchBySemantic(queryEmbedding, poolSize);
    const bm25 = this.searchByBm25(query, poolSize);

    if (semantic.length === 0) {
      return bm25.slice(0, topK);
    }
    if (bm25.length === 0) {
      return semantic.slice(0, topK);
    }
    return fuseByReciprocalRank(semantic, bm25, topK);
  }

  private searchByBm25(query: string, topK: number): ScoredChunk[] {
    const queryTokens = tokenize(query);
    const corpus = this.bm25Corpus;
    if (queryTokens.length === 0 || corpus.documents.length === 0) {
      return [];
    }

    const k1 = 1.2;
    const b = 0.75;
    const total = corpus.documents.length;

    const scored: ScoredChunk[] = [];
    for (const doc of corpus.documents) {
      let score = 0;
      for (const term of queryTokens) {
        const tf = doc.tf.get(term) ?? 0;
        if (tf <= 0) {
          continue;
        }
        const df = corpus.docFreq.get(term) ?? 0;
        const idf = Math.log(1 + (total - df + 0.5) / (df + 0.5));
        const denominator =
          tf + k1 * (1 - b + b * (doc.docLength / Math.max(corpus.avgDocLength, 1e-9)));
        score += idf * ((tf * (k1 + 1)) / Math.max(denominator, 1e-9));
      }
      if (score > 0) {
        scored.push({ chunk: doc.chunk, score });
      }
    }

    return scored.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  private searchByLexical(query: string, topK: number): ScoredChunk[] {
    const candidates: ScoredChunk[] = [];
    for (const chunk of this.chunks) {
      const score = scoreByTokenOverlap(query, chunk.text);
      if (score > 0) {
        candidates.push({ chunk, score });
      }
    }
    return candidates.sort((a, b) => b.score - a.score).slice(0, topK);
  }
}

function buildBm25Corpus(chunks: IndexedChunk[]): Bm25Corpus {
  const documents: Bm25Document[] = [];
  const docFreq = new Map<string, number>();
  let totalDocLength = 0;

  for (const chunk of chunks) {
    const tokens = tokenizeForBm25(`${chunk.section}\n${chunk.text}`);
    if (tokens.length === 0) {
      continue;
    }

    const tf = new Map<string, number>();
    for (const token of tokens) {
      tf.set(token, (tf.get(token) ?? 0) + 1);
    }
    for (const token of tf.keys()) {
      docFreq.set(token, (docFreq.get(token) ?? 0) + 1);
    }

    totalDocLength += tokens.length;
    documents.push({ chunk, tf, docLength: tokens.length });
  }

  return {
    documents,
    docFreq,
    avgDocLength: documents.length > 0 ? totalDocLength / documents.length : 0,
  };
}

function fuseByReciprocalRank(
  semantic: ScoredChunk[],
  bm25: ScoredChunk[],
  topK: number,
): ScoredChunk[] {
  const fused = new Map<string, ScoredChunk>();

  const accumulate = (ranked: ScoredChunk[], weight: number) => {
    ranked.forEach((item, rank) => {
      const entry = fused.get(item.chunk.chunk_id) ?? { chunk: item.chunk, score: 0 };
      entry.score += weight / (RRF_K + rank + 1);
      fused.set(item.chunk.chunk_id, entry);
    });
  };

  accumulate(semantic, 1);
  accumulate(bm25, BM25_RRF_WEIGHT);

  return [...fused.values()].sort((a, b) => b.score - a.score).slice(0, topK);
}
