import { SimilaritySearchIndex } from "../../domain/knowledgeBase.js";
import { CallOptions, LocalEvidence, RetrievalResult } from "../../domain/types.js";
import { LocalRerankWeights, rerankLocal } from "../../pipelines/rerank.js";
import type { Logger } from "../../utils/logger.js";
import { withTimeout } from "../../utils/timeout.js";
import { Timer } from "../../utils/timing.js";

export interface LocalRetrieverOptions {
  index: SimilaritySearchIndex;
  timeoutMs: number;
  /** Null disables reranking. */
  rerankWeights: LocalRerankWeights | null;
  logger: Logger;
}

export class LocalRetriever {
  constructor(private readonly options: LocalRetrieverOptions) {}

  /**
   * @throws IndexUnavailableError while the local index is not loaded
   */
  async searchLocal(
    query: string,
    topK: number,
    options: CallOptions = {},
  ): Promise<RetrievalResult<LocalEvidence>> {
    if (topK <= 0) {
      return { items: [], latency: { retrieve: 0, rerank: 0 } };
    }

    const { index, timeoutMs, rerankWeights, logger } = this.options;
    const retrieveTimer = new Timer();
    const hits = await withTimeout((signal) => index.similaritySearch(query, topK, { signal }), {
      timeoutMs,
      operationName: "Local retrieval",
      signal: options.signal,
    });
    const retrieveMs = retrieveTimer.elapsedMs();

    let items = hits.map(({ chunk, score }): LocalEvidence => ({
      source_tag: "local",
      chunk_id: chunk.chunk_id,
      text: chunk.text,
      score,
      ...(chunk.section ? { section: chunk.section } : {}),
    }));

    let rerankMs = 0;
    if (rerankWeights && items.length > 1) {
      const rerankTimer = new Timer();
      items = rerankLocal(query, items, rerankWeights);
      rerankMs = rerankTimer.elapsedMs();
    }

    items = items.slice(0, topK);
    logger.info(
      { evidences: items.length, retrieve_ms: retrieveMs, rerank_ms: rerankMs },
      "tool.local",
    );
    return { items, latency: { retrieve: retrieveMs, rerank: rerankMs } };
  }
}
