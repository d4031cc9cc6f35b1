import { CallTimeoutError, CredentialsMissingError, ProviderError } from "../../domain/errors.js";
import { CallOptions, RetrievalResult, WebEvidence } from "../../domain/types.js";
import { rerankWeb, WebRerankWeights } from "../../pipelines/rerank.js";
import { normalizeWebResults } from "../../pipelines/webResults.js";
import type { Logger } from "../../utils/logger.js";
import { withTimeout } from "../../utils/timeout.js";
import { Timer } from "../../utils/timing.js";
import { cacheKey, TtlCache } from "../cache/ttlCache.js";
import { WebSearchProvider } from "../search/types.js";

export interface WebRetrieverOptions {
  provider: WebSearchProvider;
  cache: TtlCache<WebEvidence[]>;
  cacheTtlSeconds: number;
  timeoutMs: number;
  /** Null disables reranking. */
  rerankWeights: WebRerankWeights | null;
  logger: Logger;
  now?: () => Date;
}

/**
 * Web search behind a TTL cache keyed by (query, topK). Only successful results
 * are cached.
 */
export class WebRetriever {
  constructor(private readonly options: WebRetrieverOptions) {}

  /**
   * @throws CredentialsMissingError when the provider has no credential
   * @throws ProviderError on provider failure or timeout
   */
  async searchWeb(
    query: string,
    topK: number,
    options: CallOptions = {},
  ): Promise<RetrievalResult<WebEvidence>> {
    const { provider, cache, logger } = this.options;
    if (!provider.isConfigured()) {
      throw new CredentialsMissingError("Web search provider", ["TAVILY_API_KEY"]);
    }
    if (topK <= 0) {
      return { items: [], latency: { retrieve: 0, rerank: 0 } };
    }

    const key = cacheKey("web_search", query, topK);
    const cached = cache.get(key);
    if (cached) {
      logger.debug({ evidences: cached.length }, "tool.web.cache_hit");
      return { items: cached.map((item) => ({ ...item })), latency: { retrieve: 0, rerank: 0 } };
    }

    const retrieveTimer = new Timer();
    const raw = await this.callProvider(query, topK, options.signal);
    let items = normalizeWebResults(raw, topK);
    const retrieveMs = retrieveTimer.elapsedMs();

    let rerankMs = 0;
    const { rerankWeights } = this.options;
    if (rerankWeights && items.length > 1) {
      const rerankTimer = new Timer();
      items = rerankWeb(items, rerankWeights, this.options.now?.() ?? new Date());
      rerankMs = rerankTimer.elapsedMs();
    }

    cache.put(key, items, this.options.cacheTtlSeconds);
    logger.info(
      { evidences: items.length, retrieve_ms: retrieveMs, rerank_ms: rerankMs },
      "tool.web",
    );
    return {
      items: items.map((item) => ({ ...item })),
      latency: { retrieve: retrieveMs, rerank: rerankMs },
    };
  }

  private async callProvider(query: string, topK: number, signal: AbortSignal | undefined) {
    const { provider, timeoutMs } = this.options;
    try {
      return await withTimeout((inner) => provider.search(query, topK, { signal: inner }), {
        timeoutMs,
        operationName: "Web search",
        signal,
      });
    } catch (error) {
      if (error instanceof CallTimeoutError) {
        throw new ProviderError(provider.name, undefined, error.message, { cause: error });
      }
      throw error;
    }
  }
}
