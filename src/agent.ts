import { AppConfig } from "./config/env.js";
import { RoutingDecision, WebEvidence } from "./domain/types.js";
import { DefaultAiClient } from "./infra/ai/defaultAiClient.js";
import { TtlCache } from "./infra/cache/ttlCache.js";
import { LocalRetriever } from "./infra/retrieval/localRetriever.js";
import { WebRetriever } from "./infra/retrieval/webRetriever.js";
import { TavilyClient } from "./infra/search/tavilyClient.js";
import { LocalKnowledgeIndex } from "./infra/store/localKnowledgeIndex.js";
import { PersistentInMemoryKnowledgeBase } from "./infra/store/persistentInMemoryKnowledgeBase.js";
import { QueryRouter } from "./pipelines/routing.js";
import { Synthesizer } from "./pipelines/synthesis.js";
import { AnswerOrchestrator } from "./services/answerOrchestrator.js";
import { ImageQuestionAnswerer } from "./services/imageQuestionService.js";
import { createComponentLogger, type Logger } from "./utils/logger.js";

const CACHE_SWEEP_INTERVAL_MS = 60_000;

export interface Agent {
  orchestrator: AnswerOrchestrator;
  router: QueryRouter;
  imageAnswerer: ImageQuestionAnswerer;
  index: LocalKnowledgeIndex;
  knowledgeBase: PersistentInMemoryKnowledgeBase;
  close(): Promise<void>;
}

/**
 * Wires the answering pipeline from configuration. The local index is created
 * but not loaded; call `index.initialize()`.
 */
export function createAgent(config: AppConfig, logger: Logger): Agent {
  const aiClient = new DefaultAiClient(config);
  const knowledgeBase = new PersistentInMemoryKnowledgeBase(config.indexPath, {
    maxBytes: config.maxIndexBytes,
  });
  const index = new LocalKnowledgeIndex({
    knowledgeBase,
    embeddings: aiClient,
    dataDir: config.dataDir,
    logger: createComponentLogger(logger, "index"),
  });

  const webCache = new TtlCache<WebEvidence[]>({ defaultTtlSeconds: config.cacheTtlSeconds });
  const routeCache = new TtlCache<RoutingDecision>({ defaultTtlSeconds: config.cacheTtlSeconds });
  webCache.startSweeper(CACHE_SWEEP_INTERVAL_MS);
  routeCache.startSweeper(CACHE_SWEEP_INTERVAL_MS);

  const weights = config.rerankWeights;
  const router = new QueryRouter({
    rules: { localKeywords: config.localKeywords, realtimeKeywords: config.realtimeKeywords },
    classifier: aiClient,
    cache: routeCache,
    cacheTtlSeconds: config.cacheTtlSeconds,
    timeoutMs: config.callTimeoutMs,
    logger: createComponentLogger(logger, "router"),
  });

  const orchestrator = new AnswerOrchestrator({
    router,
    localRetriever: new LocalRetriever({
      index,
      timeoutMs: config.callTimeoutMs,
      rerankWeights: config.enableRerank ? { vector: weights.vector, bm25: weights.bm25 } : null,
      logger: createComponentLogger(logger, "local_retriever"),
    }),
    webRetriever: new WebRetriever({
      provider: new TavilyClient({ apiKey: config.tavilyApiKey, baseUrl: config.tavilyBaseUrl }),
      cache: webCache,
      cacheTtlSeconds: config.cacheTtlSeconds,
      timeoutMs: config.callTimeoutMs,
      rerankWeights: config.enableRerank
        ? { recency: weights.recency, authority: weights.authority, relevance: weights.relevance }
        : null,
      logger: createComponentLogger(logger, "web_retriever"),
    }),
    synthesizer: new Synthesizer({
      client: aiClient,
      timeoutMs: config.callTimeoutMs,
      logger: createComponentLogger(logger, "synth"),
    }),
    topK: config.defaultTopK,
    logger: createComponentLogger(logger, "orchestrator"),
  });

  const imageAnswerer = new ImageQuestionAnswerer({
    client: aiClient,
    model: config.visionModel,
    maxImageBytes: config.maxImageBytes,
    timeoutMs: config.callTimeoutMs,
    logger: createComponentLogger(logger, "multimodal"),
  });

  return {
    orchestrator,
    router,
    imageAnswerer,
    index,
    knowledgeBase,
    close: async () => {
      webCache.dispose();
      routeCache.dispose();
      await knowledgeBase.close();
    },
  };
}
