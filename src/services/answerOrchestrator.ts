import {
  errorMessage,
  isFatalError,
  RequestCancelledError,
  StageUnavailableError,
} from "../domain/errors.js";
import { AnswerSynthesis, LocalSearch, QueryRouting, WebSearch } from "../domain/pipeline.js";
import {
  CallOptions,
  createRoutingDecision,
  FinalResponse,
  LatencyBreakdown,
  LocalEvidence,
  NormalizedContext,
  RetrievalLatency,
  RoutingDecision,
  RoutingPolicy,
  Source,
  WebEvidence,
} from "../domain/types.js";
import { aggregate, AggregateOptions } from "../pipelines/aggregation.js";
import type { Logger } from "../utils/logger.js";
import { throwIfCancelled } from "../utils/timeout.js";
import { Timer } from "../utils/timing.js";

export const EMPTY_QUERY_ANSWER = "The question is empty. Please provide a non-empty query.";
export const CANCELLED_ANSWER = "The request was cancelled before an answer was produced.";
export const ERROR_ANSWER_PREFIX = "An error occurred while answering:";

export interface AnswerOrchestratorOptions {
  router: QueryRouting;
  localRetriever: LocalSearch;
  webRetriever: WebSearch;
  synthesizer: AnswerSynthesis;
  topK: number;
  logger: Logger;
  aggregateOptions?: AggregateOptions;
}

interface RetrievalOutcome {
  local: LocalEvidence[];
  web: WebEvidence[];
  latency: RetrievalLatency;
}

/**
 * Route, retrieve, aggregate, synthesize. `answer` always resolves: any failure
 * the pipeline cannot absorb becomes a fallback response with confidence 0.
 */
export class AnswerOrchestrator {
  constructor(private readonly options: AnswerOrchestratorOptions) {}

  async answer(query: string, options: CallOptions = {}): Promise<FinalResponse> {
    const { logger } = this.options;
    const totalTimer = new Timer();
    const latency: LatencyBreakdown = { retrieve: 0, rerank: 0, generate: 0, total: 0 };
    const signal = options.signal;

    const trimmed = query.trim();
    if (!trimmed) {
      return this.fallback(
        EMPTY_QUERY_ANSWER,
        createRoutingDecision("hybrid", "error: empty query"),
        latency,
        totalTimer,
      );
    }

    const routing = await this.route(trimmed, signal);

    try {
      throwIfCancelled(signal, "Request");
      const retrieval = await this.retrieve(routing.policy, trimmed, signal);
      latency.retrieve = retrieval.latency.retrieve;
      latency.rerank = retrieval.latency.rerank;

      const context = this.aggregate(retrieval);

      const generateTimer = new Timer();
      const synth = await this.options.synthesizer
        .generateAnswer(trimmed, context.local_block, context.web_block, { signal })
        .catch((error: unknown) => rethrowAsStage("answer generation", error));
      latency.generate = generateTimer.elapsedMs();
      throwIfCancelled(signal, "Request");

      const hasEvidence = context.local_sources.length + context.web_sources.length > 0;
      // A degraded synthesis cites nothing and carries no confidence.
      const degraded = synth.confidence === 0 && synth.sources.length === 0;
      const response: FinalResponse = {
        answer: synth.answer,
        sources: degraded ? [] : resolveCitedSources(synth.sources, context),
        routing,
        latency_ms: { ...latency, total: totalTimer.elapsedMs() },
        confidence: hasEvidence ? synth.confidence : 0,
      };

      logger.info(
        {
          policy: routing.policy,
          local: context.local_sources.length,
          web: context.web_sources.length,
          confidence: response.confidence,
          latency_ms: response.latency_ms,
        },
        "orchestrator.completed",
      );
      return response;
    } catch (error) {
      if (error instanceof RequestCancelledError || signal?.aborted) {
        logger.info({ policy: routing.policy }, "orchestrator.cancelled");
        return this.fallback(CANCELLED_ANSWER, routing, latency, totalTimer);
      }
      logger.error({ err: error, policy: routing.policy }, "orchestrator.failed");
      return this.fallback(
        `${ERROR_ANSWER_PREFIX} ${describeFailure(error)}.`,
        routing,
        latency,
        totalTimer,
      );
    }
  }

  private aggregate(retrieval: RetrievalOutcome): NormalizedContext {
    try {
      return aggregate(retrieval.local, retrieval.web, this.options.aggregateOptions);
    } catch (error) {
      throw new StageUnavailableError("evidence aggregation", errorMessage(error), { cause: error });
    }
  }

  private async route(query: string, signal: AbortSignal | undefined): Promise<RoutingDecision> {
    try {
      return await this.options.router.route(query, { signal });
    } catch (error) {
      this.options.logger.error({ err: error }, "orchestrator.route_failed");
      return createRoutingDecision("hybrid", `error: ${errorMessage(error)}`);
    }
  }

  private async retrieve(
    policy: RoutingPolicy,
    query: string,
    signal: AbortSignal | undefined,
  ): Promise<RetrievalOutcome> {
    const { localRetriever, webRetriever, topK } = this.options;

    if (policy === "local") {
      const local = await localRetriever
        .searchLocal(query, topK, { signal })
        .catch((error: unknown) => rethrowAsStage("local retrieval", error));
      return { local: local.items, web: [], latency: local.latency };
    }

    if (policy === "web") {
      const web = await webRetriever
        .searchWeb(query, topK, { signal })
        .catch((error: unknown) => rethrowAsStage("web retrieval", error));
      return { local: [], web: web.items, latency: web.latency };
    }

    return this.retrieveHybrid(query, signal);
  }

  private async retrieveHybrid(query: string, signal: AbortSignal | undefined): Promise<RetrievalOutcome> {
    const { localRetriever, webRetriever, topK, logger } = this.options;
    const [local, web] = await Promise.allSettled([
      localRetriever.searchLocal(query, topK, { signal }),
      webRetriever.searchWeb(query, topK, { signal }),
    ]);

    if (local.status === "rejected" && web.status === "rejected") {
      if (signal?.aborted) {
        throw new RequestCancelledError("Request");
      }
      throw new StageUnavailableError(
        "retrieval",
        `local: ${errorMessage(local.reason)}; web: ${errorMessage(web.reason)}`,
        { cause: local.reason },
      );
    }

    if (local.status === "rejected") {
      logSideFailure(logger, "orchestrator.local_failed", local.reason);
    }
    if (web.status === "rejected") {
      logSideFailure(logger, "orchestrator.web_failed", web.reason);
    }

    const localLatency = local.status === "fulfilled" ? local.value.latency : { retrieve: 0, rerank: 0 };
    const webLatency = web.status === "fulfilled" ? web.value.latency : { retrieve: 0, rerank: 0 };

    return {
      local: local.status === "fulfilled" ? local.value.items : [],
      web: web.status === "fulfilled" ? web.value.items : [],
      // Both sides ran concurrently, so the slower one bounds each stage.
      latency: {
        retrieve: Math.max(localLatency.retrieve, webLatency.retrieve),
        rerank: Math.max(localLatency.rerank, webLatency.rerank),
      },
    };
  }

  private fallback(
    answer: string,
    routing: RoutingDecision,
    latency: LatencyBreakdown,
    totalTimer: Timer,
  ): FinalResponse {
    return {
      answer,
      sources: [],
      routing,
      latency_ms: { ...latency, total: totalTimer.elapsedMs() },
      confidence: 0,
    };
  }
}

/**
 * Maps cited refs back to normalized evidence, in citation order. When the
 * model cited nothing recognizable, every normalized item is returned.
 */
export function resolveCitedSources(refs: string[], context: NormalizedContext): Source[] {
  const byRef = new Map<string, Source>();
  for (const source of [...context.local_sources, ...context.web_sources]) {
    byRef.set(source.ref, source);
  }

  const cited: Source[] = [];
  for (const ref of refs) {
    const source = byRef.get(ref);
    if (source && !cited.includes(source)) {
      cited.push(source);
    }
  }

  return cited.length > 0 ? cited : [...context.local_sources, ...context.web_sources];
}

function rethrowAsStage(stage: string, error: unknown): never {
  if (error instanceof RequestCancelledError) {
    throw error;
  }
  throw new StageUnavailableError(stage, errorMessage(error), { cause: error });
}

function describeFailure(error: unknown): string {
  if (error instanceof StageUnavailableError) {
    return error.message;
  }
  return `the request failed (${errorMessage(error)})`;
}

function logSideFailure(logger: Logger, event: string, reason: unknown): void {
  if (isFatalError(reason)) {
    logger.error({ err: reason }, event);
  } else {
    logger.warn({ err: reason }, event);
  }
}
