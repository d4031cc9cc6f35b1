import { z } from "zod";
import { ClassifierError, errorMessage } from "../domain/errors.js";
import { QueryRouting } from "../domain/pipeline.js";
import {
  CallOptions,
  createRoutingDecision,
  isRoutingPolicy,
  RoutingDecision,
} from "../domain/types.js";
import { cacheKey, TtlCache } from "../infra/cache/ttlCache.js";
import { ChatMessage, CompletionClient } from "../infra/ai/types.js";
import type { Logger } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";
import { extractJsonObject } from "./jsonOutput.js";

export const CLASSIFIER_SYSTEM_PROMPT = [
  "You are an intent classifier that routes user questions to the correct knowledge source.",
  "You MUST output a strict JSON object with fields:",
  '- "policy": one of ["local", "web", "hybrid"]',
  '- "rationale": a short explanation',
  "",
  "Definitions:",
  '1. "local": the question refers to fictional entities or domain-specific concepts stored in the local knowledge base.',
  "   Examples: Sereleia, Xylos, Elara Vance, Vance Protocol.",
  '2. "web": the question needs real-world, time-sensitive or up-to-date information.',
  "   Examples: news, weather, stock prices, traffic, today's events.",
  '3. "hybrid": the question mixes local knowledge with real-world or timely information,',
  "   or could benefit from both sources.",
  "",
  "Respond with JSON only. No commentary.",
].join("\n");

const CLASSIFIER_MAX_TOKENS = 200;

export interface RoutingRules {
  localKeywords: string[];
  realtimeKeywords: string[];
}

interface KeywordHits {
  local?: string;
  realtime?: string;
}

export type RuleOutcome =
  | { kind: "decided"; rule: string; decision: RoutingDecision }
  | { kind: "classify"; rule: string; hits: KeywordHits };

interface RoutingRule {
  name: string;
  matches(hits: KeywordHits): boolean;
  apply(hits: KeywordHits): RuleOutcome;
}

// First match wins.
const RULE_TABLE: RoutingRule[] = [
  {
    name: "local_keyword_only",
    matches: (hits) => Boolean(hits.local) && !hits.realtime,
    apply: (hits) => ({
      kind: "decided",
      rule: "local_keyword_only",
      decision: createRoutingDecision(
        "local",
        `Matched local keyword "${hits.local}"; no classifier needed.`,
      ),
    }),
  },
  {
    name: "realtime_keyword_only",
    matches: (hits) => Boolean(hits.realtime) && !hits.local,
    apply: (hits) => ({
      kind: "decided",
      rule: "realtime_keyword_only",
      decision: createRoutingDecision(
        "web",
        `Matched realtime keyword "${hits.realtime}"; routing to web search.`,
      ),
    }),
  },
  {
    name: "both_keyword_sets",
    matches: (hits) => Boolean(hits.local) && Boolean(hits.realtime),
    apply: (hits) => ({ kind: "classify", rule: "both_keyword_sets", hits }),
  },
  {
    name: "no_keyword",
    matches: () => true,
    apply: (hits) => ({ kind: "classify", rule: "no_keyword", hits }),
  },
];

/**
 * Synchronous half of routing. Multi-word keywords match as substrings of the
 * lower-cased query; single words must match a whole token.
 */
export function decideByRules(query: string, rules: RoutingRules): RuleOutcome {
  const normalized = normalizeQuery(query);
  const tokens = new Set(normalized.match(/[\p{L}\p{N}]+/gu) ?? []);
  const hits: KeywordHits = {
    local: matchKeyword(normalized, tokens, rules.localKeywords),
    realtime: matchKeyword(normalized, tokens, rules.realtimeKeywords),
  };

  for (const rule of RULE_TABLE) {
    if (rule.matches(hits)) {
      return rule.apply(hits);
    }
  }
  // Unreachable: the last rule always matches.
  return { kind: "classify", rule: "no_keyword", hits };
}

export function matchKeyword(
  normalizedQuery: string,
  tokens: Set<string>,
  keywords: string[],
): string | undefined {
  for (const raw of keywords) {
    const keyword = raw.trim().toLowerCase();
    if (!keyword) {
      continue;
    }
    const isPhrase = /[^\p{L}\p{N}]/u.test(keyword);
    if (isPhrase ? normalizedQuery.includes(keyword) : tokens.has(keyword)) {
      return keyword;
    }
  }
  return undefined;
}

export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, " ");
}

const classifierOutputSchema = z.object({
  policy: z.string(),
  rationale: z.string().optional(),
});

export function parseClassifierOutput(content: string): RoutingDecision {
  const json = extractJsonObject(content);
  if (json === undefined) {
    throw new ClassifierError(`Classifier output is not JSON: ${content.slice(0, 200)}`);
  }
  const parsed = classifierOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ClassifierError("Classifier output is missing a policy", { cause: parsed.error });
  }

  const policy = parsed.data.policy.trim().toLowerCase();
  if (!isRoutingPolicy(policy)) {
    throw new ClassifierError(`Classifier returned an invalid policy "${parsed.data.policy}"`);
  }
  return createRoutingDecision(policy, parsed.data.rationale?.trim() || "Classifier gave no rationale.");
}

export interface QueryRouterOptions {
  rules: RoutingRules;
  /** Null when no model is configured; ambiguous queries then go hybrid. */
  classifier: CompletionClient | null;
  cache: TtlCache<RoutingDecision>;
  cacheTtlSeconds: number;
  timeoutMs: number;
  logger: Logger;
}

export class QueryRouter implements QueryRouting {
  constructor(private readonly options: QueryRouterOptions) {}

  async route(query: string, options: CallOptions = {}): Promise<RoutingDecision> {
    const { logger } = this.options;
    try {
      const outcome = decideByRules(query, this.options.rules);
      if (outcome.kind === "decided") {
        logger.info({ policy: outcome.decision.policy, rule: outcome.rule }, "router.rule_decision");
        return outcome.decision;
      }
      return await this.classify(query, outcome.rule, options.signal);
    } catch (error) {
      logger.error({ err: error }, "router.failed");
      return fallbackDecision(`routing failed (${errorMessage(error)})`);
    }
  }

  private async classify(
    query: string,
    rule: string,
    signal: AbortSignal | undefined,
  ): Promise<RoutingDecision> {
    const { classifier, cache, logger } = this.options;
    const key = cacheKey("router.classify", normalizeQuery(query));
    const cached = cache.get(key);
    if (cached) {
      logger.debug({ policy: cached.policy }, "router.cache_hit");
      return cached;
    }

    if (!classifier || !classifier.isCompletionConfigured()) {
      logger.warn({ rule }, "router.classifier_unavailable");
      return fallbackDecision("classifier is not configured");
    }

    const messages: ChatMessage[] = [
      { role: "system", content: CLASSIFIER_SYSTEM_PROMPT },
      { role: "user", content: `Question: "${query.trim()}"` },
    ];

    let decision: RoutingDecision;
    try {
      const content = await withTimeout(
        (inner) =>
          classifier.complete(messages, {
            signal: inner,
            json: true,
            maxTokens: CLASSIFIER_MAX_TOKENS,
          }),
        { timeoutMs: this.options.timeoutMs, operationName: "Routing classifier", signal },
      );
      decision = parseClassifierOutput(content);
    } catch (error) {
      logger.warn({ err: error, rule }, "router.llm_request_failed");
      return fallbackDecision(`classifier failed (${errorMessage(error)})`);
    }

    cache.put(key, decision, this.options.cacheTtlSeconds);
    logger.info({ policy: decision.policy, rule }, "router.llm_decision");
    return decision;
  }
}

function fallbackDecision(reason: string): RoutingDecision {
  return createRoutingDecision("hybrid", `Fallback to hybrid: ${reason}.`);
}
