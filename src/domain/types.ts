export const ROUTING_POLICIES = ["local", "web", "hybrid"] as const;

export type RoutingPolicy = (typeof ROUTING_POLICIES)[number];

export interface RoutingDecision {
  readonly policy: RoutingPolicy;
  readonly rationale: string;
}

export interface LocalEvidence {
  source_tag: "local";
  chunk_id: string;
  text: string;
  score: number;
  section?: string;
}

export interface WebEvidence {
  source_tag: "web";
  url: string;
  title: string;
  snippet: string;
  score: number;
  published_at?: string;
}

export type Evidence = LocalEvidence | WebEvidence;

/** Normalized evidence carrying the citation anchor used in prompts and responses. */
export type LocalSource = LocalEvidence & { ref: string };

export type WebSource = WebEvidence & { ref: string };

export type Source = LocalSource | WebSource;

export interface NormalizedContext {
  local_sources: LocalSource[];
  web_sources: WebSource[];
  local_block: string;
  web_block: string;
}

export interface SynthResult {
  answer: string;
  sources: string[];
  confidence: number;
}

export interface LatencyBreakdown {
  retrieve: number;
  rerank: number;
  generate: number;
  total: number;
}

export interface FinalResponse {
  answer: string;
  sources: Source[];
  routing: RoutingDecision;
  latency_ms: LatencyBreakdown;
  confidence: number;
}

export interface ImageQuestion {
  query: string;
  /** Base64 image bytes, optionally as a `data:` URL. */
  imageBase64: string;
}

export interface ImageAnswer {
  answer: string;
  query: string;
  mime_type: string;
  latency_ms: number;
  confidence: number;
}

export interface RetrievalLatency {
  retrieve: number;
  rerank: number;
}

export interface RetrievalResult<T extends Evidence> {
  items: T[];
  latency: RetrievalLatency;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export function isRoutingPolicy(value: unknown): value is RoutingPolicy {
  return ROUTING_POLICIES.some((policy) => policy === value);
}

export function createRoutingDecision(policy: RoutingPolicy, rationale: string): RoutingDecision {
  return Object.freeze({ policy, rationale });
}
