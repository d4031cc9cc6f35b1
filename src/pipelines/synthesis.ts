import { z } from "zod";
import {
  CredentialsMissingError,
  errorMessage,
  GenerationError,
  MalformedOutputError,
  RequestCancelledError,
} from "../domain/errors.js";
import { AnswerSynthesis } from "../domain/pipeline.js";
import { CallOptions, SynthResult } from "../domain/types.js";
import { ChatMessage, CompletionClient } from "../infra/ai/types.js";
import type { Logger } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";
import { extractJsonObject } from "./jsonOutput.js";

export const SYNTH_SYSTEM_PROMPT = [
  "You are a rigorous assistant. Answer the user's question from the provided Context.",
  "",
  "Principles:",
  "1. If the Context contains relevant information, use it to answer.",
  "2. If the Context contains JSON or other structured data, extract the key values (dates, places, numbers).",
  "3. Only say the information is insufficient when nothing in the Context is relevant.",
  "",
  "Output rules:",
  "1. Evidence lines start with an anchor such as [L1] (local) or [W1] (web). Cite anchors in the answer text.",
  '2. Respond with one valid JSON object: {"answer": string, "sources": string[], "confidence": number}.',
  '3. "sources" lists the anchors you relied on, e.g. ["L1", "W2"].',
  '4. "confidence" is between 0 and 1.',
  "5. No text outside the JSON object.",
].join("\n");

export const CORRECTIVE_INSTRUCTION =
  'Your previous reply was not valid JSON. Reply again with only a JSON object of the form {"answer": string, "sources": string[], "confidence": number}.';

export const NO_LOCAL_EVIDENCE = "No local evidence.";
export const NO_WEB_EVIDENCE = "No web evidence.";
export const GENERATION_UNAVAILABLE_ANSWER =
  "The answer generator is temporarily unavailable. Please try again later.";

export const DEFAULT_CONFIDENCE = 0.4;

const synthOutputSchema = z.object({
  answer: z.string().trim().min(1),
  sources: z.array(z.union([z.string(), z.number()])).nullish(),
  confidence: z.union([z.number(), z.string()]).nullish(),
});

export function buildUserPrompt(query: string, localBlock: string, webBlock: string): string {
  return [
    "Question:",
    query,
    "",
    "Context:",
    "--Local Evidence--",
    localBlock || NO_LOCAL_EVIDENCE,
    "",
    "--Web Evidence--",
    webBlock || NO_WEB_EVIDENCE,
  ].join("\n");
}

/**
 * Parses a model reply into a SynthResult.
 *
 * @throws MalformedOutputError when the reply holds no usable JSON object
 */
export function parseSynthOutput(content: string): SynthResult {
  const json = extractJsonObject(content);
  if (json === undefined) {
    throw new MalformedOutputError("Model reply is not a JSON object.", content);
  }
  const parsed = synthOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedOutputError("Model reply does not match the answer shape.", content);
  }

  return {
    answer: parsed.data.answer,
    sources: normalizeRefs(parsed.data.sources ?? []),
    confidence: clampConfidence(parsed.data.confidence),
  };
}

export function normalizeRefs(values: Array<string | number>): string[] {
  const refs: string[] = [];
  for (const value of values) {
    const ref = String(value).trim().replace(/^\[|\]$/g, "").trim();
    const normalized = /^[lw]\d+$/i.test(ref) ? ref.toUpperCase() : ref;
    if (normalized && !refs.includes(normalized)) {
      refs.push(normalized);
    }
  }
  return refs;
}

export function clampConfidence(value: number | string | null | undefined): number {
  const numeric = typeof value === "string" ? Number.parseFloat(value) : value;
  if (numeric === null || numeric === undefined || !Number.isFinite(numeric)) {
    return DEFAULT_CONFIDENCE;
  }
  return Math.min(1, Math.max(0, numeric));
}

export interface SynthesizerOptions {
  client: CompletionClient;
  timeoutMs: number;
  logger: Logger;
}

export class Synthesizer implements AnswerSynthesis {
  constructor(private readonly options: SynthesizerOptions) {}

  /**
   * Never fails on bad model output: a reply that stays malformed after one
   * corrective retry comes back verbatim with confidence 0.
   *
   * @throws CredentialsMissingError when no model credential is configured
   * @throws RequestCancelledError when the caller aborts
   */
  async generateAnswer(
    query: string,
    localBlock: string,
    webBlock: string,
    options: CallOptions = {},
  ): Promise<SynthResult> {
    const { logger } = this.options;
    const messages: ChatMessage[] = [
      { role: "system", content: SYNTH_SYSTEM_PROMPT },
      { role: "user", content: buildUserPrompt(query, localBlock, webBlock) },
    ];

    const first = await this.complete(messages, options.signal);
    if (first === null) {
      return degraded(GENERATION_UNAVAILABLE_ANSWER);
    }
    try {
      const result = parseSynthOutput(first);
      logger.info({ confidence: result.confidence }, "synth.success");
      return result;
    } catch (error) {
      logger.warn({ err: error, content: first.slice(0, 200) }, "synth.json_decode_failed");
    }

    const retry = await this.complete(
      [
        ...messages,
        { role: "assistant", content: first },
        { role: "user", content: CORRECTIVE_INSTRUCTION },
      ],
      options.signal,
    );
    if (retry === null) {
      return degraded(first);
    }
    try {
      const result = parseSynthOutput(retry);
      logger.info({ confidence: result.confidence, retried: true }, "synth.success");
      return result;
    } catch (error) {
      logger.warn({ err: error, content: retry.slice(0, 200) }, "synth.retry_failed");
      return degraded(retry);
    }
  }

  /** Returns null when the call failed in a recoverable way. */
  private async complete(
    messages: ChatMessage[],
    signal: AbortSignal | undefined,
  ): Promise<string | null> {
    const { client, timeoutMs, logger } = this.options;
    try {
      const content = await withTimeout(
        (inner) => client.complete(messages, { signal: inner, json: true }),
        { timeoutMs, operationName: "Answer generation", signal },
      );
      if (!content.trim()) {
        throw new GenerationError("Model returned an empty reply");
      }
      return content;
    } catch (error) {
      if (error instanceof CredentialsMissingError || error instanceof RequestCancelledError) {
        throw error;
      }
      logger.error({ err: error, reason: errorMessage(error) }, "synth.failed");
      return null;
    }
  }
}

function degraded(answer: string): SynthResult {
  return {
    answer: answer.trim() || GENERATION_UNAVAILABLE_ANSWER,
    sources: [],
    confidence: 0,
  };
}
