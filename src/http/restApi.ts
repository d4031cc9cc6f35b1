import { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod";
import {
  AgentError,
  CredentialsMissingError,
  InvalidInputError,
  RequestCancelledError,
} from "../domain/errors.js";
import { ImageQuestionAnswering, QueryRouting } from "../domain/pipeline.js";
import { CallOptions, FinalResponse } from "../domain/types.js";
import { IndexHealth } from "../infra/store/localKnowledgeIndex.js";
import type { Logger } from "../utils/logger.js";

export interface RestApiDeps {
  orchestrator: { answer(query: string, options?: CallOptions): Promise<FinalResponse> };
  router: QueryRouting;
  imageAnswerer: ImageQuestionAnswering;
  indexHealth: () => IndexHealth;
  logger: Logger;
}

export class InvalidJsonBodyError extends Error {
  constructor(options?: ErrorOptions) {
    super("Invalid JSON body", options);
    this.name = "InvalidJsonBodyError";
  }
}

const queryBodySchema = z.object({
  q: z.string().trim().min(1),
});

const imageBodySchema = z.object({
  q: z.string().trim().min(1),
  image_base64: z.string().min(1),
});

const POST_ROUTES = new Set(["/api/agent/answer", "/api/router/intent", "/api/agent/multimodal"]);

/**
 * Serves the REST routes. Resolves to false when the path is not one of them so
 * the caller can try other handlers.
 */
export async function handleRestRequest(
  req: IncomingMessage,
  res: ServerResponse,
  pathname: string,
  deps: RestApiDeps,
): Promise<boolean> {
  if (pathname === "/healthz") {
    if (req.method !== "GET") {
      writeJson(res, 405, { error: "Method not allowed" });
      return true;
    }
    const health = deps.indexHealth();
    const body =
      health.status === "failed"
        ? { status: health.status, error: health.error ?? "unknown error" }
        : { status: health.status, chunks: health.stats.chunks };
    writeJson(res, health.status === "ready" ? 200 : 503, body);
    return true;
  }

  if (!POST_ROUTES.has(pathname)) {
    return false;
  }

  if (req.method !== "POST") {
    writeJson(res, 405, { error: "Method not allowed" });
    return true;
  }

  let body: unknown;
  try {
    body = await readJsonBody(req);
  } catch (error) {
    if (error instanceof InvalidJsonBodyError) {
      writeJson(res, 400, { error: error.message });
      return true;
    }
    throw error;
  }

  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });

  if (pathname === "/api/agent/multimodal") {
    await handleImageAnswer(res, body, deps, controller.signal);
    return true;
  }

  const parsed = queryBodySchema.safeParse(body);
  if (!parsed.success) {
    writeJson(res, 400, { error: 'Field "q" must be a non-empty string.' });
    return true;
  }

  if (pathname === "/api/router/intent") {
    const decision = await deps.router.route(parsed.data.q, { signal: controller.signal });
    writeJson(res, 200, decision);
    return true;
  }

  deps.logger.info({ query_chars: parsed.data.q.length }, "api.answer");
  const response = await deps.orchestrator.answer(parsed.data.q, { signal: controller.signal });
  if (!res.destroyed) {
    writeJson(res, 200, response);
  }
  return true;
}

async function handleImageAnswer(
  res: ServerResponse,
  body: unknown,
  deps: RestApiDeps,
  signal: AbortSignal,
): Promise<void> {
  const parsed = imageBodySchema.safeParse(body);
  if (!parsed.success) {
    writeJson(res, 400, { error: 'Fields "q" and "image_base64" must be non-empty strings.' });
    return;
  }

  deps.logger.info({ query_chars: parsed.data.q.length }, "api.multimodal");
  try {
    const answer = await deps.imageAnswerer.answerWithImage(
      { query: parsed.data.q, imageBase64: parsed.data.image_base64 },
      { signal },
    );
    writeJson(res, 200, answer);
  } catch (error) {
    if (error instanceof RequestCancelledError && res.destroyed) {
      return;
    }
    if (!(error instanceof AgentError)) {
      throw error;
    }
    writeJson(res, statusForError(error), { error: error.message, code: error.code });
  }
}

function statusForError(error: AgentError): number {
  if (error instanceof InvalidInputError) {
    return 400;
  }
  if (error instanceof CredentialsMissingError) {
    return 503;
  }
  return 502;
}

export async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new InvalidJsonBodyError({ cause: error });
  }
}

export function writeJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}
