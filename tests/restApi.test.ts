import { createServer, Server } from "node:http";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import {
  CredentialsMissingError,
  GenerationError,
  InvalidInputError,
} from "../src/domain/errors.js";
import { createRoutingDecision, FinalResponse, ImageAnswer, ImageQuestion } from "../src/domain/types.js";
import { handleRestRequest, RestApiDeps, writeJson } from "../src/http/restApi.js";
import { IndexHealth } from "../src/infra/store/localKnowledgeIndex.js";
import { silentLogger } from "../src/utils/logger.js";

const STATS = { sources: 1, chunks: 3, embedded_chunks: 0 };

const ANSWER: FinalResponse = {
  answer: "Answer [L1].",
  sources: [],
  routing: createRoutingDecision("local", "Matched local keyword \"xylos\"; no classifier needed."),
  latency_ms: { retrieve: 1, rerank: 0, generate: 2, total: 3 },
  confidence: 0.9,
};

const IMAGE_ANSWER: ImageAnswer = {
  answer: "A red square.",
  query: "What shape is this?",
  mime_type: "image/png",
  latency_ms: 5,
  confidence: 0.85,
};

describe("REST API", () => {
  let server: Server;
  let baseUrl = "";
  let health: IndexHealth = { status: "ready", stats: STATS };
  const answeredQueries: string[] = [];
  const imageQuestions: ImageQuestion[] = [];
  let imageFailure: Error | null = null;

  const deps: RestApiDeps = {
    orchestrator: {
      answer: async (query) => {
        answeredQueries.push(query);
        return ANSWER;
      },
    },
    router: {
      route: async () => createRoutingDecision("web", "Matched realtime keyword \"today\"; routing to web search."),
    },
    imageAnswerer: {
      answerWithImage: async (input) => {
        imageQuestions.push(input);
        if (imageFailure) {
          throw imageFailure;
        }
        return IMAGE_ANSWER;
      },
    },
    indexHealth: () => health,
    logger: silentLogger,
  };

  beforeAll(async () => {
    server = createServer((req, res) => {
      const url = new URL(req.url ?? "/", "http://localhost");
      handleRestRequest(req, res, url.pathname, deps)
        .then((handled) => {
          if (!handled) {
            writeJson(res, 404, { error: "Not found" });
          }
        })
        .catch((error: unknown) => {
          writeJson(res, 500, { error: String(error) });
        });
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("test server is not listening on TCP");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach(() => {
    health = { status: "ready", stats: STATS };
    answeredQueries.length = 0;
    imageQuestions.length = 0;
    imageFailure = null;
  });

  function post(path: string, body: string) {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body,
    });
  }

  it("reports a ready index", async () => {
    const response = await fetch(`${baseUrl}/healthz`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ready", chunks: 3 });
  });

  it("reports 503 while the index loads or after it failed", async () => {
    health = { status: "loading", stats: { sources: 0, chunks: 0, embedded_chunks: 0 } };
    const loading = await fetch(`${baseUrl}/healthz`);
    expect(loading.status).toBe(503);
    expect(await loading.json()).toEqual({ status: "loading", chunks: 0 });

    health = { status: "failed", error: "no indexable documents found", stats: STATS };
    const failed = await fetch(`${baseUrl}/healthz`);
    expect(failed.status).toBe(503);
    expect(await failed.json()).toEqual({ status: "failed", error: "no indexable documents found" });
  });

  it("answers a question", async () => {
    const response = await post("/api/agent/answer", JSON.stringify({ q: "  What is Xylos?  " }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(ANSWER);
    expect(answeredQueries).toEqual(["What is Xylos?"]);
  });

  it("returns the routing decision", async () => {
    const response = await post("/api/router/intent", JSON.stringify({ q: "weather today" }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      policy: "web",
      rationale: 'Matched realtime keyword "today"; routing to web search.',
    });
  });

  it("answers a question about an image", async () => {
    const response = await post(
      "/api/agent/multimodal",
      JSON.stringify({ q: " What shape is this? ", image_base64: "iVBORw0KGgoAAAAN" }),
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(IMAGE_ANSWER);
    expect(imageQuestions).toEqual([{ query: "What shape is this?", imageBase64: "iVBORw0KGgoAAAAN" }]);
  });

  it("maps image answering failures to status codes", async () => {
    const body = JSON.stringify({ q: "What is this?", image_base64: "aGVsbG8gd29ybGQh" });

    imageFailure = new InvalidInputError("Unsupported image format. Use PNG, JPEG, GIF or WebP.");
    const invalid = await post("/api/agent/multimodal", body);
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toEqual({
      error: "Unsupported image format. Use PNG, JPEG, GIF or WebP.",
      code: "INVALID_INPUT",
    });

    imageFailure = new CredentialsMissingError("Language model provider", ["LLM_API_KEY"]);
    expect((await post("/api/agent/multimodal", body)).status).toBe(503);

    imageFailure = new GenerationError("Vision model returned an empty reply");
    const failed = await post("/api/agent/multimodal", body);
    expect(failed.status).toBe(502);
    expect(await failed.json()).toEqual({
      error: "Vision model returned an empty reply",
      code: "GENERATION_ERROR",
    });
  });

  it("requires both image fields", async () => {
    const response = await post("/api/agent/multimodal", JSON.stringify({ q: "What is this?" }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Fields "q" and "image_base64" must be non-empty strings.',
    });
    expect(imageQuestions).toEqual([]);
  });

  it("rejects malformed bodies", async () => {
    const invalidJson = await post("/api/agent/answer", "{not json");
    expect(invalidJson.status).toBe(400);
    expect(await invalidJson.json()).toEqual({ error: "Invalid JSON body" });

    const blank = await post("/api/agent/answer", JSON.stringify({ q: "   " }));
    expect(blank.status).toBe(400);
    expect(await blank.json()).toEqual({ error: 'Field "q" must be a non-empty string.' });

    const missing = await post("/api/router/intent", "");
    expect(missing.status).toBe(400);
    expect(answeredQueries).toEqual([]);
  });

  it("rejects unsupported methods", async () => {
    expect((await fetch(`${baseUrl}/api/agent/answer`)).status).toBe(405);
    expect((await post("/healthz", "{}")).status).toBe(405);
  });

  it("leaves unknown paths to the caller", async () => {
    expect((await fetch(`${baseUrl}/elsewhere`)).status).toBe(404);
  });
});
