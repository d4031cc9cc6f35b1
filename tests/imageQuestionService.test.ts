import { describe, expect, it } from "vitest";
import {
  CredentialsMissingError,
  GenerationError,
  InvalidInputError,
} from "../src/domain/errors.js";
import { CompletionOptions } from "../src/infra/ai/types.js";
import {
  decodeImagePayload,
  IMAGE_ANSWER_CONFIDENCE,
  ImageQuestionAnswerer,
} from "../src/services/imageQuestionService.js";
import { silentLogger } from "../src/utils/logger.js";
import { ScriptedCompletionClient, ScriptedReply } from "./helpers/fakes.js";

// 12 bytes: the PNG signature and the start of an IHDR length.
const PNG_BASE64 = "iVBORw0KGgoAAAAN";
const JPEG_BASE64 = "/9j/4AAQ";
const WEBP_BASE64 = "UklGRhAAAABXRUJQVlA4IA==";

function createAnswerer(replies: ScriptedReply[], maxImageBytes = 1_000) {
  const client = new ScriptedCompletionClient(replies);
  const answerer = new ImageQuestionAnswerer({
    client,
    model: "vision-model",
    maxImageBytes,
    timeoutMs: 1_000,
    logger: silentLogger,
  });
  return { client, answerer };
}

describe("ImageQuestionAnswerer", () => {
  it("sends the question and image to the vision model", async () => {
    const seen: CompletionOptions[] = [];
    const { client, answerer } = createAnswerer([
      async (_messages, options) => {
        seen.push(options);
        return "  A red square.  ";
      },
    ]);

    const result = await answerer.answerWithImage({ query: "  What shape is this? ", imageBase64: PNG_BASE64 });

    expect(result).toMatchObject({
      answer: "A red square.",
      query: "What shape is this?",
      mime_type: "image/png",
      confidence: IMAGE_ANSWER_CONFIDENCE,
    });
    expect(result.latency_ms).toBeGreaterThanOrEqual(0);
    expect(client.calls[0]).toEqual([
      {
        role: "user",
        content: [
          { type: "text", text: "What shape is this?" },
          { type: "image_url", image_url: { url: `data:image/png;base64,${PNG_BASE64}` } },
        ],
      },
    ]);
    expect(seen[0].model).toBe("vision-model");
  });

  it("rejects a blank question before calling the model", async () => {
    const { client, answerer } = createAnswerer(["unused"]);

    await expect(answerer.answerWithImage({ query: "  ", imageBase64: PNG_BASE64 })).rejects.toThrow(
      "Question must be a non-empty string.",
    );
    expect(client.calls).toHaveLength(0);
  });

  it("wraps model failures in a GenerationError", async () => {
    const { answerer } = createAnswerer([new Error("HTTP 500")]);

    const pending = answerer.answerWithImage({ query: "What is this?", imageBase64: PNG_BASE64 });
    await expect(pending).rejects.toBeInstanceOf(GenerationError);
    await expect(pending).rejects.toThrow("Image question answering failed: HTTP 500");
  });

  it("treats a blank reply as a failure", async () => {
    const { answerer } = createAnswerer(["   "]);

    await expect(answerer.answerWithImage({ query: "What is this?", imageBase64: PNG_BASE64 })).rejects.toThrow(
      "Vision model returned an empty reply",
    );
  });

  it("rethrows missing credentials", async () => {
    const { answerer } = createAnswerer([new CredentialsMissingError("Language model provider", ["LLM_API_KEY"])]);

    await expect(
      answerer.answerWithImage({ query: "What is this?", imageBase64: PNG_BASE64 }),
    ).rejects.toBeInstanceOf(CredentialsMissingError);
  });
});

describe("decodeImagePayload", () => {
  it("reads the format from the bytes, not the data URL", () => {
    expect(decodeImagePayload(`data:image/png;base64,${JPEG_BASE64}`, 100)).toEqual({
      base64: JPEG_BASE64,
      mimeType: "image/jpeg",
      sizeBytes: 6,
    });
    expect(decodeImagePayload(WEBP_BASE64, 100).mimeType).toBe("image/webp");
  });

  it("rejects unusable payloads", () => {
    expect(() => decodeImagePayload("   ", 100)).toThrow("Image payload is empty.");
    expect(() => decodeImagePayload("not base64!", 100)).toThrow("Image payload is not valid base64.");
    expect(() => decodeImagePayload(PNG_BASE64, 8)).toThrow("Image is 12 bytes; the limit is 8.");
    expect(() => decodeImagePayload("aGVsbG8gd29ybGQh", 100)).toThrow(InvalidInputError);
    expect(() => decodeImagePayload("aGVsbG8gd29ybGQh", 100)).toThrow(
      "Unsupported image format. Use PNG, JPEG, GIF or WebP.",
    );
  });
});
