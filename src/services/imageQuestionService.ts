import {
  CredentialsMissingError,
  errorMessage,
  GenerationError,
  InvalidInputError,
  RequestCancelledError,
} from "../domain/errors.js";
import { ImageQuestionAnswering } from "../domain/pipeline.js";
import { CallOptions, ImageAnswer, ImageQuestion } from "../domain/types.js";
import { ChatMessage, CompletionClient } from "../infra/ai/types.js";
import type { Logger } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";
import { Timer } from "../utils/timing.js";

export const IMAGE_ANSWER_CONFIDENCE = 0.85;

const DATA_URL_PREFIX = /^data:[^;,]+;base64,/;
const BASE64_BODY = /^[A-Za-z0-9+/]+={0,2}$/;

export interface DecodedImage {
  base64: string;
  mimeType: string;
  sizeBytes: number;
}

export interface ImageQuestionAnswererOptions {
  client: CompletionClient;
  model: string;
  maxImageBytes: number;
  timeoutMs: number;
  logger: Logger;
}

/**
 * Answers a question about one image with a vision-capable chat model. There is
 * no retrieval on this path.
 */
export class ImageQuestionAnswerer implements ImageQuestionAnswering {
  constructor(private readonly options: ImageQuestionAnswererOptions) {}

  /**
   * @throws InvalidInputError for a blank question or an unusable image
   * @throws CredentialsMissingError when no model credential is configured
   * @throws GenerationError when the model call fails or returns nothing
   */
  async answerWithImage(input: ImageQuestion, options: CallOptions = {}): Promise<ImageAnswer> {
    const { client, model, maxImageBytes, timeoutMs, logger } = this.options;
    const query = input.query.trim();
    if (!query) {
      throw new InvalidInputError("Question must be a non-empty string.");
    }
    const image = decodeImagePayload(input.imageBase64, maxImageBytes);

    const messages: ChatMessage[] = [
      {
        role: "user",
        content: [
          { type: "text", text: query },
          { type: "image_url", image_url: { url: `data:${image.mimeType};base64,${image.base64}` } },
        ],
      },
    ];

    const timer = new Timer();
    let content: string;
    try {
      content = await withTimeout((inner) => client.complete(messages, { signal: inner, model }), {
        timeoutMs,
        operationName: "Image question answering",
        signal: options.signal,
      });
    } catch (error) {
      if (error instanceof CredentialsMissingError || error instanceof RequestCancelledError) {
        throw error;
      }
      logger.error({ err: error }, "multimodal.failed");
      throw new GenerationError(`Image question answering failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const answer = content.trim();
    if (!answer) {
      throw new GenerationError("Vision model returned an empty reply");
    }

    const latencyMs = timer.elapsedMs();
    logger.info(
      { query_chars: query.length, image_bytes: image.sizeBytes, latency_ms: latencyMs },
      "multimodal.success",
    );
    return {
      answer,
      query,
      mime_type: image.mimeType,
      latency_ms: latencyMs,
      confidence: IMAGE_ANSWER_CONFIDENCE,
    };
  }
}

/**
 * Decodes a base64 image (bare or as a `data:` URL). The format is read from
 * the bytes, not from the declared type.
 */
export function decodeImagePayload(value: string, maxBytes: number): DecodedImage {
  const compact = value.trim().replace(DATA_URL_PREFIX, "").replace(/\s+/g, "");
  if (!compact) {
    throw new InvalidInputError("Image payload is empty.");
  }
  if (compact.length % 4 !== 0 || !BASE64_BODY.test(compact)) {
    throw new InvalidInputError("Image payload is not valid base64.");
  }

  const bytes = Buffer.from(compact, "base64");
  if (bytes.length > maxBytes) {
    throw new InvalidInputError(`Image is ${bytes.length} bytes; the limit is ${maxBytes}.`);
  }

  const mimeType = sniffImageType(bytes);
  if (!mimeType) {
    throw new InvalidInputError("Unsupported image format. Use PNG, JPEG, GIF or WebP.");
  }
  return { base64: compact, mimeType, sizeBytes: bytes.length };
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export function sniffImageType(bytes: Buffer): string | undefined {
  if (PNG_SIGNATURE.every((byte, index) => bytes[index] === byte)) {
    return "image/png";
  }
  if (bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return "image/jpeg";
  }
  if (bytes.subarray(0, 4).toString("latin1") === "GIF8") {
    return "image/gif";
  }
  if (
    bytes.subarray(0, 4).toString("latin1") === "RIFF" &&
    bytes.subarray(8, 12).toString("latin1") === "WEBP"
  ) {
    return "image/webp";
  }
  return undefined;
}
