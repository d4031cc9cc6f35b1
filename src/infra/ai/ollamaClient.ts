import { z } from "zod";
import { ProviderError } from "../../domain/errors.js";
import { postJson } from "../http/postJson.js";
import { ChatMessage, CompletionClient, CompletionOptions, EmbeddingClient } from "./types.js";

interface OllamaChatMessage {
  role: ChatMessage["role"];
  content: string;
  images?: string[];
}

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  temperature: number;
  maxTokens: number;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

const EMBEDDING_CONCURRENCY = 4;

const PROVIDER_NAME = "Ollama";

export class OllamaClient implements CompletionClient, EmbeddingClient {
  constructor(private readonly options: OllamaClientOptions) {}

  isCompletionConfigured(): boolean {
    return true;
  }

  isEmbeddingConfigured(): boolean {
    return true;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const data = await postJson(
      `${this.options.baseUrl}/api/chat`,
      {
        model: options.model ?? this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        ...(options.json ? { format: "json" } : {}),
        options: {
          temperature: options.temperature ?? this.options.temperature,
          num_predict: options.maxTokens ?? this.options.maxTokens,
        },
        messages: messages.map(toOllamaMessage),
      },
      chatResponseSchema,
      { providerName: PROVIDER_NAME, signal: options.signal },
    );
    return data.message?.content?.trim() ?? "";
  }

  async embedTexts(texts: string[], options: { signal?: AbortSignal } = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (cursor < texts.length) {
        const index = cursor;
        cursor += 1;
        embeddings[index] = await this.embedQuery(texts[index], options);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async embedQuery(query: string, options: { signal?: AbortSignal } = {}): Promise<number[]> {
    const data = await postJson(
      `${this.options.baseUrl}/api/embeddings`,
      {
        model: this.options.embeddingModel,
        prompt: query,
      },
      embeddingsResponseSchema,
      { providerName: PROVIDER_NAME, signal: options.signal },
    );

    if (!data.embedding || data.embedding.length === 0) {
      throw new ProviderError(PROVIDER_NAME, undefined, "embeddings returned an empty vector");
    }
    return data.embedding;
  }
}

const DATA_URL_PREFIX = /^data:[^;,]+;base64,/;

/** Ollama takes image parts as bare base64 strings beside the text. */
function toOllamaMessage(message: ChatMessage): OllamaChatMessage {
  if (typeof message.content === "string") {
    return { role: message.role, content: message.content };
  }

  const texts: string[] = [];
  const images: string[] = [];
  for (const part of message.content) {
    if (part.type === "text") {
      texts.push(part.text);
    } else {
      images.push(part.image_url.url.replace(DATA_URL_PREFIX, ""));
    }
  }
  return {
    role: message.role,
    content: texts.join("\n"),
    ...(images.length > 0 ? { images } : {}),
  };
}
