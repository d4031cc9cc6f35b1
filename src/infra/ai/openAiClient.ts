import { z } from "zod";
import { CredentialsMissingError } from "../../domain/errors.js";
import { postJson } from "../http/postJson.js";
import { ChatMessage, CompletionClient, CompletionOptions, EmbeddingClient } from "./types.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  temperature: number;
  maxTokens: number;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
});

const PROVIDER_NAME = "OpenAI-compatible API";

/**
 * Client for any endpoint speaking the OpenAI `/chat/completions` and
 * `/embeddings` protocol.
 */
export class OpenAiClient implements CompletionClient, EmbeddingClient {
  constructor(private readonly options: OpenAiClientOptions) {}

  isCompletionConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  isEmbeddingConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const apiKey = this.requireApiKey();
    const data = await postJson(
      `${this.options.baseUrl}/chat/completions`,
      {
        model: options.model ?? this.options.chatModel,
        temperature: options.temperature ?? this.options.temperature,
        max_tokens: options.maxTokens ?? this.options.maxTokens,
        messages,
        ...(options.json ? { response_format: { type: "json_object" } } : {}),
      },
      chatResponseSchema,
      {
        providerName: PROVIDER_NAME,
        headers: { Authorization: `Bearer ${apiKey}` },
        signal: options.signal,
      },
    );
    return data.choices[0]?.message.content?.trim() ?? "";
  }

  async embedTexts(texts: string[], options: { signal?: AbortSignal } = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const apiKey = this.requireApiKey();

    const data = await postJson(
      `${this.options.baseUrl}/embeddings`,
      {
        model: this.options.embeddingModel,
        input: texts,
      },
      embeddingResponseSchema,
      {
        providerName: PROVIDER_NAME,
        headers: { Authorization: `Bearer ${apiKey}` },
        signal: options.signal,
      },
    );

    return [...data.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }

  async embedQuery(query: string, options: { signal?: AbortSignal } = {}): Promise<number[]> {
    const [embedding] = await this.embedTexts([query], options);
    return embedding ?? [];
  }

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new CredentialsMissingError("Language model provider", ["LLM_API_KEY"]);
    }
    return this.options.apiKey;
  }
}
