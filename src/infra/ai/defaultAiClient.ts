import { AppConfig, EmbeddingProvider, LlmProvider } from "../../config/env.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { AiClient, ChatMessage, CompletionOptions } from "./types.js";

/**
 * Routes completions to the configured LLM provider and embeddings to the
 * configured embedding provider, which may differ.
 */
export class DefaultAiClient implements AiClient {
  private readonly openAi: OpenAiClient;

  private readonly ollama: OllamaClient;

  private readonly llmProvider: LlmProvider;

  private readonly embeddingProvider: EmbeddingProvider;

  constructor(config: AppConfig) {
    this.openAi = new OpenAiClient({
      apiKey: config.llmApiKey,
      baseUrl: config.llmBaseUrl,
      chatModel: config.llmModel,
      embeddingModel: config.embeddingModel,
      temperature: config.llmTemperature,
      maxTokens: config.llmMaxTokens,
    });
    this.ollama = new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
      temperature: config.llmTemperature,
      maxTokens: config.llmMaxTokens,
    });
    this.llmProvider = config.llmProvider;
    this.embeddingProvider = config.embeddingProvider;
  }

  isCompletionConfigured(): boolean {
    return this.llmProvider === "ollama" || this.openAi.isCompletionConfigured();
  }

  async complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string> {
    if (this.llmProvider === "ollama") {
      return this.ollama.complete(messages, options);
    }
    return this.openAi.complete(messages, options);
  }

  isEmbeddingConfigured(): boolean {
    if (this.embeddingProvider === "none") {
      return false;
    }
    if (this.embeddingProvider === "openai") {
      return this.openAi.isEmbeddingConfigured();
    }
    return true;
  }

  async embedTexts(texts: string[], options?: { signal?: AbortSignal }): Promise<number[][]> {
    if (texts.length === 0 || this.embeddingProvider === "none") {
      return [];
    }
    if (this.embeddingProvider === "openai") {
      return this.openAi.embedTexts(texts, options);
    }
    return this.ollama.embedTexts(texts, options);
  }

  async embedQuery(query: string, options?: { signal?: AbortSignal }): Promise<number[]> {
    if (this.embeddingProvider === "none") {
      throw new Error("Embedding provider is disabled.");
    }
    if (this.embeddingProvider === "openai") {
      return this.openAi.embedQuery(query, options);
    }
    return this.ollama.embedQuery(query, options);
  }
}
