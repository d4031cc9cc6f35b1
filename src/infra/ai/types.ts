export type ChatRole = "system" | "user" | "assistant";

export type ChatContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export interface ChatMessage {
  role: ChatRole;
  /** Plain text, or text and image parts for vision-capable models. */
  content: string | ChatContentPart[];
}

export interface CompletionOptions {
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
  /** Overrides the configured chat model for this call. */
  model?: string;
  /** Ask the provider for a JSON object reply where it supports that. */
  json?: boolean;
}

export interface CompletionClient {
  isCompletionConfigured(): boolean;
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

export interface EmbeddingClient {
  isEmbeddingConfigured(): boolean;
  embedTexts(texts: string[], options?: { signal?: AbortSignal }): Promise<number[][]>;
  embedQuery(query: string, options?: { signal?: AbortSignal }): Promise<number[]>;
}

export interface AiClient extends CompletionClient, EmbeddingClient {}
