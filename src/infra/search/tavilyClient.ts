import { z } from "zod";
import { CredentialsMissingError } from "../../domain/errors.js";
import { postJson } from "../http/postJson.js";
import { RawWebResult, WebSearchProvider } from "./types.js";

interface TavilyClientOptions {
  apiKey: string | null;
  baseUrl: string;
  searchDepth?: "basic" | "advanced";
}

const searchResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        content: z.string().nullish(),
        score: z.number().nullish(),
        published_date: z.string().nullish(),
      }),
    )
    .default([]),
});

export class TavilyClient implements WebSearchProvider {
  readonly name = "Tavily";

  constructor(private readonly options: TavilyClientOptions) {}

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async search(
    query: string,
    maxResults: number,
    options: { signal?: AbortSignal } = {},
  ): Promise<RawWebResult[]> {
    if (!this.options.apiKey) {
      throw new CredentialsMissingError("Web search provider", ["TAVILY_API_KEY"]);
    }

    const data = await postJson(
      `${this.options.baseUrl}/search`,
      {
        query,
        max_results: maxResults,
        search_depth: this.options.searchDepth ?? "basic",
        include_answer: false,
      },
      searchResponseSchema,
      {
        providerName: this.name,
        headers: { Authorization: `Bearer ${this.options.apiKey}` },
        signal: options.signal,
      },
    );
    return data.results;
  }
}
