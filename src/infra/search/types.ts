export interface RawWebResult {
  title?: string | null;
  url?: string | null;
  content?: string | null;
  score?: number | null;
  published_date?: string | null;
}

export interface WebSearchProvider {
  readonly name: string;
  isConfigured(): boolean;
  search(query: string, maxResults: number, options?: { signal?: AbortSignal }): Promise<RawWebResult[]>;
}
