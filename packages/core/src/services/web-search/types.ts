export interface WebSearchHit {
  readonly title: string;
  readonly link: string;
  readonly snippet: string;
  readonly source: string;
}

/** Implementations throw when the provider cannot be reached. */
export interface WebSearchClient {
  readonly provider: string;
  search(query: string, maxResults: number): Promise<WebSearchHit[]>;
}
