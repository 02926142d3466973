export type PageContentType = 'profile' | 'release' | 'track';

export interface IndexedPage {
  readonly pageId: number;
  readonly title: string;
  readonly url: string;
  readonly content: string;
  readonly wordCount: number;
  readonly categories: readonly string[];
  readonly sections: readonly string[];
  readonly contentType: PageContentType;
}

export type IndexingStatus = 'completed' | 'error';

export interface IndexingResult {
  readonly entityName: string;
  readonly entityId?: string;
  readonly primaryPages: readonly IndexedPage[];
  readonly releasePages: readonly IndexedPage[];
  readonly trackPages: readonly IndexedPage[];
  readonly totalPages: number;
  readonly confidence: number;
  readonly status: IndexingStatus;
  readonly error?: string;
}
