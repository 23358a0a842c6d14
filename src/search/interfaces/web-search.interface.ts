export interface WebSearchResult {
  title: string;
  url: string;
  content: string;
}

export enum SearchStatus {
  OK = 'OK',
  NOT_CONFIGURED = 'NOT_CONFIGURED',
  FAILED = 'FAILED',
}

export type SearchOutcome =
  | { status: SearchStatus.OK; results: WebSearchResult[] }
  | { status: SearchStatus.NOT_CONFIGURED }
  | { status: SearchStatus.FAILED; message: string };
