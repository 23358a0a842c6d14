import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  SearchOutcome,
  SearchStatus,
  WebSearchResult,
} from './interfaces/web-search.interface';

export const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

const DEFAULT_MAX_RESULTS = 5;
const REQUEST_TIMEOUT_MS = 15000;

@Injectable()
export class WebSearchService {
  private readonly logger = new Logger(WebSearchService.name);
  private readonly apiKey: string;
  private readonly defaultMaxResults: number;

  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('TAVILY_API_KEY') || '';
    this.defaultMaxResults =
      Number(this.configService.get<number | string>('TAVILY_MAX_RESULTS')) ||
      DEFAULT_MAX_RESULTS;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  /**
   * 웹 검색을 수행합니다. 네트워크/HTTP 오류는 FAILED 결과로 반환합니다.
   */
  async search(query: string, maxResults?: number): Promise<SearchOutcome> {
    if (!this.isConfigured()) {
      return { status: SearchStatus.NOT_CONFIGURED };
    }

    const startTime = Date.now();

    try {
      const response = await fetch(TAVILY_SEARCH_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          query,
          max_results: maxResults ?? this.defaultMaxResults,
          search_depth: 'basic',
        }),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });

      if (!response.ok) {
        this.logger.warn(
          `Web search failed with status ${response.status} for query: ${query}`,
        );
        return {
          status: SearchStatus.FAILED,
          message: `Search provider responded with ${response.status}`,
        };
      }

      const body: unknown = await response.json();
      const results = this.parseResults(body);

      this.logger.log(
        `Web search returned ${results.length} results in ${Date.now() - startTime}ms`,
      );

      return { status: SearchStatus.OK, results };
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.error(`Web search request failed: ${errorMessage}`);
      return { status: SearchStatus.FAILED, message: errorMessage };
    }
  }

  /**
   * 응답 본문에서 유효한 결과만 추출합니다
   */
  private parseResults(body: unknown): WebSearchResult[] {
    if (
      typeof body !== 'object' ||
      body === null ||
      !('results' in body) ||
      !Array.isArray(body.results)
    ) {
      return [];
    }

    const results: WebSearchResult[] = [];
    for (const item of body.results) {
      if (this.isSearchResult(item)) {
        results.push({ title: item.title, url: item.url, content: item.content });
      }
    }
    return results;
  }

  private isSearchResult(item: unknown): item is WebSearchResult {
    return (
      typeof item === 'object' &&
      item !== null &&
      'title' in item &&
      typeof item.title === 'string' &&
      'url' in item &&
      typeof item.url === 'string' &&
      'content' in item &&
      typeof item.content === 'string'
    );
  }
}
