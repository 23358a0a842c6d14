import {
  BadGatewayException,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { LlmService } from '../llm/llm.service';
import { LlmErrorKind } from '../llm/interfaces/llm.interface';
import { WebSearchService } from '../search/web-search.service';
import {
  SearchStatus,
  WebSearchResult,
} from '../search/interfaces/web-search.interface';

export interface ResearchAnswer {
  question: string;
  answer: string;
  sources: WebSearchResult[];
  searchStatus: SearchStatus;
}

@Injectable()
export class ResearchService {
  private readonly logger = new Logger(ResearchService.name);

  constructor(
    private readonly llmService: LlmService,
    private readonly webSearchService: WebSearchService,
  ) {}

  /**
   * 웹 검색 결과를 근거로 질문에 답변합니다.
   * 검색을 사용할 수 없으면 소스 없이 답변합니다.
   */
  async ask(question: string, maxResults?: number): Promise<ResearchAnswer> {
    // LLM 이 없으면 검색 비용을 쓰지 않음
    if (!this.llmService.isConfigured()) {
      throw new ServiceUnavailableException(
        'AI analysis is not configured. Web-search Q&A is unavailable.',
      );
    }

    const searchOutcome = await this.webSearchService.search(
      question,
      maxResults,
    );
    const sources =
      searchOutcome.status === SearchStatus.OK ? searchOutcome.results : [];

    if (searchOutcome.status !== SearchStatus.OK) {
      this.logger.warn(
        `Answering without web sources (search status: ${searchOutcome.status})`,
      );
    }

    const result = await this.llmService.answerQuestion({
      question,
      sources,
    });

    if (!result.ok) {
      if (result.error.kind === LlmErrorKind.NOT_CONFIGURED) {
        throw new ServiceUnavailableException(result.error.message);
      }
      throw new BadGatewayException(result.error.message);
    }

    return {
      question,
      answer: result.value,
      sources,
      searchStatus: searchOutcome.status,
    };
  }
}
