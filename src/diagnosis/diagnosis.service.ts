import { Injectable, Logger } from '@nestjs/common';
import { AppLoggerService } from '../common/logger/app-logger.service';
import { LlmService } from '../llm/llm.service';
import { LlmErrorKind } from '../llm/interfaces/llm.interface';
import { PdfReportService } from '../report/pdf-report.service';
import { DomainClassifierService } from './domain-classifier.service';
import { RecommendationService } from './recommendation.service';
import { GenerateReportDto } from './dto/diagnose-problem.dto';
import {
  ClassificationStats,
  DOMAIN_DISPLAY_NAMES,
  DomainLabel,
  RecommendationBlock,
} from './interfaces/diagnosis.interface';

export enum AiBriefStatus {
  SKIPPED = 'SKIPPED',
  GENERATED = 'GENERATED',
  UNAVAILABLE = 'UNAVAILABLE',
  FAILED = 'FAILED',
}

export interface AiBriefResult {
  status: AiBriefStatus;
  brief: string | null;
  message: string | null;
}

export interface DiagnosisResult {
  domain: DomainLabel;
  domainDisplayName: string;
  matchedKeyword: string | null;
  recommendation: RecommendationBlock;
  summaryMarkdown: string;
  ai: AiBriefResult;
}

export interface BatchDiagnosisResult {
  results: {
    index: number;
    domain: DomainLabel;
    matchedKeyword: string | null;
  }[];
  stats: ClassificationStats;
}

export interface DomainInfo {
  domain: DomainLabel;
  displayName: string;
  priority: number | null;
  keywords: readonly string[];
}

export interface GeneratedReport {
  domain: DomainLabel;
  content: Buffer;
}

@Injectable()
export class DiagnosisService {
  private readonly logger = new Logger(DiagnosisService.name);

  constructor(
    private readonly domainClassifierService: DomainClassifierService,
    private readonly recommendationService: RecommendationService,
    private readonly llmService: LlmService,
    private readonly pdfReportService: PdfReportService,
    private readonly appLoggerService: AppLoggerService,
  ) {}

  /**
   * 문제 설명을 진단합니다.
   * 규칙 기반 결과가 먼저 확정되고, AI 브리프 실패는 결과에 상태로만 반영됩니다.
   */
  async diagnose(
    problem: string,
    includeAiBrief = false,
  ): Promise<DiagnosisResult> {
    const classification =
      this.domainClassifierService.classifyWithDetails(problem);
    const recommendation = this.recommendationService.recommend(
      classification.domain,
      problem,
    );
    const summaryMarkdown =
      this.recommendationService.toMarkdown(recommendation);
    const domainDisplayName = DOMAIN_DISPLAY_NAMES[classification.domain];

    const ai = includeAiBrief
      ? await this.generateAiBrief(problem, domainDisplayName, summaryMarkdown)
      : { status: AiBriefStatus.SKIPPED, brief: null, message: null };

    this.appLoggerService.logDiagnosis({
      domain: classification.domain,
      matchedKeyword: classification.matchedKeyword,
      textLength: problem.length,
      aiStatus: ai.status,
    });

    return {
      domain: classification.domain,
      domainDisplayName,
      matchedKeyword: classification.matchedKeyword,
      recommendation,
      summaryMarkdown,
      ai,
    };
  }

  private async generateAiBrief(
    problem: string,
    domainDisplayName: string,
    ruleBasedSummary: string,
  ): Promise<AiBriefResult> {
    const result = await this.llmService.generateConsultingBrief({
      problem,
      domain: domainDisplayName,
      ruleBasedSummary,
    });

    if (result.ok) {
      return {
        status: AiBriefStatus.GENERATED,
        brief: result.value,
        message: null,
      };
    }

    return {
      status:
        result.error.kind === LlmErrorKind.NOT_CONFIGURED
          ? AiBriefStatus.UNAVAILABLE
          : AiBriefStatus.FAILED,
      brief: null,
      message: result.error.message,
    };
  }

  /**
   * 여러 문제 설명을 일괄 분류하고 통계를 생성합니다
   */
  diagnoseBatch(problems: readonly string[]): BatchDiagnosisResult {
    const startTime = Date.now();
    const classifications = this.domainClassifierService.classifyBatch(problems);
    const stats =
      this.domainClassifierService.generateClassificationStats(classifications);

    this.appLoggerService.logBatchClassification({
      totalProblems: stats.totalCount,
      defaultedCount: stats.defaultedCount,
      processingTimeMs: Date.now() - startTime,
    });

    return {
      results: classifications.map((classification, index) => ({
        index,
        domain: classification.domain,
        matchedKeyword: classification.matchedKeyword,
      })),
      stats,
    };
  }

  /**
   * 진단 결과로 PDF 컨설팅 브리프를 생성합니다
   */
  async generateReport(dto: GenerateReportDto): Promise<GeneratedReport> {
    const domain = this.domainClassifierService.classify(dto.problem);
    const recommendation = this.recommendationService.recommend(
      domain,
      dto.problem,
    );

    this.logger.debug(
      `Generating ${dto.layout ?? 'classic'} report for domain ${domain}`,
    );

    const content = await this.pdfReportService.render(
      {
        domain,
        domainDisplayName: DOMAIN_DISPLAY_NAMES[domain],
        problem: dto.problem,
        ruleBasedSummary: this.recommendationService.toMarkdown(recommendation),
        aiBrief: dto.aiBrief,
        companyName: dto.companyName,
        industry: dto.industry,
        revenue: dto.revenue,
        employees: dto.employees,
      },
      dto.layout,
    );

    return { domain, content };
  }

  /**
   * 분류 가능한 도메인과 키워드를 우선순위 순으로 반환합니다
   */
  listDomains(): DomainInfo[] {
    const ruleDomains: DomainInfo[] = this.domainClassifierService
      .getRules()
      .map((rule) => ({
        domain: rule.domain,
        displayName: DOMAIN_DISPLAY_NAMES[rule.domain],
        priority: rule.priority,
        keywords: rule.keywords,
      }));

    return [
      ...ruleDomains,
      {
        domain: DomainLabel.GENERAL_FINANCE,
        displayName: DOMAIN_DISPLAY_NAMES[DomainLabel.GENERAL_FINANCE],
        priority: null,
        keywords: [],
      },
    ];
  }
}
