import { Injectable, Logger } from '@nestjs/common';

export interface DiagnosisLogData {
  domain: string;
  matchedKeyword: string | null;
  textLength: number;
  aiStatus: string;
}

export interface BatchClassificationLogData {
  totalProblems: number;
  defaultedCount: number;
  processingTimeMs: number;
}

export interface AiRequestLogData {
  operation: AiOperation;
  model: string;
  status: 'SUCCESS' | 'NOT_CONFIGURED' | 'FAILED';
  durationMs: number;
  errorMessage?: string;
}

export const enum AiOperation {
  CONSULTING_BRIEF = 'CONSULTING_BRIEF',
  RESEARCH_ANSWER = 'RESEARCH_ANSWER',
}

export interface ReportLogData {
  domain: string;
  layout: string;
  sizeBytes: number;
  durationMs: number;
}

@Injectable()
export class AppLoggerService extends Logger {
  constructor() {
    super('AppLogger');
  }

  /**
   * 문제 진단 결과 로그 기록
   */
  logDiagnosis(data: DiagnosisLogData): void {
    this.log(
      `Diagnosis - Domain: ${data.domain}, Keyword: ${data.matchedKeyword ?? 'none'}, Text Length: ${data.textLength}, AI: ${data.aiStatus}`,
    );
  }

  /**
   * 일괄 분류 결과 로그 기록
   */
  logBatchClassification(data: BatchClassificationLogData): void {
    const logMessage = `Batch Classification - Total: ${data.totalProblems}, Defaulted: ${data.defaultedCount}, Processing Time: ${data.processingTimeMs}ms`;

    this.log(logMessage);

    // 기본 도메인으로 떨어진 비율이 높은 경우 경고 로그
    const defaultRate =
      data.totalProblems > 0
        ? (data.defaultedCount / data.totalProblems) * 100
        : 0;
    if (defaultRate > 50) {
      this.warn(`High default classification rate: ${defaultRate.toFixed(2)}%`);
    }
  }

  /**
   * LLM 호출 로그 기록
   */
  logAiRequest(data: AiRequestLogData): void {
    const logMessage = `AI Request - Operation: ${data.operation}, Model: ${data.model}, Status: ${data.status}, Duration: ${data.durationMs}ms`;

    switch (data.status) {
      case 'SUCCESS':
        this.log(logMessage);
        break;
      case 'NOT_CONFIGURED':
        this.warn(logMessage);
        break;
      case 'FAILED':
        this.error(
          `${logMessage}, Error: ${data.errorMessage || 'Unknown error'}`,
        );
        break;
    }
  }

  /**
   * PDF 리포트 생성 로그 기록
   */
  logReportGenerated(data: ReportLogData): void {
    this.log(
      `Report Generated - Domain: ${data.domain}, Layout: ${data.layout}, Size: ${data.sizeBytes} bytes, Duration: ${data.durationMs}ms`,
    );
  }
}
