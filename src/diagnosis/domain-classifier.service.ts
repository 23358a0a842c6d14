import { Injectable, Logger } from '@nestjs/common';
import {
  ClassificationDetails,
  ClassificationStats,
  DomainLabel,
  DomainRule,
} from './interfaces/diagnosis.interface';
import { DEFAULT_DOMAIN, DOMAIN_RULES } from './rules/domain-rules';

@Injectable()
export class DomainClassifierService {
  private readonly logger = new Logger(DomainClassifierService.name);
  private readonly rules: readonly DomainRule[] = [...DOMAIN_RULES].sort(
    (a, b) => a.priority - b.priority,
  );

  /**
   * 문제 설명을 도메인으로 분류합니다
   */
  classify(problemText: string): DomainLabel {
    return this.classifyWithDetails(problemText).domain;
  }

  /**
   * 문제 설명을 분류하고 매칭된 키워드와 규칙 우선순위를 함께 반환합니다
   */
  classifyWithDetails(problemText: string): ClassificationDetails {
    const text = (problemText ?? '').toLowerCase();

    for (const rule of this.rules) {
      const matchedKeyword = this.findMatchingKeyword(text, rule);
      if (matchedKeyword !== null) {
        this.logger.debug(
          `Problem classified: ${rule.domain} (Priority: ${rule.priority}, Keyword: ${matchedKeyword})`,
        );
        return {
          domain: rule.domain,
          matchedKeyword,
          priority: rule.priority,
        };
      }
    }

    // 매칭되는 규칙이 없으면 기본 도메인
    return {
      domain: DEFAULT_DOMAIN,
      matchedKeyword: null,
      priority: null,
    };
  }

  /**
   * 규칙의 키워드 중 본문에 포함된 첫 키워드를 찾습니다 (부분 문자열 매칭)
   */
  private findMatchingKeyword(text: string, rule: DomainRule): string | null {
    for (const keyword of rule.keywords) {
      if (text.includes(keyword.toLowerCase())) {
        return keyword;
      }
    }
    return null;
  }

  /**
   * 여러 문제 설명을 일괄 분류합니다
   */
  classifyBatch(problemTexts: readonly string[]): ClassificationDetails[] {
    if (problemTexts.length === 0) {
      return [];
    }

    const startTime = Date.now();
    const results = problemTexts.map((text) => this.classifyWithDetails(text));

    this.logger.log(
      `Batch classification completed: ${results.length} problems in ${Date.now() - startTime}ms`,
    );

    return results;
  }

  /**
   * 분류 통계를 생성합니다
   */
  generateClassificationStats(
    results: readonly ClassificationDetails[],
  ): ClassificationStats {
    const domainStats: Record<DomainLabel, number> = {
      [DomainLabel.INTERCOMPANY]: 0,
      [DomainLabel.CONSOLIDATION]: 0,
      [DomainLabel.P2P]: 0,
      [DomainLabel.O2C]: 0,
      [DomainLabel.R2R]: 0,
      [DomainLabel.GENERAL_FINANCE]: 0,
    };

    for (const result of results) {
      domainStats[result.domain] += 1;
    }

    return {
      totalCount: results.length,
      defaultedCount: results.filter((r) => r.matchedKeyword === null).length,
      domainStats,
    };
  }

  /**
   * 분류 규칙 목록을 우선순위 순으로 반환합니다
   */
  getRules(): readonly DomainRule[] {
    return this.rules;
  }
}
