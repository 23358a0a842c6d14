import { Injectable } from '@nestjs/common';
import {
  DomainLabel,
  RecommendationBlock,
} from './interfaces/diagnosis.interface';
import {
  ACTIONS_SECTION,
  RECOMMENDATION_CATALOG,
  ROOT_CAUSE_SECTION,
} from './rules/recommendation-catalog';
import { DEFAULT_DOMAIN } from './rules/domain-rules';

@Injectable()
export class RecommendationService {
  /**
   * 도메인에 해당하는 권고안을 반환합니다.
   * 문제 설명은 향후 확장을 위해 받지만 결과 선택에는 사용하지 않습니다.
   * @param domain 분류된 도메인
   * @param _problemText 원본 문제 설명
   * @returns 근본 원인과 권고 조치
   */
  recommend(domain: DomainLabel, _problemText = ''): RecommendationBlock {
    if (this.isKnownDomain(domain)) {
      return RECOMMENDATION_CATALOG[domain];
    }
    // 알 수 없는 도메인은 기본 권고안으로 대체
    return RECOMMENDATION_CATALOG[DEFAULT_DOMAIN];
  }

  /**
   * 권고안을 마크다운 텍스트로 직렬화합니다 (프롬프트 컨텍스트, PDF 본문에 사용)
   */
  toMarkdown(block: RecommendationBlock): string {
    const rootCauses = block.rootCauses.map((cause) => `- ${cause}`);
    const actions = block.actions.map(
      (action, index) => `${index + 1}. ${action}`,
    );

    return [
      `**${block.title}**`,
      '',
      `**${ROOT_CAUSE_SECTION}**`,
      ...rootCauses,
      '',
      `**${ACTIONS_SECTION}**`,
      ...actions,
    ].join('\n');
  }

  private isKnownDomain(domain: string): domain is DomainLabel {
    return Object.prototype.hasOwnProperty.call(RECOMMENDATION_CATALOG, domain);
  }
}
