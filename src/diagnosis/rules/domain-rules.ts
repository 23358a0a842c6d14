import { DomainLabel, DomainRule } from '../interfaces/diagnosis.interface';

/**
 * 도메인 분류 규칙 (priority 오름차순으로 평가, 첫 매칭 규칙이 선택됨)
 *
 * 우선순위는 현재 운영 중인 분류 결과와의 호환을 위해 유지합니다.
 * 예: "intercompany p2p" 는 항상 Intercompany 로 분류됩니다.
 */
export const DOMAIN_RULES: readonly DomainRule[] = [
  { priority: 1, domain: DomainLabel.INTERCOMPANY, keywords: ['intercompany'] },
  {
    priority: 2,
    domain: DomainLabel.CONSOLIDATION,
    keywords: ['consolidation'],
  },
  { priority: 3, domain: DomainLabel.P2P, keywords: ['p2p', 'procure'] },
  { priority: 4, domain: DomainLabel.O2C, keywords: ['o2c', 'order'] },
  {
    priority: 5,
    domain: DomainLabel.R2R,
    keywords: ['r2r', 'record', 'close'],
  },
];

export const DEFAULT_DOMAIN = DomainLabel.GENERAL_FINANCE;
