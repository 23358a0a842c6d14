import {
  DomainLabel,
  RecommendationBlock,
} from '../interfaces/diagnosis.interface';

export const ROOT_CAUSE_SECTION = 'Root Cause Diagnosis';
export const ACTIONS_SECTION = 'Recommended Actions';

// 반환된 권고안을 수정해도 카탈로그가 바뀌지 않도록 동결
function freezeBlock(block: RecommendationBlock): RecommendationBlock {
  return Object.freeze({
    ...block,
    rootCauses: Object.freeze([...block.rootCauses]),
    actions: Object.freeze([...block.actions]),
  });
}

export const RECOMMENDATION_CATALOG: Readonly<
  Record<DomainLabel, RecommendationBlock>
> = Object.freeze({
  [DomainLabel.INTERCOMPANY]: freezeBlock({
    domain: DomainLabel.INTERCOMPANY,
    title: 'Intercompany Root Cause Diagnosis',
    rootCauses: [
      'Mismatched transaction timing',
      'Lack of automated matching rules',
      'Missing entity-level reconciliation governance',
    ],
    actions: [
      'Implement automated IC reconciliation in SAP / Oracle.',
      'Create standardized IC templates & entity-level deadlines.',
      'Introduce rule-based matching (amount, currency, tolerance).',
    ],
  }),
  [DomainLabel.CONSOLIDATION]: freezeBlock({
    domain: DomainLabel.CONSOLIDATION,
    title: 'Consolidation Root Cause Diagnosis',
    rootCauses: [
      'Late submissions from entities',
      'Manual consolidation adjustments',
      'Lack of validations before group close',
    ],
    actions: [
      'Introduce pre-close validation checks.',
      'Automate consolidation journals in BlackLine / OneStream.',
      'Enforce entity-level submission SLAs.',
    ],
  }),
  [DomainLabel.P2P]: freezeBlock({
    domain: DomainLabel.P2P,
    title: 'P2P Diagnosis',
    rootCauses: [
      'Invoice exceptions causing delays',
      'Vendor master inconsistencies',
      'Manual PO approvals',
    ],
    actions: [
      'Implement 3-way match automation.',
      'Establish vendor master governance.',
      'Digitize PO approval workflow.',
    ],
  }),
  [DomainLabel.O2C]: freezeBlock({
    domain: DomainLabel.O2C,
    title: 'O2C Diagnosis',
    rootCauses: [
      'Delayed billing',
      'Manual cash application',
      'Credit management inefficiencies',
    ],
    actions: [
      'Automate billing triggers.',
      'Deploy cash application tools (HighRadius).',
      'Implement credit scoring & DSO dashboards.',
    ],
  }),
  [DomainLabel.R2R]: freezeBlock({
    domain: DomainLabel.R2R,
    title: 'R2R Diagnosis',
    rootCauses: [
      'Manual journal entries',
      'Delayed reconciliations',
      'Lack of standardized close checklist',
    ],
    actions: [
      'Automate recurring journals in ERP.',
      'Implement BlackLine reconciliations.',
      'Deploy a global month-end close calendar.',
    ],
  }),
  // 기본 도메인: 범용 4단계 전환 체크리스트
  [DomainLabel.GENERAL_FINANCE]: freezeBlock({
    domain: DomainLabel.GENERAL_FINANCE,
    title: 'General Transformation Recommendations',
    rootCauses: [
      'Fragmented processes across entities',
      'Limited automation of routine finance tasks',
      'Unclear ownership of controls & data',
    ],
    actions: [
      'Assess AS-IS → TO-BE processes.',
      'Define automation roadmap.',
      'Standardize controls & governance.',
      'Align Process + Tech + Data + People.',
    ],
  }),
});
