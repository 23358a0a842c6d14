export enum DomainLabel {
  INTERCOMPANY = 'Intercompany',
  CONSOLIDATION = 'Consolidation',
  P2P = 'P2P',
  O2C = 'O2C',
  R2R = 'R2R',
  GENERAL_FINANCE = 'GeneralFinance',
}

export const DOMAIN_DISPLAY_NAMES: Record<DomainLabel, string> = {
  [DomainLabel.INTERCOMPANY]: 'Intercompany',
  [DomainLabel.CONSOLIDATION]: 'Consolidation',
  [DomainLabel.P2P]: 'Procure-to-Pay (P2P)',
  [DomainLabel.O2C]: 'Order-to-Cash (O2C)',
  [DomainLabel.R2R]: 'Record-to-Report (R2R)',
  [DomainLabel.GENERAL_FINANCE]: 'General Finance',
};

export interface DomainRule {
  priority: number;
  domain: DomainLabel;
  keywords: readonly string[];
}

export interface ClassificationDetails {
  domain: DomainLabel;
  matchedKeyword: string | null;
  priority: number | null;
}

export interface ClassificationStats {
  totalCount: number;
  defaultedCount: number;
  domainStats: Record<DomainLabel, number>;
}

export interface RecommendationBlock {
  readonly domain: DomainLabel;
  readonly title: string;
  readonly rootCauses: readonly string[];
  readonly actions: readonly string[];
}
