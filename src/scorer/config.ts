export interface ScoreWeights {
  domainKeyword: number;
  skill: number;
  experience: number;
  qualification: number;
  salaryBonus: number;
  seniorityBonus: number;
}

export interface ScoringConfig {
  weights: ScoreWeights;
  /** Matched case-insensitively against title + description */
  domainKeywords: string[];
  seniorityBonus: {
    enabled: boolean;
    /** Matched case-insensitively against the title only */
    titleKeywords: string[];
  };
  maxScore: number;
  /** Listings must score strictly above this to be returned */
  minScore: number;
  defaultLimit: number;
}

export const DEFAULT_WEIGHTS: ScoreWeights = {
  domainKeyword: 10,
  skill: 15,
  experience: 12,
  qualification: 8,
  salaryBonus: 20,
  seniorityBonus: 10,
};

export const FINTECH_KEYWORDS = [
  'fintech', 'financial technology', 'banking', 'payments', 'cryptocurrency',
  'blockchain', 'trading', 'investment', 'wealth management', 'insurtech',
  'regtech', 'digital banking', 'mobile payments', 'peer-to-peer',
  'robo-advisor', 'algorithmic trading', 'risk management', 'financial services',
  'payment processing', 'open banking', 'neobank', 'digital wallet',
];

export const BASIC_KEYWORDS = ['fintech', 'banking', 'payments', 'finance', 'trading'];

export const SENIORITY_TITLE_KEYWORDS = ['senior', 'lead', 'principal'];

export const MIN_MATCH_SCORE = 20;
export const DEFAULT_RESULT_LIMIT = 20;

export const FINTECH_SCORING: ScoringConfig = {
  weights: DEFAULT_WEIGHTS,
  domainKeywords: FINTECH_KEYWORDS,
  seniorityBonus: { enabled: true, titleKeywords: SENIORITY_TITLE_KEYWORDS },
  maxScore: 100,
  minScore: MIN_MATCH_SCORE,
  defaultLimit: DEFAULT_RESULT_LIMIT,
};

export const BASIC_SCORING: ScoringConfig = {
  ...FINTECH_SCORING,
  domainKeywords: BASIC_KEYWORDS,
  seniorityBonus: { enabled: false, titleKeywords: SENIORITY_TITLE_KEYWORDS },
};

export type ScoringPreset = 'fintech' | 'basic';

const PRESETS: Record<ScoringPreset, ScoringConfig> = {
  fintech: FINTECH_SCORING,
  basic: BASIC_SCORING,
};

export interface ScoringOverrides {
  weights?: Partial<ScoreWeights>;
  domainKeywords?: string[];
  seniorityBonus?: Partial<ScoringConfig['seniorityBonus']>;
  minScore?: number;
  defaultLimit?: number;
}

export function resolveScoringConfig(preset: ScoringPreset = 'fintech', overrides: ScoringOverrides = {}): ScoringConfig {
  const base = PRESETS[preset];
  return {
    ...base,
    weights: { ...base.weights, ...overrides.weights },
    domainKeywords: overrides.domainKeywords ?? base.domainKeywords,
    seniorityBonus: { ...base.seniorityBonus, ...overrides.seniorityBonus },
    minScore: overrides.minScore ?? base.minScore,
    defaultLimit: overrides.defaultLimit ?? base.defaultLimit,
  };
}
