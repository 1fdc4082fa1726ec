import type {
  ChangeImpact, CriticalityTier, ExpectedResistance, IntegrationDifficulty,
  ProcessChange, SeasonalPattern, TrainingNeed,
} from "./types";

// ---------------------------------------------------------------------------
// Quality-improvement bonuses (organizational readiness)
// ---------------------------------------------------------------------------

export const TRAINING_NEED_BONUS: Record<TrainingNeed, number> = {
  minimal: 0,
  brief: 1,
  structured: 1,
  extensive: 0,
};

export const PROCESS_CHANGE_BONUS: Record<ProcessChange, number> = {
  minor: 1,
  moderate: 0,
  major: 0,
};

export const RESISTANCE_BONUS: Record<ExpectedResistance, number> = {
  low: 1,
  moderate: 0,
  high: 0,
};

// ---------------------------------------------------------------------------
// Technical complexity: first matching rule wins
// ---------------------------------------------------------------------------

export interface KeywordRule {
  keywords: string[];
  score: number;
}

export const FILE_FORMAT_RULES: KeywordRule[] = [
  { keywords: ["api"], score: 5 },
  { keywords: ["xml", "json"], score: 4 },
  { keywords: ["pdf", "word", "docx"], score: 3 },
  { keywords: ["excel", "xlsx", "csv"], score: 4 },
];

export const UNMATCHED_FORMAT_SCORE = 2;
export const EMPTY_FORMAT_SCORE = 3;

// ---------------------------------------------------------------------------
// Advisory lookups
// ---------------------------------------------------------------------------

export const INTEGRATION_DIFFICULTY_SCORES: Record<IntegrationDifficulty, number> = {
  very_easy: 1,
  easy: 2,
  moderate: 3,
  complex: 4,
  legacy: 5,
};
export const DEFAULT_INTEGRATION_SCORE = 3;

export const CHANGE_IMPACT_SCORES: Record<ChangeImpact, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};
export const DEFAULT_CHANGE_IMPACT_SCORE = 2;

export const CRITICALITY_SCORES: Record<CriticalityTier, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};
export const DEFAULT_CRITICALITY_SCORE = 2;

/** Peak months (1-12) per pattern and the boost applied inside the peak. */
export const SEASONAL_PEAKS: Record<SeasonalPattern, { months: number[]; boost: number }> = {
  none: { months: [], boost: 0 },
  year_end: { months: [11, 12, 1], boost: 2 },
  quarter_end: { months: [3, 6, 9, 12], boost: 1 },
  summer: { months: [6, 7, 8], boost: 1 },
  holiday: { months: [12], boost: 2 },
};

// ---------------------------------------------------------------------------
// Technology recommendations
// ---------------------------------------------------------------------------

export const HIGH_VOLUME_THRESHOLD = 100;

export const RECOMMENDATIONS = {
  cloudScale: "Cloud-hosted RPA with unattended bots and an orchestrator queue",
  desktop: "Attended desktop automation on the user's workstation",
  api: "Direct API integration instead of UI automation",
  pdf: "Intelligent document processing (OCR) for PDF intake",
  excel: "Spreadsheet automation with native Excel activities",
  web: "Browser automation for web-based steps",
  legacy: "Screen scraping or terminal emulation for legacy systems",
  complex: "Cloud platform combined with API-first integration",
} as const;

export const FORMAT_RECOMMENDATION_KEYWORDS: { keyword: string; recommendation: string }[] = [
  { keyword: "api", recommendation: RECOMMENDATIONS.api },
  { keyword: "pdf", recommendation: RECOMMENDATIONS.pdf },
  { keyword: "excel", recommendation: RECOMMENDATIONS.excel },
  { keyword: "web", recommendation: RECOMMENDATIONS.web },
];

export const MAX_RECOMMENDATIONS = 3;
