import type {
  AdvisoryContext, AdvisoryResult, ChangeImpact, CriticalityTier,
  IntegrationDifficulty, SeasonalPattern,
} from "./types";
import { roundHalfAwayFromZero } from "./coerce";
import {
  CHANGE_IMPACT_SCORES, CRITICALITY_SCORES, DEFAULT_CHANGE_IMPACT_SCORE,
  DEFAULT_CRITICALITY_SCORE, DEFAULT_INTEGRATION_SCORE, FORMAT_RECOMMENDATION_KEYWORDS,
  HIGH_VOLUME_THRESHOLD, INTEGRATION_DIFFICULTY_SCORES, MAX_RECOMMENDATIONS,
  RECOMMENDATIONS, SEASONAL_PEAKS,
} from "./rule-tables";

export function recommendTechnology(
  monthlyVolume: number, fileFormats: string, integrationDifficulty?: IntegrationDifficulty,
): string[] {
  const recommendations: string[] = [
    monthlyVolume >= HIGH_VOLUME_THRESHOLD ? RECOMMENDATIONS.cloudScale : RECOMMENDATIONS.desktop,
  ];

  const formats = fileFormats.toLowerCase();
  for (const { keyword, recommendation } of FORMAT_RECOMMENDATION_KEYWORDS) {
    if (formats.includes(keyword)) recommendations.push(recommendation);
  }

  if (integrationDifficulty === "legacy") recommendations.push(RECOMMENDATIONS.legacy);
  else if (integrationDifficulty === "complex") recommendations.push(RECOMMENDATIONS.complex);

  return recommendations.slice(0, MAX_RECOMMENDATIONS);
}

export function automationComplexityScore(
  technicalComplexity: number, integrationDifficulty?: IntegrationDifficulty, changeImpact?: ChangeImpact,
): number {
  const integration = integrationDifficulty
    ? INTEGRATION_DIFFICULTY_SCORES[integrationDifficulty]
    : DEFAULT_INTEGRATION_SCORE;
  const change = changeImpact ? CHANGE_IMPACT_SCORES[changeImpact] : DEFAULT_CHANGE_IMPACT_SCORE;
  return Math.min(5, roundHalfAwayFromZero((technicalComplexity + integration + change) / 3));
}

/**
 * Boost for processes whose workload peaks around the evaluation date. The
 * month is read in UTC so the result does not depend on the host time zone.
 */
export function seasonalBoost(pattern: SeasonalPattern | undefined, evaluatedAt: Date): number {
  if (!pattern) return 0;
  const month = evaluatedAt.getUTCMonth() + 1;
  const peak = SEASONAL_PEAKS[pattern];
  return peak.months.includes(month) ? peak.boost : 0;
}

export function criticalityScore(tier?: CriticalityTier): number {
  return tier ? CRITICALITY_SCORES[tier] : DEFAULT_CRITICALITY_SCORE;
}

export function calculateAdvisory(
  context: AdvisoryContext,
  inputs: { monthlyVolume: number; fileFormats: string; technicalComplexity: number },
  evaluatedAt: Date,
): AdvisoryResult {
  return {
    recommendations: recommendTechnology(inputs.monthlyVolume, inputs.fileFormats, context.integrationDifficulty),
    automationComplexity: automationComplexityScore(
      inputs.technicalComplexity, context.integrationDifficulty, context.changeImpact,
    ),
    seasonalBoost: seasonalBoost(context.seasonalPattern, evaluatedAt),
    criticalityScore: criticalityScore(context.criticality),
  };
}
