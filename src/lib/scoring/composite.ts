import type {
  BonusFactor, CompositeScore, PriorityCategory, ProcessAttributes,
  RiskFactor, StrategicRatings, SubScores,
} from "./types";
import { clamp, roundTo } from "./coerce";
import { clampRating } from "./sub-scores";

export const PRIORITY_THRESHOLDS: { category: PriorityCategory; min: number }[] = [
  { category: "high", min: 6.6 },
  { category: "medium", min: 4.0 },
  { category: "low", min: 1.0 },
];

export interface CompositeInput {
  subScores: SubScores;
  strategic: StrategicRatings;
  riskFactors: RiskFactor[];
  bonusFactors: BonusFactor[];
  quantities: Pick<ProcessAttributes, "monthlyVolume" | "processingMinutes" | "errorRate">;
}

function tieredBonus(value: number, high: number, low: number): number {
  if (value > high) return 1.0;
  if (value > low) return 0.5;
  return 0;
}

export function volumeBonus(quantities: CompositeInput["quantities"]): number {
  return tieredBonus(quantities.monthlyVolume, 500, 200)
    + tieredBonus(quantities.processingMinutes, 60, 30)
    + tieredBonus(quantities.errorRate, 15, 5);
}

/**
 * Weighted gain / feasibility / strategic pillars (each 0-10), their mean, and
 * the adjusted score after bonus and risk factors. Every field is rounded to
 * two decimals only after the whole pipeline has run on unrounded values.
 */
export function calculateComposite(input: CompositeInput): CompositeScore {
  const s = input.subScores;
  const org = clampRating(input.strategic.organizationalImpact);
  const user = clampRating(input.strategic.userImpact);
  const compliance = clampRating(input.strategic.regulatoryCompliance);

  const gain = (s.timeSavings * 0.4 + s.volume * 0.4 + s.qualityImprovement * 0.2) * 2;
  const feasibility = (s.technicalComplexity * 0.3 + s.dataComplexity * 0.4 + s.ruleStability * 0.3) * 2;
  const strategic = (org * 0.3 + user * 0.4 + compliance * 0.3) * 2;
  const total = (gain + feasibility + strategic) / 3;

  const bonus = volumeBonus(input.quantities);
  const riskPenalty = new Set(input.riskFactors).size;
  const factorBonus = new Set(input.bonusFactors).size;
  const adjusted = clamp(total + factorBonus + bonus - riskPenalty, 0, 10);

  return {
    gain: roundTo(gain, 2),
    feasibility: roundTo(feasibility, 2),
    strategic: roundTo(strategic, 2),
    total: roundTo(total, 2),
    adjusted: roundTo(adjusted, 2),
    volumeBonus: roundTo(bonus, 2),
  };
}

export function priorityCategory(adjustedScore: number): PriorityCategory {
  const match = PRIORITY_THRESHOLDS.find((t) => adjustedScore >= t.min);
  return match ? match.category : "not_applicable";
}
