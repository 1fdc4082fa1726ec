import type { ApiAccess, ProcessAttributes, SubScores } from "./types";
import { clamp, roundHalfAwayFromZero, splitList, toInteger } from "./coerce";
import {
  EMPTY_FORMAT_SCORE, FILE_FORMAT_RULES, PROCESS_CHANGE_BONUS,
  RESISTANCE_BONUS, TRAINING_NEED_BONUS, UNMATCHED_FORMAT_SCORE,
} from "./rule-tables";

const MAX_SCORE = 5;

export function timeSavingsScore(minutes: number): number {
  if (minutes >= 120) return 5;
  if (minutes >= 60) return 4;
  if (minutes >= 30) return 3;
  if (minutes >= 10) return 2;
  return 1;
}

export function volumeScore(monthlyVolume: number): number {
  if (monthlyVolume >= 1000) return 5;
  if (monthlyVolume >= 500) return 4;
  if (monthlyVolume >= 200) return 3;
  if (monthlyVolume >= 50) return 2;
  return 1;
}

function qualityBaseTier(minutes: number, monthlyVolume: number): number {
  if (minutes >= 60 && monthlyVolume >= 100) return 5;
  if ((minutes >= 30 && monthlyVolume >= 50) || minutes >= 90) return 4;
  if (minutes >= 15 || monthlyVolume >= 20) return 3;
  if (minutes >= 5 || monthlyVolume >= 10) return 2;
  return 1;
}

export function qualityImprovementScore(
  attributes: Pick<ProcessAttributes, "processingMinutes" | "monthlyVolume" | "trainingNeed" | "processChange" | "expectedResistance">,
): number {
  const base = qualityBaseTier(attributes.processingMinutes, attributes.monthlyVolume);
  const bonus = TRAINING_NEED_BONUS[attributes.trainingNeed]
    + PROCESS_CHANGE_BONUS[attributes.processChange]
    + RESISTANCE_BONUS[attributes.expectedResistance];
  return Math.min(MAX_SCORE, base + bonus);
}

export function technicalComplexityScore(fileFormats: string): number {
  const f = fileFormats.trim().toLowerCase();
  if (!f) return EMPTY_FORMAT_SCORE;
  const rule = FILE_FORMAT_RULES.find((r) => r.keywords.some((k) => f.includes(k)));
  return rule ? rule.score : UNMATCHED_FORMAT_SCORE;
}

export function dataComplexityScore(dataSources: string, fileFormats: string, apiAccess: ApiAccess): number {
  const sources = splitList(dataSources).length;
  const formats = splitList(fileFormats).length;

  let score = 1;
  if (sources > 1) score += (sources - 1) * 1.0;
  if (formats > 1) score += (formats - 1) * 0.5;
  if (apiAccess === "Yes") score += 1.0;

  return Math.min(MAX_SCORE, roundHalfAwayFromZero(score));
}

export function ruleStabilityScore(minutes: number, monthlyVolume: number): number {
  if (minutes >= 60 && monthlyVolume >= 100) return 5;
  if (minutes >= 30 && monthlyVolume >= 50) return 4;
  if (minutes >= 15 || monthlyVolume >= 20) return 3;
  return 2;
}

export function calculateSubScores(attributes: ProcessAttributes): SubScores {
  const { processingMinutes: minutes, monthlyVolume } = attributes;
  return {
    timeSavings: timeSavingsScore(minutes),
    volume: volumeScore(monthlyVolume),
    qualityImprovement: qualityImprovementScore(attributes),
    technicalComplexity: technicalComplexityScore(attributes.fileFormats),
    dataComplexity: dataComplexityScore(attributes.dataSources, attributes.fileFormats, attributes.apiAccess),
    ruleStability: ruleStabilityScore(minutes, monthlyVolume),
  };
}

/** Force an arbitrary rating into the 1-5 band. */
export function clampRating(value: unknown): number {
  return clamp(toInteger(value), 1, MAX_SCORE);
}
