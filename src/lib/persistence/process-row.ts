import { z } from "zod";
import type { ProcessEvaluation } from "../scoring/types";
import { splitList, toInteger } from "../scoring/coerce";
import {
  API_ACCESS, BONUS_FACTORS, CHANGE_IMPACTS, CRITICALITY_TIERS, FREQUENCIES,
  INTEGRATION_DIFFICULTIES, PRIORITY_CATEGORIES, PROCESS_CHANGES, RESISTANCE_LEVELS,
  RISK_FACTORS, SEASONAL_PATTERNS, TRAINING_NEEDS, processInputSchema,
  type ProcessInput,
} from "../schemas";

export const FACTOR_SEPARATOR = ", ";
export const RECOMMENDATION_SEPARATOR = "; ";

/** Row shape written to the `processes` table. `id` is assigned by the store. */
export interface ProcessRowWrite {
  name: string;
  owner: string;
  department: string;
  description: string;
  trigger: string;
  frequency: string;
  monthly_volume: number;
  processing_minutes: number;
  people_involved: number;
  error_rate: number;
  hourly_cost: number;
  it_systems: string;
  data_sources: string;
  file_formats: string;
  api_access: string;
  training_need: string;
  process_change: string;
  expected_resistance: string;
  time_savings_score: number;
  volume_score: number;
  quality_score: number;
  technical_score: number;
  data_score: number;
  rule_stability_score: number;
  organizational_impact: number;
  user_impact: number;
  regulatory_compliance: number;
  gain_score: number;
  feasibility_score: number;
  strategic_score: number;
  total_score: number;
  adjusted_score: number;
  volume_bonus: number;
  priority: string;
  risk_factors: string;
  bonus_factors: string;
  implementation_cost: number;
  annual_maintenance_cost: number;
  annual_license_cost: number;
  implementation_months: number;
  expected_lifetime_years: number;
  annual_volume: number;
  annual_hours_saved: number;
  gross_annual_savings: number;
  realistic_annual_savings: number;
  roi_percent: number;
  payback_months: number;
  break_even_months: number;
  net_present_value: number;
  total_lifetime_savings: number;
  total_lifetime_cost: number;
  technology_recommendation: string;
  automation_complexity: number;
  seasonal_boost: number;
  criticality_score: number;
  integration_difficulty: string | null;
  change_impact: string | null;
  seasonal_pattern: string | null;
  criticality: string | null;
  evaluated_at: string;
}

/**
 * Flatten an input and its evaluation into a storage row. Every numeric column
 * is rounded half away from zero here and nowhere earlier; an unparseable
 * value becomes 0.
 */
export function toProcessRow(input: ProcessInput, evaluation: ProcessEvaluation): ProcessRowWrite {
  const { subScores: s, strategic, composite: c, financials: f, advisory: a } = evaluation;
  return {
    name: input.name,
    owner: input.owner,
    department: input.department,
    description: input.description,
    trigger: input.trigger,
    frequency: input.frequency,
    monthly_volume: toInteger(input.monthlyVolume),
    processing_minutes: toInteger(input.processingMinutes),
    people_involved: toInteger(input.peopleInvolved),
    error_rate: toInteger(input.errorRate),
    hourly_cost: toInteger(input.hourlyCost),
    it_systems: input.itSystems,
    data_sources: input.dataSources,
    file_formats: input.fileFormats,
    api_access: input.apiAccess,
    training_need: input.trainingNeed,
    process_change: input.processChange,
    expected_resistance: input.expectedResistance,
    time_savings_score: toInteger(s.timeSavings),
    volume_score: toInteger(s.volume),
    quality_score: toInteger(s.qualityImprovement),
    technical_score: toInteger(s.technicalComplexity),
    data_score: toInteger(s.dataComplexity),
    rule_stability_score: toInteger(s.ruleStability),
    organizational_impact: toInteger(strategic.organizationalImpact),
    user_impact: toInteger(strategic.userImpact),
    regulatory_compliance: toInteger(strategic.regulatoryCompliance),
    gain_score: toInteger(c.gain),
    feasibility_score: toInteger(c.feasibility),
    strategic_score: toInteger(c.strategic),
    total_score: toInteger(c.total),
    adjusted_score: toInteger(c.adjusted),
    volume_bonus: toInteger(c.volumeBonus),
    priority: evaluation.priority,
    risk_factors: input.riskFactors.join(FACTOR_SEPARATOR),
    bonus_factors: input.bonusFactors.join(FACTOR_SEPARATOR),
    implementation_cost: toInteger(input.implementationCost),
    annual_maintenance_cost: toInteger(input.annualMaintenanceCost),
    annual_license_cost: toInteger(input.annualLicenseCost),
    implementation_months: toInteger(input.implementationMonths),
    expected_lifetime_years: toInteger(input.expectedLifetimeYears),
    annual_volume: toInteger(f.annualVolume),
    annual_hours_saved: toInteger(f.annualHoursSaved),
    gross_annual_savings: toInteger(f.grossAnnualSavings),
    realistic_annual_savings: toInteger(f.realisticAnnualSavings),
    roi_percent: toInteger(f.roiPercent),
    payback_months: toInteger(f.paybackMonths),
    break_even_months: toInteger(f.breakEvenMonths),
    net_present_value: toInteger(f.netPresentValue),
    total_lifetime_savings: toInteger(f.totalLifetimeSavings),
    total_lifetime_cost: toInteger(f.totalLifetimeCost),
    technology_recommendation: a.recommendations.join(RECOMMENDATION_SEPARATOR),
    automation_complexity: toInteger(a.automationComplexity),
    seasonal_boost: toInteger(a.seasonalBoost),
    criticality_score: toInteger(a.criticalityScore),
    integration_difficulty: input.integrationDifficulty ?? null,
    change_impact: input.changeImpact ?? null,
    seasonal_pattern: input.seasonalPattern ?? null,
    criticality: input.criticality ?? null,
    evaluated_at: evaluation.evaluatedAt,
  };
}

// ---------------------------------------------------------------------------
// Reading rows back
// ---------------------------------------------------------------------------

const intColumn = z.preprocess((v) => toInteger(v), z.number().int());
const textColumn = z.string().nullish().transform((v) => v ?? "");

/** Keep only known factor ids; free text left over from older rows is dropped. */
const factorColumn = <T extends string>(known: readonly T[]) =>
  z.string().nullish().transform((v) =>
    splitList(v).filter((item): item is T => known.some((k) => k === item)),
  );

export const processRowSchema = z.object({
  id: z.coerce.number().int(),
  name: textColumn,
  owner: textColumn,
  department: textColumn,
  description: textColumn,
  trigger: textColumn,
  frequency: z.enum(FREQUENCIES).catch("daily"),
  monthly_volume: intColumn,
  processing_minutes: intColumn,
  people_involved: intColumn,
  error_rate: intColumn,
  hourly_cost: intColumn,
  it_systems: textColumn,
  data_sources: textColumn,
  file_formats: textColumn,
  api_access: z.enum(API_ACCESS).catch("Unknown"),
  training_need: z.enum(TRAINING_NEEDS).catch("minimal"),
  process_change: z.enum(PROCESS_CHANGES).catch("moderate"),
  expected_resistance: z.enum(RESISTANCE_LEVELS).catch("moderate"),
  time_savings_score: intColumn,
  volume_score: intColumn,
  quality_score: intColumn,
  technical_score: intColumn,
  data_score: intColumn,
  rule_stability_score: intColumn,
  organizational_impact: intColumn,
  user_impact: intColumn,
  regulatory_compliance: intColumn,
  gain_score: intColumn,
  feasibility_score: intColumn,
  strategic_score: intColumn,
  total_score: intColumn,
  adjusted_score: intColumn,
  volume_bonus: intColumn,
  priority: z.enum(PRIORITY_CATEGORIES).catch("not_applicable"),
  risk_factors: factorColumn(RISK_FACTORS),
  bonus_factors: factorColumn(BONUS_FACTORS),
  implementation_cost: intColumn,
  annual_maintenance_cost: intColumn,
  annual_license_cost: intColumn,
  implementation_months: intColumn,
  expected_lifetime_years: intColumn,
  annual_volume: intColumn,
  annual_hours_saved: intColumn,
  gross_annual_savings: intColumn,
  realistic_annual_savings: intColumn,
  roi_percent: intColumn,
  payback_months: intColumn,
  break_even_months: intColumn,
  net_present_value: intColumn,
  total_lifetime_savings: intColumn,
  total_lifetime_cost: intColumn,
  technology_recommendation: textColumn,
  automation_complexity: intColumn,
  seasonal_boost: intColumn,
  criticality_score: intColumn,
  integration_difficulty: z.enum(INTEGRATION_DIFFICULTIES).optional().catch(undefined),
  change_impact: z.enum(CHANGE_IMPACTS).optional().catch(undefined),
  seasonal_pattern: z.enum(SEASONAL_PATTERNS).optional().catch(undefined),
  criticality: z.enum(CRITICALITY_TIERS).optional().catch(undefined),
  evaluated_at: z.string().nullish(),
  registered_at: z.string().nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
});

export type ProcessRecord = z.infer<typeof processRowSchema>;

/** Rebuild the form values of a stored record, e.g. to edit it. */
export function toProcessInput(record: ProcessRecord): ProcessInput {
  return processInputSchema.parse({
    name: record.name,
    owner: record.owner,
    department: record.department,
    description: record.description,
    trigger: record.trigger,
    frequency: record.frequency,
    monthlyVolume: Math.max(0, record.monthly_volume),
    processingMinutes: Math.max(0, record.processing_minutes),
    peopleInvolved: Math.max(1, record.people_involved),
    errorRate: Math.min(100, Math.max(0, record.error_rate)),
    hourlyCost: Math.max(0, record.hourly_cost),
    itSystems: record.it_systems,
    dataSources: record.data_sources,
    fileFormats: record.file_formats,
    apiAccess: record.api_access,
    trainingNeed: record.training_need,
    processChange: record.process_change,
    expectedResistance: record.expected_resistance,
    organizationalImpact: clampStored(record.organizational_impact),
    userImpact: clampStored(record.user_impact),
    regulatoryCompliance: clampStored(record.regulatory_compliance),
    riskFactors: record.risk_factors,
    bonusFactors: record.bonus_factors,
    implementationCost: Math.max(0, record.implementation_cost),
    annualMaintenanceCost: Math.max(0, record.annual_maintenance_cost),
    annualLicenseCost: Math.max(0, record.annual_license_cost),
    implementationMonths: Math.max(0, record.implementation_months),
    expectedLifetimeYears: Math.min(30, Math.max(1, record.expected_lifetime_years)),
    integrationDifficulty: record.integration_difficulty,
    changeImpact: record.change_impact,
    seasonalPattern: record.seasonal_pattern,
    criticality: record.criticality,
  });
}

function clampStored(rating: number): number {
  return Math.min(5, Math.max(1, rating));
}
