// === Enums as union types ===
export type Frequency = "daily" | "weekly" | "monthly" | "on_demand" | "seasonal";
export type ApiAccess = "Yes" | "No" | "Unknown";
export type TrainingNeed = "minimal" | "brief" | "structured" | "extensive";
export type ProcessChange = "minor" | "moderate" | "major";
export type ExpectedResistance = "low" | "moderate" | "high";

export type RiskFactor = "high_resistance" | "critical_dependencies" | "complex_approvals" | "elevated_access";
export type BonusFactor = "pilot_value" | "synergies" | "existing_integrations";

export type PriorityCategory = "high" | "medium" | "low" | "not_applicable";

export type IntegrationDifficulty = "very_easy" | "easy" | "moderate" | "complex" | "legacy";
export type ChangeImpact = "low" | "medium" | "high" | "critical";
export type SeasonalPattern = "none" | "year_end" | "quarter_end" | "summer" | "holiday";
export type CriticalityTier = "low" | "medium" | "high" | "critical";

// === Inputs ===
export interface ProcessAttributes {
  name: string;
  owner: string;
  department: string;
  description: string;
  trigger: string;
  frequency: Frequency;
  monthlyVolume: number;
  processingMinutes: number;
  peopleInvolved: number;
  errorRate: number;
  hourlyCost: number;
  itSystems: string;
  dataSources: string;
  fileFormats: string;
  apiAccess: ApiAccess;
  trainingNeed: TrainingNeed;
  processChange: ProcessChange;
  expectedResistance: ExpectedResistance;
}

/** Manually set 1-5 sliders. */
export interface StrategicRatings {
  organizationalImpact: number;
  userImpact: number;
  regulatoryCompliance: number;
}

export interface FinancialPlan {
  implementationCost: number;
  annualMaintenanceCost: number;
  annualLicenseCost: number;
  implementationMonths: number;
  expectedLifetimeYears: number;
}

export interface AdvisoryContext {
  integrationDifficulty?: IntegrationDifficulty;
  changeImpact?: ChangeImpact;
  seasonalPattern?: SeasonalPattern;
  criticality?: CriticalityTier;
}

export interface ProcessEvaluationInput {
  attributes: ProcessAttributes;
  strategic: StrategicRatings;
  riskFactors: RiskFactor[];
  bonusFactors: BonusFactor[];
  financialPlan: FinancialPlan;
  advisory: AdvisoryContext;
}

// === Results ===
export interface SubScores {
  timeSavings: number;
  volume: number;
  qualityImprovement: number;
  technicalComplexity: number;
  dataComplexity: number;
  ruleStability: number;
}

export interface CompositeScore {
  gain: number;
  feasibility: number;
  strategic: number;
  total: number;
  adjusted: number;
  volumeBonus: number;
}

export interface FinancialMetrics {
  annualVolume: number;
  annualHoursSaved: number;
  grossAnnualSavings: number;
  realisticAnnualSavings: number;
  roiPercent: number;
  paybackMonths: number;
  breakEvenMonths: number;
  netPresentValue: number;
  totalLifetimeSavings: number;
  totalLifetimeCost: number;
}

export interface AdvisoryResult {
  recommendations: string[];
  automationComplexity: number;
  seasonalBoost: number;
  criticalityScore: number;
}

export interface ProcessEvaluation {
  subScores: SubScores;
  strategic: StrategicRatings;
  composite: CompositeScore;
  priority: PriorityCategory;
  financials: FinancialMetrics;
  advisory: AdvisoryResult;
  evaluatedAt: string;
}
