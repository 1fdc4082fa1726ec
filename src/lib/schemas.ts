import { z } from "zod";
import type {
  ApiAccess, BonusFactor, ChangeImpact, CriticalityTier, ExpectedResistance,
  Frequency, IntegrationDifficulty, PriorityCategory, ProcessChange,
  ProcessEvaluationInput, RiskFactor, SeasonalPattern, TrainingNeed,
} from "./scoring/types";
import { clamp, isNumeric, parseNumeric, splitList, toInteger } from "./scoring/coerce";
import { DEFAULT_FINANCIAL_PLAN } from "./scoring/financials";

export const FREQUENCIES = ["daily", "weekly", "monthly", "on_demand", "seasonal"] as const satisfies readonly Frequency[];

export const FREQUENCY_LABELS: Record<Frequency, string> = {
  daily: "Daily",
  weekly: "Weekly",
  monthly: "Monthly",
  on_demand: "On demand",
  seasonal: "Seasonal",
};

export const API_ACCESS = ["Yes", "No", "Unknown"] as const satisfies readonly ApiAccess[];
export const TRAINING_NEEDS = ["minimal", "brief", "structured", "extensive"] as const satisfies readonly TrainingNeed[];
export const PROCESS_CHANGES = ["minor", "moderate", "major"] as const satisfies readonly ProcessChange[];
export const RESISTANCE_LEVELS = ["low", "moderate", "high"] as const satisfies readonly ExpectedResistance[];

export const RISK_FACTORS = [
  "high_resistance",
  "critical_dependencies",
  "complex_approvals",
  "elevated_access",
] as const satisfies readonly RiskFactor[];

export const RISK_FACTOR_LABELS: Record<RiskFactor, string> = {
  high_resistance: "High organizational resistance",
  critical_dependencies: "Critical system dependencies",
  complex_approvals: "Complex approval flows",
  elevated_access: "Elevated security access required",
};

export const BONUS_FACTORS = ["pilot_value", "synergies", "existing_integrations"] as const satisfies readonly BonusFactor[];

export const BONUS_FACTOR_LABELS: Record<BonusFactor, string> = {
  pilot_value: "Pilot / proof-of-concept value",
  synergies: "Synergy effects",
  existing_integrations: "Existing system integrations",
};

export const PRIORITY_CATEGORIES = ["high", "medium", "low", "not_applicable"] as const satisfies readonly PriorityCategory[];

export const PRIORITY_LABELS: Record<PriorityCategory, string> = {
  high: "High priority",
  medium: "Medium priority",
  low: "Low priority",
  not_applicable: "Not applicable",
};

export const INTEGRATION_DIFFICULTIES = [
  "very_easy", "easy", "moderate", "complex", "legacy",
] as const satisfies readonly IntegrationDifficulty[];
export const CHANGE_IMPACTS = ["low", "medium", "high", "critical"] as const satisfies readonly ChangeImpact[];
export const SEASONAL_PATTERNS = [
  "none", "year_end", "quarter_end", "summer", "holiday",
] as const satisfies readonly SeasonalPattern[];
export const CRITICALITY_TIERS = ["low", "medium", "high", "critical"] as const satisfies readonly CriticalityTier[];

// ---------------------------------------------------------------------------
// Field helpers: numeric-like values are coerced before range checks
// ---------------------------------------------------------------------------

const integerField = (fallback: number, schema: z.ZodNumber) =>
  z.preprocess((v) => (v === undefined || v === null ? fallback : toInteger(v)), schema);

// Unparseable values read as 0 and are pulled into [min, max]; numbers as given still face the range check
const boundedIntegerField = (fallback: number, min: number, max: number, schema: z.ZodNumber) =>
  z.preprocess(
    (v) => (v === undefined || v === null ? fallback : isNumeric(v) ? toInteger(v) : clamp(0, min, max)),
    schema,
  );

const decimalField = (fallback: number, schema: z.ZodNumber) =>
  z.preprocess((v) => (v === undefined || v === null ? fallback : parseNumeric(v)), schema);

const textField = (max: number) => z.string().trim().max(max, `Must be at most ${max} characters`).default("");

// Factor lists arrive as arrays from the form and as comma-joined strings from storage
const toList = (v: unknown): unknown => (typeof v === "string" ? splitList(v) : v ?? []);
const distinct = <T>(items: T[]): T[] => [...new Set(items)];

const rating = (label: string) =>
  boundedIntegerField(3, 1, 5, z.number().int().min(1, `${label} must be between 1 and 5`).max(5, `${label} must be between 1 and 5`));

export const processInputSchema = z.object({
  name: textField(200),
  owner: textField(200),
  department: textField(200),
  description: textField(4000),
  trigger: textField(500),
  frequency: z.enum(FREQUENCIES, { message: "Please select a frequency" }).default("daily"),

  monthlyVolume: integerField(0, z.number().int().min(0, "Monthly volume cannot be negative")),
  processingMinutes: integerField(0, z.number().int().min(0, "Processing time cannot be negative")),
  peopleInvolved: boundedIntegerField(1, 1, Number.MAX_SAFE_INTEGER, z.number().int().min(1, "At least one person must be involved")),
  errorRate: decimalField(0, z.number().min(0, "Error rate must be between 0 and 100").max(100, "Error rate must be between 0 and 100")),
  hourlyCost: decimalField(600, z.number().min(0, "Hourly cost cannot be negative")),

  itSystems: textField(2000),
  dataSources: textField(2000),
  fileFormats: textField(2000),
  apiAccess: z.enum(API_ACCESS, { message: "API access must be Yes, No or Unknown" }).default("Yes"),

  trainingNeed: z.enum(TRAINING_NEEDS).default("minimal"),
  processChange: z.enum(PROCESS_CHANGES).default("moderate"),
  expectedResistance: z.enum(RESISTANCE_LEVELS).default("moderate"),

  organizationalImpact: rating("Organizational impact"),
  userImpact: rating("User impact"),
  regulatoryCompliance: rating("Regulatory compliance"),

  riskFactors: z.preprocess(toList, z.array(z.enum(RISK_FACTORS)).transform(distinct)),
  bonusFactors: z.preprocess(toList, z.array(z.enum(BONUS_FACTORS)).transform(distinct)),

  implementationCost: decimalField(DEFAULT_FINANCIAL_PLAN.implementationCost, z.number().min(0)),
  annualMaintenanceCost: decimalField(DEFAULT_FINANCIAL_PLAN.annualMaintenanceCost, z.number().min(0)),
  annualLicenseCost: decimalField(DEFAULT_FINANCIAL_PLAN.annualLicenseCost, z.number().min(0)),
  implementationMonths: integerField(DEFAULT_FINANCIAL_PLAN.implementationMonths, z.number().int().min(0)),
  expectedLifetimeYears: boundedIntegerField(
    DEFAULT_FINANCIAL_PLAN.expectedLifetimeYears, 1, 30,
    z.number().int().min(1, "Expected lifetime must be at least one year").max(30),
  ),

  integrationDifficulty: z.enum(INTEGRATION_DIFFICULTIES).optional(),
  changeImpact: z.enum(CHANGE_IMPACTS).optional(),
  seasonalPattern: z.enum(SEASONAL_PATTERNS).optional(),
  criticality: z.enum(CRITICALITY_TIERS).optional(),
});

export type ProcessInput = z.infer<typeof processInputSchema>;

// ---------------------------------------------------------------------------
// Required fields are reported together, after the schema has coerced values
// ---------------------------------------------------------------------------

const REQUIRED_FIELDS: { field: keyof ProcessInput; label: string }[] = [
  { field: "name", label: "Process name" },
  { field: "owner", label: "Process owner" },
  { field: "department", label: "Department" },
  { field: "description", label: "Description" },
  { field: "monthlyVolume", label: "Monthly volume" },
  { field: "processingMinutes", label: "Processing time" },
];

/** Labels of required fields that are blank, or zero for the two counts. */
export function findMissingFields(input: ProcessInput): string[] {
  return REQUIRED_FIELDS.filter(({ field }) => !input[field]).map(({ label }) => label);
}

export function toEvaluationInput(input: ProcessInput): ProcessEvaluationInput {
  return {
    attributes: {
      name: input.name,
      owner: input.owner,
      department: input.department,
      description: input.description,
      trigger: input.trigger,
      frequency: input.frequency,
      monthlyVolume: input.monthlyVolume,
      processingMinutes: input.processingMinutes,
      peopleInvolved: input.peopleInvolved,
      errorRate: input.errorRate,
      hourlyCost: input.hourlyCost,
      itSystems: input.itSystems,
      dataSources: input.dataSources,
      fileFormats: input.fileFormats,
      apiAccess: input.apiAccess,
      trainingNeed: input.trainingNeed,
      processChange: input.processChange,
      expectedResistance: input.expectedResistance,
    },
    strategic: {
      organizationalImpact: input.organizationalImpact,
      userImpact: input.userImpact,
      regulatoryCompliance: input.regulatoryCompliance,
    },
    riskFactors: input.riskFactors,
    bonusFactors: input.bonusFactors,
    financialPlan: {
      implementationCost: input.implementationCost,
      annualMaintenanceCost: input.annualMaintenanceCost,
      annualLicenseCost: input.annualLicenseCost,
      implementationMonths: input.implementationMonths,
      expectedLifetimeYears: input.expectedLifetimeYears,
    },
    advisory: {
      integrationDifficulty: input.integrationDifficulty,
      changeImpact: input.changeImpact,
      seasonalPattern: input.seasonalPattern,
      criticality: input.criticality,
    },
  };
}
