import type { ProcessAttributes } from "@/lib/scoring/types";
import { processRowSchema, type ProcessRecord } from "@/lib/persistence/process-row";

export const EVALUATED_AT = new Date("2024-03-15T09:00:00.000Z");

/** Form values for a mid-sized invoice process; every field is filled in. */
export const invoiceForm = {
  name: "Invoice matching",
  owner: "Test Owner",
  department: "Finance",
  description: "Match supplier invoices against purchase orders",
  trigger: "Invoice received",
  frequency: "daily",
  monthlyVolume: 300,
  processingMinutes: 45,
  peopleInvolved: 3,
  errorRate: 7.5,
  hourlyCost: 650,
  itSystems: "ERP, Email",
  dataSources: "ERP, Supplier portal",
  fileFormats: "PDF, Excel",
  apiAccess: "No",
  trainingNeed: "brief",
  processChange: "moderate",
  expectedResistance: "moderate",
  organizationalImpact: 4,
  userImpact: 3,
  regulatoryCompliance: 5,
  riskFactors: ["complex_approvals"],
  bonusFactors: ["synergies", "existing_integrations"],
  implementationCost: 150000,
  annualMaintenanceCost: 20000,
  annualLicenseCost: 30000,
  implementationMonths: 4,
  expectedLifetimeYears: 5,
  integrationDifficulty: "moderate",
  changeImpact: "medium",
  seasonalPattern: "quarter_end",
  criticality: "high",
};

export function makeAttributes(overrides: Partial<ProcessAttributes> = {}): ProcessAttributes {
  return {
    name: "Test process",
    owner: "Test Owner",
    department: "Operations",
    description: "Test description",
    trigger: "",
    frequency: "daily",
    monthlyVolume: 0,
    processingMinutes: 0,
    peopleInvolved: 1,
    errorRate: 0,
    hourlyCost: 600,
    itSystems: "",
    dataSources: "",
    fileFormats: "",
    apiAccess: "No",
    trainingNeed: "minimal",
    processChange: "major",
    expectedResistance: "high",
    ...overrides,
  };
}

/** A stored row as the table returns it; only the columns under test need overriding. */
export function makeRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 1,
    name: "Stored process",
    owner: "Test Owner",
    department: "Finance",
    description: "Stored description",
    trigger: null,
    frequency: "weekly",
    monthly_volume: 100,
    processing_minutes: 20,
    people_involved: 2,
    error_rate: 5,
    hourly_cost: 600,
    it_systems: "ERP",
    data_sources: "ERP",
    file_formats: "Excel",
    api_access: "No",
    training_need: "minimal",
    process_change: "moderate",
    expected_resistance: "moderate",
    time_savings_score: 2,
    volume_score: 2,
    quality_score: 3,
    technical_score: 4,
    data_score: 1,
    rule_stability_score: 3,
    organizational_impact: 3,
    user_impact: 3,
    regulatory_compliance: 3,
    gain_score: 4,
    feasibility_score: 5,
    strategic_score: 6,
    total_score: 5,
    adjusted_score: 5,
    volume_bonus: 0,
    priority: "medium",
    risk_factors: "",
    bonus_factors: "",
    implementation_cost: 0,
    annual_maintenance_cost: 0,
    annual_license_cost: 0,
    implementation_months: 3,
    expected_lifetime_years: 5,
    annual_volume: 1200,
    annual_hours_saved: 400,
    gross_annual_savings: 240000,
    realistic_annual_savings: 273840,
    roi_percent: 0,
    payback_months: 0,
    break_even_months: 3,
    net_present_value: 1093347,
    total_lifetime_savings: 1369200,
    total_lifetime_cost: 0,
    technology_recommendation: "",
    automation_complexity: 3,
    seasonal_boost: 0,
    criticality_score: 2,
    integration_difficulty: null,
    change_impact: null,
    seasonal_pattern: null,
    criticality: null,
    evaluated_at: "2024-01-10T08:00:00.000Z",
    registered_at: "2024-01-10T08:00:00.000Z",
    created_at: "2024-01-10T08:00:00.000Z",
    updated_at: null,
    ...overrides,
  };
}

export function makeRecord(overrides: Record<string, unknown> = {}): ProcessRecord {
  return processRowSchema.parse(makeRow(overrides));
}
