import type { FinancialMetrics, FinancialPlan, ProcessAttributes } from "./types";
import { roundHalfAwayFromZero } from "./coerce";

/** Employer payroll overhead (regional employer tax) applied on top of hourly cost. */
export const PAYROLL_OVERHEAD_MULTIPLIER = 1.141;
export const DISCOUNT_RATE = 0.08;
export const PAYBACK_SENTINEL = 999;

export const DEFAULT_FINANCIAL_PLAN: FinancialPlan = {
  implementationCost: 0,
  annualMaintenanceCost: 0,
  annualLicenseCost: 0,
  implementationMonths: 3,
  expectedLifetimeYears: 5,
};

export interface AnnualVolume {
  annualVolume: number;
  annualHoursSaved: number;
  grossAnnualSavings: number;
}

export function annualVolume(
  attributes: Pick<ProcessAttributes, "monthlyVolume" | "processingMinutes" | "hourlyCost">,
): AnnualVolume {
  const volume = attributes.monthlyVolume * 12;
  const hours = (volume * attributes.processingMinutes) / 60;
  return {
    annualVolume: volume,
    annualHoursSaved: hours,
    grossAnnualSavings: hours * attributes.hourlyCost,
  };
}

export function realisticAnnualSavings(
  annualHoursSaved: number, hourlyCost: number,
  annualLicenseCost: number, annualMaintenanceCost: number,
): number {
  const savings = annualHoursSaved * hourlyCost * PAYROLL_OVERHEAD_MULTIPLIER - annualLicenseCost - annualMaintenanceCost;
  return Math.max(0, roundHalfAwayFromZero(savings));
}

export interface ReturnMetrics {
  roiPercent: number;
  paybackMonths: number;
  breakEvenMonths: number;
  netPresentValue: number;
  totalLifetimeSavings: number;
  totalLifetimeCost: number;
}

export function calculateReturns(annualSavings: number, plan: FinancialPlan): ReturnMetrics {
  const years = Math.max(0, Math.floor(plan.expectedLifetimeYears));
  const maintenance = plan.annualMaintenanceCost;

  const totalLifetimeSavings = annualSavings * years;
  const totalLifetimeCost = plan.implementationCost + maintenance * years;
  const roiPercent = totalLifetimeCost > 0
    ? ((totalLifetimeSavings - totalLifetimeCost) / totalLifetimeCost) * 100
    : 0;

  const monthlyNet = annualSavings / 12 - maintenance / 12;
  const paybackMonths = monthlyNet > 0 ? plan.implementationCost / monthlyNet : PAYBACK_SENTINEL;
  const breakEvenMonths = monthlyNet > 0 ? plan.implementationMonths + paybackMonths : PAYBACK_SENTINEL;

  let discounted = 0;
  for (let year = 1; year <= years; year++) {
    discounted += (annualSavings - maintenance) / (1 + DISCOUNT_RATE) ** year;
  }

  return {
    roiPercent,
    paybackMonths,
    breakEvenMonths,
    netPresentValue: discounted - plan.implementationCost,
    totalLifetimeSavings,
    totalLifetimeCost,
  };
}

export function calculateFinancials(
  attributes: Pick<ProcessAttributes, "monthlyVolume" | "processingMinutes" | "hourlyCost">,
  plan: FinancialPlan = DEFAULT_FINANCIAL_PLAN,
): FinancialMetrics {
  const volume = annualVolume(attributes);
  const savings = realisticAnnualSavings(
    volume.annualHoursSaved, attributes.hourlyCost,
    plan.annualLicenseCost, plan.annualMaintenanceCost,
  );
  return {
    ...volume,
    realisticAnnualSavings: savings,
    ...calculateReturns(savings, plan),
  };
}
