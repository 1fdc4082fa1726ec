import { describe, it, expect } from "vitest";
import {
  annualVolume, calculateFinancials, calculateReturns, realisticAnnualSavings,
  DEFAULT_FINANCIAL_PLAN, PAYBACK_SENTINEL,
} from "@/lib/scoring/financials";

describe("annualVolume", () => {
  it("derives yearly volume, hours and gross savings", () => {
    expect(annualVolume({ monthlyVolume: 100, processingMinutes: 30, hourlyCost: 500 })).toEqual({
      annualVolume: 1200,
      annualHoursSaved: 600,
      grossAnnualSavings: 300000,
    });
  });
});

describe("realisticAnnualSavings", () => {
  it("applies the payroll overhead to hours times hourly cost", () => {
    expect(realisticAnnualSavings(1000, 600, 0, 0)).toBe(684600);
  });

  it("subtracts license and maintenance costs", () => {
    expect(realisticAnnualSavings(1000, 600, 10000, 4600)).toBe(670000);
  });

  it("never goes below zero", () => {
    expect(realisticAnnualSavings(10, 100, 5000, 0)).toBe(0);
  });
});

describe("calculateReturns", () => {
  const plan = {
    implementationCost: 60000,
    annualMaintenanceCost: 12000,
    annualLicenseCost: 0,
    implementationMonths: 3,
    expectedLifetimeYears: 5,
  };

  it("computes ROI, payback, break-even and NPV", () => {
    const returns = calculateReturns(120000, plan);
    expect(returns.totalLifetimeSavings).toBe(600000);
    expect(returns.totalLifetimeCost).toBe(120000);
    expect(returns.roiPercent).toBe(400);
    expect(returns.paybackMonths).toBeCloseTo(6.6667, 4);
    expect(returns.breakEvenMonths).toBeCloseTo(9.6667, 4);
    expect(returns.netPresentValue).toBeCloseTo(371212.684, 2);
  });

  it("reports 0 ROI when there is no cost at all", () => {
    const returns = calculateReturns(50000, { ...DEFAULT_FINANCIAL_PLAN });
    expect(returns.roiPercent).toBe(0);
    expect(returns.paybackMonths).toBe(0);
    expect(returns.breakEvenMonths).toBe(3);
  });

  it("uses the sentinel when monthly net savings are not positive", () => {
    const flat = calculateReturns(12000, plan);
    expect(flat.paybackMonths).toBe(PAYBACK_SENTINEL);
    expect(flat.breakEvenMonths).toBe(PAYBACK_SENTINEL);

    const none = calculateReturns(0, { ...DEFAULT_FINANCIAL_PLAN });
    expect(none.paybackMonths).toBe(PAYBACK_SENTINEL);
    expect(none.roiPercent).toBe(0);
  });

  it("discounts nothing when the lifetime is zero years", () => {
    const returns = calculateReturns(120000, { ...plan, expectedLifetimeYears: 0 });
    expect(returns.totalLifetimeSavings).toBe(0);
    expect(returns.netPresentValue).toBe(-60000);
  });
});

describe("calculateFinancials", () => {
  it("chains volume, realistic savings and returns", () => {
    const metrics = calculateFinancials(
      { monthlyVolume: 100, processingMinutes: 50, hourlyCost: 600 },
      {
        implementationCost: 100000,
        annualMaintenanceCost: 10000,
        annualLicenseCost: 5000,
        implementationMonths: 4,
        expectedLifetimeYears: 3,
      },
    );
    expect(metrics.annualVolume).toBe(1200);
    expect(metrics.annualHoursSaved).toBe(1000);
    expect(metrics.grossAnnualSavings).toBe(600000);
    expect(metrics.realisticAnnualSavings).toBe(669600);
    expect(metrics.totalLifetimeSavings).toBe(2008800);
    expect(metrics.totalLifetimeCost).toBe(130000);
    expect(metrics.roiPercent).toBeCloseTo(1445.2308, 4);
    expect(metrics.paybackMonths).toBeCloseTo(1.8193, 4);
    expect(metrics.breakEvenMonths).toBeCloseTo(5.8193, 4);
    expect(metrics.netPresentValue).toBeCloseTo(1599853.1728, 3);
  });

  it("falls back to the default plan", () => {
    const metrics = calculateFinancials({ monthlyVolume: 10, processingMinutes: 6, hourlyCost: 600 });
    // 120 cases * 6 min = 12 hours; 12 * 600 * 1.141
    expect(metrics.realisticAnnualSavings).toBe(8215);
    expect(metrics.roiPercent).toBe(0);
    expect(metrics.breakEvenMonths).toBe(3);
  });
});
