import { describe, it, expect } from "vitest";
import {
  describeFactors, frequencyLabel, describeFilters, formatCurrency, formatHours, formatPayback, formatPercent, formatScore, priorityLabel,
} from "@/lib/utils";
import { EMPTY_FILTERS } from "@/lib/portfolio";

describe("formatCurrency", () => {
  it("groups thousands with spaces", () => {
    expect(formatCurrency(684600)).toBe("684 600 kr");
    expect(formatCurrency(950)).toBe("950 kr");
  });

  it("abbreviates millions and billions", () => {
    expect(formatCurrency(2_500_000)).toBe("2.5 m kr");
    expect(formatCurrency(1_250_000_000)).toBe("1.3 bn kr");
  });
});

describe("formatters", () => {
  it("formats hours, percentages and scores", () => {
    expect(formatHours(2700)).toBe("2 700 hours/year");
    expect(formatPercent(3804.91)).toBe("3805%");
    expect(formatScore(9.57)).toBe("9.6/10");
  });

  it("formats payback months and the no-payback sentinel", () => {
    expect(formatPayback(6.666)).toBe("6.7 months");
    expect(formatPayback(999)).toBe("Does not pay back");
  });

  it("labels priorities and frequencies", () => {
    expect(priorityLabel("not_applicable")).toBe("Not applicable");
    expect(frequencyLabel("on_demand")).toBe("On demand");
  });

  it("labels risk and bonus factors", () => {
    expect(describeFactors(["complex_approvals", "synergies"])).toBe("Complex approval flows, Synergy effects");
    expect(describeFactors([])).toBe("None");
  });
});

describe("describeFilters", () => {
  it("describes the active filters", () => {
    expect(describeFilters({ department: "Finance", priority: "high", minScore: 4 }))
      .toBe("Department: Finance | Priority: High priority | Min score: 4");
  });

  it("falls back when nothing is filtered", () => {
    expect(describeFilters(EMPTY_FILTERS)).toBe("All processes");
  });
});
