import type { PriorityCategory } from "./scoring/types";
import type { ProcessRecord } from "./persistence/process-row";

export interface PortfolioFilters {
  department: string | null;
  priority: PriorityCategory | null;
  minScore: number;
}

export const EMPTY_FILTERS: PortfolioFilters = { department: null, priority: null, minScore: 0 };

export interface PortfolioSummary {
  processCount: number;
  annualSavings: number;
  annualHoursSaved: number;
  highPriorityCount: number;
}

export interface PortfolioBreakdownRow extends PortfolioSummary {
  key: string;
}

export type BreakdownDimension = "department" | "priority";

export function filterPortfolio(records: ProcessRecord[], filters: PortfolioFilters): ProcessRecord[] {
  return records.filter((r) =>
    (filters.department === null || r.department === filters.department)
    && (filters.priority === null || r.priority === filters.priority)
    && r.adjusted_score >= filters.minScore,
  );
}

export function isFiltered(filters: PortfolioFilters): boolean {
  return filters.department !== null || filters.priority !== null || filters.minScore > 0;
}

export function summarizePortfolio(records: ProcessRecord[]): PortfolioSummary {
  return records.reduce<PortfolioSummary>(
    (acc, r) => ({
      processCount: acc.processCount + 1,
      annualSavings: acc.annualSavings + r.realistic_annual_savings,
      annualHoursSaved: acc.annualHoursSaved + r.annual_hours_saved,
      highPriorityCount: acc.highPriorityCount + (r.priority === "high" ? 1 : 0),
    }),
    { processCount: 0, annualSavings: 0, annualHoursSaved: 0, highPriorityCount: 0 },
  );
}

export function breakdownBy(records: ProcessRecord[], dimension: BreakdownDimension): PortfolioBreakdownRow[] {
  const groups = new Map<string, ProcessRecord[]>();
  for (const record of records) {
    const key = record[dimension];
    groups.set(key, [...(groups.get(key) ?? []), record]);
  }
  return [...groups.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, group]) => ({ key, ...summarizePortfolio(group) }));
}

/** Highest adjusted score first; ties keep their incoming (newest first) order. */
export function topProcesses(records: ProcessRecord[], limit = 10): ProcessRecord[] {
  return [...records].sort((a, b) => b.adjusted_score - a.adjusted_score).slice(0, limit);
}

export function listDepartments(records: ProcessRecord[]): string[] {
  return [...new Set(records.map((r) => r.department).filter((d) => d.trim() !== ""))].sort((a, b) => a.localeCompare(b));
}
