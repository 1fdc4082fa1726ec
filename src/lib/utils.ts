import { BONUS_FACTOR_LABELS, FREQUENCY_LABELS, PRIORITY_LABELS, RISK_FACTOR_LABELS } from "./schemas";
import type { BonusFactor, Frequency, PriorityCategory, RiskFactor } from "./scoring/types";
import type { PortfolioFilters } from "./portfolio";
import { PAYBACK_SENTINEL } from "./scoring/financials";

const groupDigits = (value: number) => Math.round(value).toString().replace(/\B(?=(\d{3})+(?!\d))/g, " ");

export function formatCurrency(value: number): string {
  if (Math.abs(value) >= 1_000_000_000) {
    return `${(value / 1_000_000_000).toFixed(1)} bn kr`;
  }
  if (Math.abs(value) >= 1_000_000) {
    return `${(value / 1_000_000).toFixed(1)} m kr`;
  }
  return `${groupDigits(value)} kr`;
}

export function formatHours(value: number): string {
  return `${groupDigits(value)} hours/year`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(0)}%`;
}

export function formatPayback(months: number): string {
  if (months >= PAYBACK_SENTINEL) return "Does not pay back";
  return `${months.toFixed(1)} months`;
}

export function formatScore(score: number): string {
  return `${score.toFixed(1)}/10`;
}

export function priorityLabel(priority: PriorityCategory): string {
  return PRIORITY_LABELS[priority];
}

export function frequencyLabel(frequency: Frequency): string {
  return FREQUENCY_LABELS[frequency];
}

const FACTOR_LABELS: Record<RiskFactor | BonusFactor, string> = { ...RISK_FACTOR_LABELS, ...BONUS_FACTOR_LABELS };

/** Readable list of factor ids, e.g. for a stored record's risk column. */
export function describeFactors(factors: readonly (RiskFactor | BonusFactor)[]): string {
  return factors.length > 0 ? factors.map((f) => FACTOR_LABELS[f]).join(", ") : "None";
}

/** Heading for the overview, e.g. "Department: Finance | Min score: 4". */
export function describeFilters(filters: PortfolioFilters): string {
  const parts: string[] = [];
  if (filters.department !== null) parts.push(`Department: ${filters.department}`);
  if (filters.priority !== null) parts.push(`Priority: ${priorityLabel(filters.priority)}`);
  if (filters.minScore > 0) parts.push(`Min score: ${filters.minScore}`);
  return parts.length > 0 ? parts.join(" | ") : "All processes";
}
