export * from "./lib/scoring/types";
export { parseNumeric, roundHalfAwayFromZero, toInteger } from "./lib/scoring/coerce";
export {
  calculateSubScores, dataComplexityScore, qualityImprovementScore, ruleStabilityScore,
  technicalComplexityScore, timeSavingsScore, volumeScore,
} from "./lib/scoring/sub-scores";
export { calculateComposite, priorityCategory, volumeBonus, PRIORITY_THRESHOLDS } from "./lib/scoring/composite";
export {
  calculateFinancials, calculateReturns, realisticAnnualSavings,
  DISCOUNT_RATE, PAYBACK_SENTINEL, PAYROLL_OVERHEAD_MULTIPLIER,
} from "./lib/scoring/financials";
export {
  automationComplexityScore, criticalityScore, recommendTechnology, seasonalBoost,
} from "./lib/scoring/advisory";
export { evaluateProcess } from "./lib/scoring/scoring-engine";
export * from "./lib/schemas";
export * from "./lib/portfolio";
export { toProcessInput, toProcessRow, processRowSchema, type ProcessRecord, type ProcessRowWrite } from "./lib/persistence/process-row";
export {
  ProcessStoreError, SupabaseProcessRepository, type ProcessRepository,
} from "./lib/persistence/process-repository";
export { ProcessService, type ServiceResult, type SavedProcess } from "./lib/process-service";
export { createProcessRoutes, type ProcessRoutes } from "./api/processes-route";
export { ConfigError, getConfig, loadConfig, type AppConfig } from "./lib/config";
export { createLogger, type Logger, type LogLevel } from "./lib/logger";
export { createApp, type App } from "./app";
export { createPortfolioStore, type PortfolioStore } from "./stores/portfolio-store";
export {
  describeFactors, describeFilters, formatCurrency, formatHours, formatPayback, formatPercent,
  formatScore, frequencyLabel, priorityLabel,
} from "./lib/utils";
