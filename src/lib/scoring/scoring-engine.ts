import type { ProcessEvaluation, ProcessEvaluationInput } from "./types";
import { calculateSubScores, clampRating } from "./sub-scores";
import { calculateComposite, priorityCategory } from "./composite";
import { calculateFinancials } from "./financials";
import { calculateAdvisory } from "./advisory";

/**
 * Run the full evaluation for one process. Everything except the seasonal
 * boost is a function of `input`; the boost reads the month of `evaluatedAt`,
 * which the caller passes in.
 */
export function evaluateProcess(input: ProcessEvaluationInput, evaluatedAt: Date): ProcessEvaluation {
  const { attributes } = input;
  const subScores = calculateSubScores(attributes);
  const strategic = {
    organizationalImpact: clampRating(input.strategic.organizationalImpact),
    userImpact: clampRating(input.strategic.userImpact),
    regulatoryCompliance: clampRating(input.strategic.regulatoryCompliance),
  };

  const composite = calculateComposite({
    subScores,
    strategic,
    riskFactors: input.riskFactors,
    bonusFactors: input.bonusFactors,
    quantities: attributes,
  });

  return {
    subScores,
    strategic,
    composite,
    priority: priorityCategory(composite.adjusted),
    financials: calculateFinancials(attributes, input.financialPlan),
    advisory: calculateAdvisory(input.advisory, {
      monthlyVolume: attributes.monthlyVolume,
      fileFormats: attributes.fileFormats,
      technicalComplexity: subScores.technicalComplexity,
    }, evaluatedAt),
    evaluatedAt: evaluatedAt.toISOString(),
  };
}
