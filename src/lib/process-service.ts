import type { z } from "zod";
import type { ProcessEvaluation } from "./scoring/types";
import { evaluateProcess } from "./scoring/scoring-engine";
import { findMissingFields, processInputSchema, toEvaluationInput, type ProcessInput } from "./schemas";
import { toProcessRow, type ProcessRecord } from "./persistence/process-row";
import type { ProcessRepository } from "./persistence/process-repository";
import { createLogger, type Logger } from "./logger";

export type InputIssues = z.inferFlattenedErrors<typeof processInputSchema>;

export type ServiceFailure =
  | { ok: false; reason: "invalid"; issues: InputIssues }
  | { ok: false; reason: "missing_fields"; missing: string[] }
  | { ok: false; reason: "not_found"; id: number };

export type ServiceResult<T> = { ok: true; value: T } | ServiceFailure;

export interface SavedProcess {
  id: number;
  evaluation: ProcessEvaluation;
}

type Prepared = { ok: true; input: ProcessInput; evaluation: ProcessEvaluation } | ServiceFailure;

/**
 * The caller of the scoring engine: parses raw form values, rejects records
 * with missing required fields, evaluates, and persists the combined row.
 * Store failures propagate as `ProcessStoreError`.
 */
export class ProcessService {
  constructor(
    private readonly repository: ProcessRepository,
    private readonly logger: Logger = createLogger("Processes"),
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Score without saving; required fields are not enforced. */
  preview(raw: unknown, evaluatedAt: Date = this.now()): ServiceResult<ProcessEvaluation> {
    const parsed = processInputSchema.safeParse(raw);
    if (!parsed.success) return { ok: false, reason: "invalid", issues: parsed.error.flatten() };
    return { ok: true, value: evaluateProcess(toEvaluationInput(parsed.data), evaluatedAt) };
  }

  async create(raw: unknown): Promise<ServiceResult<SavedProcess>> {
    const prepared = this.prepare(raw);
    if (!prepared.ok) return prepared;

    const id = await this.repository.insert(toProcessRow(prepared.input, prepared.evaluation));
    this.logger.info(`Saved "${prepared.input.name}" as ${id} (${prepared.evaluation.priority})`);
    return { ok: true, value: { id, evaluation: prepared.evaluation } };
  }

  async update(id: number, raw: unknown): Promise<ServiceResult<SavedProcess>> {
    const prepared = this.prepare(raw);
    if (!prepared.ok) return prepared;

    const found = await this.repository.update(id, toProcessRow(prepared.input, prepared.evaluation));
    if (!found) return { ok: false, reason: "not_found", id };
    return { ok: true, value: { id, evaluation: prepared.evaluation } };
  }

  async remove(id: number): Promise<ServiceResult<{ id: number }>> {
    const found = await this.repository.remove(id);
    if (!found) return { ok: false, reason: "not_found", id };
    return { ok: true, value: { id } };
  }

  list(): Promise<ProcessRecord[]> {
    return this.repository.list();
  }

  private prepare(raw: unknown): Prepared {
    const parsed = processInputSchema.safeParse(raw);
    if (!parsed.success) return { ok: false, reason: "invalid", issues: parsed.error.flatten() };

    const missing = findMissingFields(parsed.data);
    if (missing.length > 0) {
      this.logger.warn(`Rejected process with missing fields: ${missing.join(", ")}`);
      return { ok: false, reason: "missing_fields", missing };
    }

    return { ok: true, input: parsed.data, evaluation: evaluateProcess(toEvaluationInput(parsed.data), this.now()) };
  }
}
