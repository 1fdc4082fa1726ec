import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { createLogger, type Logger } from "../logger";
import { processRowSchema, type ProcessRecord, type ProcessRowWrite } from "./process-row";

export const DEFAULT_PROCESS_TABLE = "processes";

export interface ProcessRepository {
  insert(row: ProcessRowWrite): Promise<number>;
  /** Resolves to false when no row has the id. */
  update(id: number, row: ProcessRowWrite): Promise<boolean>;
  /** Resolves to false when no row has the id. */
  remove(id: number): Promise<boolean>;
  /** Newest first. */
  list(): Promise<ProcessRecord[]>;
}

export type StoreOperation = "insert" | "update" | "delete" | "list";

export class ProcessStoreError extends Error {
  constructor(readonly operation: StoreOperation, message: string) {
    super(`Failed to ${operation} process: ${message}`);
    this.name = "ProcessStoreError";
  }
}

const idRowSchema = z.object({ id: z.coerce.number().int() });

export class SupabaseProcessRepository implements ProcessRepository {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string = DEFAULT_PROCESS_TABLE,
    private readonly logger: Logger = createLogger("ProcessStore"),
    private readonly now: () => Date = () => new Date(),
  ) {}

  async insert(row: ProcessRowWrite): Promise<number> {
    const { data, error } = await this.client
      .from(this.table)
      .insert({ ...row, registered_at: this.now().toISOString() })
      .select("id")
      .single();

    if (error || !data) {
      throw this.fail("insert", error?.message ?? "no row returned");
    }
    const { id } = idRowSchema.parse(data);
    this.logger.info(`Inserted process ${id} (${row.name})`);
    return id;
  }

  async update(id: number, row: ProcessRowWrite): Promise<boolean> {
    const { data, error } = await this.client
      .from(this.table)
      .update({ ...row, updated_at: this.now().toISOString() })
      .eq("id", id)
      .select("id");

    if (error) throw this.fail("update", error.message);
    const found = Array.isArray(data) && data.length > 0;
    if (found) this.logger.info(`Updated process ${id}`);
    return found;
  }

  async remove(id: number): Promise<boolean> {
    const { data, error } = await this.client
      .from(this.table)
      .delete()
      .eq("id", id)
      .select("id");

    if (error) throw this.fail("delete", error.message);
    const found = Array.isArray(data) && data.length > 0;
    if (found) this.logger.info(`Deleted process ${id}`);
    return found;
  }

  async list(): Promise<ProcessRecord[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select("*")
      .order("created_at", { ascending: false });

    if (error) throw this.fail("list", error.message);
    if (!Array.isArray(data)) return [];

    const records: ProcessRecord[] = [];
    for (const raw of data) {
      const parsed = processRowSchema.safeParse(raw);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        this.logger.warn("Skipping unreadable process row", parsed.error.issues[0]?.message);
      }
    }
    return records;
  }

  private fail(operation: StoreOperation, message: string): ProcessStoreError {
    this.logger.error(`${operation} on "${this.table}" failed: ${message}`);
    return new ProcessStoreError(operation, message);
  }
}
