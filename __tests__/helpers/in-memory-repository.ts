import { processRowSchema, type ProcessRecord, type ProcessRowWrite } from "@/lib/persistence/process-row";
import type { ProcessRepository } from "@/lib/persistence/process-repository";

/** Keeps rows in a Map; ids start at 1 and are never reused. */
export class InMemoryProcessRepository implements ProcessRepository {
  readonly rows = new Map<number, ProcessRowWrite>();
  private nextId = 1;

  async insert(row: ProcessRowWrite): Promise<number> {
    const id = this.nextId++;
    this.rows.set(id, row);
    return id;
  }

  async update(id: number, row: ProcessRowWrite): Promise<boolean> {
    if (!this.rows.has(id)) return false;
    this.rows.set(id, row);
    return true;
  }

  async remove(id: number): Promise<boolean> {
    return this.rows.delete(id);
  }

  async list(): Promise<ProcessRecord[]> {
    return [...this.rows.entries()]
      .reverse()
      .map(([id, row]) => processRowSchema.parse({ ...row, id }));
  }
}
