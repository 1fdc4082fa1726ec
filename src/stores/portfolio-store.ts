import { createStore } from "zustand/vanilla";
import type { PriorityCategory } from "../lib/scoring/types";
import { toProcessInput, type ProcessRecord } from "../lib/persistence/process-row";
import type { ProcessRepository } from "../lib/persistence/process-repository";
import { EMPTY_FILTERS, filterPortfolio, type PortfolioFilters } from "../lib/portfolio";
import type { ProcessInput } from "../lib/schemas";

export type LoadStatus = "idle" | "loading" | "ready" | "error";

export interface PortfolioState {
  records: ProcessRecord[];
  filters: PortfolioFilters;
  editingId: number | null;
  status: LoadStatus;
  error: string | null;
  setRecords: (records: ProcessRecord[]) => void;
  setFilter: <K extends keyof PortfolioFilters>(key: K, value: PortfolioFilters[K]) => void;
  resetFilters: () => void;
  startEditing: (id: number) => void;
  cancelEditing: () => void;
  load: (repository: Pick<ProcessRepository, "list">) => Promise<void>;
  reset: () => void;
}

export const createPortfolioStore = () =>
  createStore<PortfolioState>()((set, get) => ({
    records: [],
    filters: EMPTY_FILTERS,
    editingId: null,
    status: "idle",
    error: null,

    setRecords: (records) => set({ records, status: "ready", error: null }),

    setFilter: (key, value) =>
      set((state) => ({ filters: { ...state.filters, [key]: value } })),

    resetFilters: () => set({ filters: EMPTY_FILTERS }),

    startEditing: (id) => {
      if (get().records.some((r) => r.id === id)) set({ editingId: id });
    },

    cancelEditing: () => set({ editingId: null }),

    load: async (repository) => {
      set({ status: "loading", error: null });
      try {
        const records = await repository.list();
        set({ records, status: "ready" });
      } catch (error) {
        set({ status: "error", error: error instanceof Error ? error.message : "Failed to load processes" });
      }
    },

    reset: () => set({
      records: [],
      filters: EMPTY_FILTERS,
      editingId: null,
      status: "idle",
      error: null,
    }),
  }));

export type PortfolioStore = ReturnType<typeof createPortfolioStore>;

export const selectFilteredRecords = (state: PortfolioState): ProcessRecord[] =>
  filterPortfolio(state.records, state.filters);

export const selectEditingRecord = (state: PortfolioState): ProcessRecord | null =>
  state.records.find((r) => r.id === state.editingId) ?? null;

/** Form values for the record being edited, or null when not editing. */
export const selectEditingInput = (state: PortfolioState): ProcessInput | null => {
  const record = selectEditingRecord(state);
  return record ? toProcessInput(record) : null;
};

export const selectPriorityOptions = (state: PortfolioState): PriorityCategory[] =>
  [...new Set(state.records.map((r) => r.priority))];
