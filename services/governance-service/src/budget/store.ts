import { config } from "../config";
import { InMemoryBudgetStore } from "./store.memory";
import { PostgresBudgetStore } from "./store.pg";
import type { BudgetWindow, ChargeOutcome, StoredBudgetState } from "./types";

export type BudgetStore = {
  /**
   * Adds `deltaMicros` in one read-modify-write. Rejected while the breaker
   * is open; opens the breaker when the charge reaches 90% of the limit.
   * A window whose period differs from the stored one starts fresh.
   */
  charge: (agentId: string, deltaMicros: number, at: Date, window: BudgetWindow) => Promise<ChargeOutcome>;
  /**
   * Takes back an accepted charge whose decision was never recorded. The
   * breaker is recomputed from the remaining amount; a charge from an
   * earlier period is not refunded.
   */
  refund: (agentId: string, deltaMicros: number, at: Date, window: BudgetWindow) => Promise<StoredBudgetState>;
  getState: (agentId: string, window: BudgetWindow) => Promise<StoredBudgetState>;
  reset: (agentId: string, at: Date, window: BudgetWindow) => Promise<StoredBudgetState>;
};

export function createBudgetStore(): BudgetStore {
  if (config.useInMemoryStore) {
    return new InMemoryBudgetStore();
  }
  return new PostgresBudgetStore();
}
