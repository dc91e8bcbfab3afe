import { reachesPercent } from "./money";
import { freshState } from "./period";
import type { BudgetStore } from "./store";
import { BREAKER_PERCENT } from "./thresholds";
import type { BudgetWindow, ChargeOutcome, StoredBudgetState } from "./types";

// Reads and writes happen without an intervening await, so each charge is
// atomic with respect to every other caller in the process.
export class InMemoryBudgetStore implements BudgetStore {
  private readonly states = new Map<string, StoredBudgetState>();

  private current(agentId: string, window: BudgetWindow, at: Date): StoredBudgetState {
    const existing = this.states.get(agentId);
    if (existing && existing.period_start === window.period_start) {
      return existing;
    }
    return freshState(agentId, window, at);
  }

  async charge(agentId: string, deltaMicros: number, at: Date, window: BudgetWindow): Promise<ChargeOutcome> {
    const state = this.current(agentId, window, at);
    if (state.breaker === "open") {
      return { accepted: false, state: { ...state } };
    }
    const cumulative = state.cumulative_micros + deltaMicros;
    const next: StoredBudgetState = {
      ...state,
      ...window,
      cumulative_micros: cumulative,
      breaker: reachesPercent(cumulative, window.limit_micros, BREAKER_PERCENT) ? "open" : "closed",
      updated_at: at.toISOString()
    };
    this.states.set(agentId, next);
    return { accepted: true, before_micros: state.cumulative_micros, state: { ...next } };
  }

  async refund(agentId: string, deltaMicros: number, at: Date, window: BudgetWindow): Promise<StoredBudgetState> {
    const existing = this.states.get(agentId);
    if (!existing || existing.period_start !== window.period_start) {
      return this.getState(agentId, window);
    }
    const cumulative = Math.max(0, existing.cumulative_micros - deltaMicros);
    const next: StoredBudgetState = {
      ...existing,
      cumulative_micros: cumulative,
      breaker: reachesPercent(cumulative, existing.limit_micros, BREAKER_PERCENT) ? "open" : "closed",
      updated_at: at.toISOString()
    };
    this.states.set(agentId, next);
    return { ...next };
  }

  async getState(agentId: string, window: BudgetWindow): Promise<StoredBudgetState> {
    const existing = this.states.get(agentId);
    if (existing && existing.period_start === window.period_start) {
      return { ...existing };
    }
    return freshState(agentId, window, new Date(window.period_start));
  }

  async reset(agentId: string, at: Date, window: BudgetWindow): Promise<StoredBudgetState> {
    const next = freshState(agentId, window, at);
    this.states.set(agentId, next);
    return { ...next };
  }
}
