import type { BudgetPeriodUnit } from "../config";
import { formatUsd, fromMicros, percentUsed, toMicros } from "./money";
import { budgetWindow } from "./period";
import type { BudgetStore } from "./store";
import { crossedThresholds } from "./thresholds";
import type {
  BudgetAlert,
  BudgetCheck,
  BudgetLimits,
  BudgetReport,
  BudgetState,
  ChargeResult,
  StoredBudgetState
} from "./types";

export type BudgetMonitorOptions = {
  store: BudgetStore;
  limits: { daily: number; monthly: number };
  period: BudgetPeriodUnit;
};

export type BudgetMonitor = {
  check: (agentId: string, at: Date) => Promise<BudgetCheck>;
  charge: (agentId: string, cost: number, at: Date) => Promise<ChargeResult>;
  refund: (agentId: string, cost: number, at: Date) => Promise<BudgetState>;
  reset: (agentId: string, at: Date) => Promise<BudgetState>;
  report: (agentId: string, at: Date) => Promise<BudgetReport>;
};

export function toBudgetState(state: StoredBudgetState): BudgetState {
  return {
    agent_id: state.agent_id,
    period_start: state.period_start,
    period_end: state.period_end,
    daily_limit: fromMicros(state.daily_limit_micros),
    monthly_limit: fromMicros(state.monthly_limit_micros),
    cumulative_cost: fromMicros(state.cumulative_micros),
    breaker: state.breaker
  };
}

function breakerReason(state: StoredBudgetState): string {
  return `budget circuit breaker open for ${state.agent_id} (${formatUsd(state.cumulative_micros)} of ${formatUsd(state.limit_micros)})`;
}

export function createBudgetMonitor(options: BudgetMonitorOptions): BudgetMonitor {
  const limits: BudgetLimits = {
    dailyMicros: toMicros(options.limits.daily),
    monthlyMicros: toMicros(options.limits.monthly)
  };
  const windowAt = (at: Date) => budgetWindow(limits, options.period, at);

  const check: BudgetMonitor["check"] = async (agentId, at) => {
    const state = await options.store.getState(agentId, windowAt(at));
    if (state.breaker === "open") {
      return { allowed: false, state: toBudgetState(state), reason: breakerReason(state) };
    }
    return { allowed: true, state: toBudgetState(state) };
  };

  const charge: BudgetMonitor["charge"] = async (agentId, cost, at) => {
    if (!Number.isFinite(cost) || cost < 0) {
      throw new RangeError(`cost must be a non-negative amount, got ${cost}`);
    }
    const outcome = await options.store.charge(agentId, toMicros(cost), at, windowAt(at));
    if (!outcome.accepted) {
      return { accepted: false, state: toBudgetState(outcome.state), alerts: [], reason: breakerReason(outcome.state) };
    }

    const { state } = outcome;
    const alerts: BudgetAlert[] = crossedThresholds(outcome.before_micros, state.cumulative_micros, state.limit_micros).map(
      (threshold) => ({
        agent_id: agentId,
        threshold: threshold.percent,
        level: threshold.level,
        severity_id: threshold.severity_id,
        cumulative_cost: fromMicros(state.cumulative_micros),
        limit: fromMicros(state.limit_micros),
        breaker_opened: threshold.percent === 90 && state.breaker === "open",
        message: `${agentId} reached ${threshold.percent}% of its budget (${formatUsd(state.cumulative_micros)} of ${formatUsd(state.limit_micros)})`
      })
    );
    return { accepted: true, state: toBudgetState(state), alerts };
  };

  const refund: BudgetMonitor["refund"] = async (agentId, cost, at) => {
    return toBudgetState(await options.store.refund(agentId, toMicros(cost), at, windowAt(at)));
  };

  const reset: BudgetMonitor["reset"] = async (agentId, at) => {
    return toBudgetState(await options.store.reset(agentId, at, windowAt(at)));
  };

  const report: BudgetMonitor["report"] = async (agentId, at) => {
    const state = await options.store.getState(agentId, windowAt(at));
    return {
      state: toBudgetState(state),
      effective_limit: fromMicros(state.limit_micros),
      used_percent: percentUsed(state.cumulative_micros, state.limit_micros),
      remaining: fromMicros(Math.max(0, state.limit_micros - state.cumulative_micros)),
      period: options.period
    };
  };

  return { check, charge, refund, reset, report };
}
