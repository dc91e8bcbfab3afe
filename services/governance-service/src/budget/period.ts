import type { BudgetPeriodUnit } from "../config";
import type { BudgetLimits, BudgetWindow, StoredBudgetState } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export function periodBounds(at: Date, unit: BudgetPeriodUnit): { start: Date; end: Date } {
  if (unit === "month") {
    const start = new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), 1));
    const end = new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth() + 1, 1));
    return { start, end };
  }
  const start = new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate()));
  return { start, end: new Date(start.getTime() + DAY_MS) };
}

export function daysInMonth(at: Date): number {
  return new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth() + 1, 0)).getUTCDate();
}

/**
 * The limit the breaker trips against. A daily period is also capped by the
 * monthly limit; a monthly period is capped by the daily limit summed over
 * the month.
 */
export function effectiveLimitMicros(limits: BudgetLimits, unit: BudgetPeriodUnit, at: Date): number {
  if (unit === "month") {
    return Math.min(limits.monthlyMicros, limits.dailyMicros * daysInMonth(at));
  }
  return Math.min(limits.dailyMicros, limits.monthlyMicros);
}

export function budgetWindow(limits: BudgetLimits, unit: BudgetPeriodUnit, at: Date): BudgetWindow {
  const { start, end } = periodBounds(at, unit);
  return {
    period_start: start.toISOString(),
    period_end: end.toISOString(),
    daily_limit_micros: limits.dailyMicros,
    monthly_limit_micros: limits.monthlyMicros,
    limit_micros: effectiveLimitMicros(limits, unit, at)
  };
}

export function freshState(agentId: string, window: BudgetWindow, at: Date): StoredBudgetState {
  return {
    ...window,
    agent_id: agentId,
    cumulative_micros: 0,
    breaker: "closed",
    updated_at: at.toISOString()
  };
}
