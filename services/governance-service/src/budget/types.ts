export type BreakerState = "closed" | "open";

export type BudgetLimits = {
  dailyMicros: number;
  monthlyMicros: number;
};

/** The period and limits a charge is evaluated against. */
export type BudgetWindow = {
  period_start: string;
  period_end: string;
  daily_limit_micros: number;
  monthly_limit_micros: number;
  limit_micros: number;
};

export type StoredBudgetState = BudgetWindow & {
  agent_id: string;
  cumulative_micros: number;
  breaker: BreakerState;
  updated_at: string;
};

export type ChargeOutcome =
  | { accepted: true; before_micros: number; state: StoredBudgetState }
  | { accepted: false; state: StoredBudgetState };

export type BudgetState = {
  agent_id: string;
  period_start: string;
  period_end: string;
  daily_limit: number;
  monthly_limit: number;
  cumulative_cost: number;
  breaker: BreakerState;
};

export type AlertLevel = "info" | "warning" | "critical";

export type BudgetAlert = {
  agent_id: string;
  threshold: 50 | 75 | 90;
  level: AlertLevel;
  severity_id: 1 | 3 | 5;
  cumulative_cost: number;
  limit: number;
  breaker_opened: boolean;
  message: string;
};

export type BudgetCheck = { allowed: true; state: BudgetState } | { allowed: false; state: BudgetState; reason: string };

export type ChargeResult =
  | { accepted: true; state: BudgetState; alerts: BudgetAlert[] }
  | { accepted: false; state: BudgetState; alerts: []; reason: string };

export type BudgetReport = {
  state: BudgetState;
  effective_limit: number;
  used_percent: number;
  remaining: number;
  period: "day" | "month";
};
