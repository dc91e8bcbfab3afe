import type { Pool } from "pg";
import { getPool } from "../db";
import { freshState } from "./period";
import type { BudgetStore } from "./store";
import { BREAKER_PERCENT } from "./thresholds";
import type { BreakerState, BudgetWindow, ChargeOutcome, StoredBudgetState } from "./types";

type BudgetRow = {
  agent_id: string;
  period_start: Date | string;
  period_end: Date | string;
  daily_limit_micros: string | number;
  monthly_limit_micros: string | number;
  limit_micros: string | number;
  cumulative_micros: string | number;
  breaker: string;
  updated_at: Date | string;
};

const COLUMNS =
  "agent_id, period_start, period_end, daily_limit_micros, monthly_limit_micros, limit_micros, cumulative_micros, breaker, updated_at";

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function toBreaker(value: string): BreakerState {
  return value === "open" ? "open" : "closed";
}

function mapRow(row: BudgetRow): StoredBudgetState {
  return {
    agent_id: row.agent_id,
    period_start: toIso(row.period_start),
    period_end: toIso(row.period_end),
    daily_limit_micros: Number(row.daily_limit_micros),
    monthly_limit_micros: Number(row.monthly_limit_micros),
    limit_micros: Number(row.limit_micros),
    cumulative_micros: Number(row.cumulative_micros),
    breaker: toBreaker(row.breaker),
    updated_at: toIso(row.updated_at)
  };
}

export class PostgresBudgetStore implements BudgetStore {
  constructor(private readonly pool: Pool = getPool()) {}

  async charge(agentId: string, deltaMicros: number, at: Date, window: BudgetWindow): Promise<ChargeOutcome> {
    // One statement: a stale period restarts from the delta, an open breaker
    // in the current period matches no row and the charge is rejected.
    const result = await this.pool.query<BudgetRow>(
      `INSERT INTO budget_states AS b (${COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7::bigint,
               CASE WHEN $7::bigint * 100 >= $6::bigint * $9 THEN 'open' ELSE 'closed' END, $8)
       ON CONFLICT (agent_id) DO UPDATE SET
         cumulative_micros = CASE WHEN b.period_start = EXCLUDED.period_start
                                  THEN b.cumulative_micros + EXCLUDED.cumulative_micros
                                  ELSE EXCLUDED.cumulative_micros END,
         breaker = CASE WHEN (CASE WHEN b.period_start = EXCLUDED.period_start
                                   THEN b.cumulative_micros + EXCLUDED.cumulative_micros
                                   ELSE EXCLUDED.cumulative_micros END) * 100 >= EXCLUDED.limit_micros * $9
                        THEN 'open' ELSE 'closed' END,
         period_start = EXCLUDED.period_start,
         period_end = EXCLUDED.period_end,
         daily_limit_micros = EXCLUDED.daily_limit_micros,
         monthly_limit_micros = EXCLUDED.monthly_limit_micros,
         limit_micros = EXCLUDED.limit_micros,
         updated_at = EXCLUDED.updated_at
       WHERE b.breaker = 'closed' OR b.period_start <> EXCLUDED.period_start
       RETURNING ${COLUMNS}`,
      [
        agentId,
        window.period_start,
        window.period_end,
        window.daily_limit_micros,
        window.monthly_limit_micros,
        window.limit_micros,
        deltaMicros,
        at.toISOString(),
        BREAKER_PERCENT
      ]
    );

    const row = result.rows[0];
    if (row) {
      const state = mapRow(row);
      return { accepted: true, before_micros: state.cumulative_micros - deltaMicros, state };
    }
    return { accepted: false, state: await this.getState(agentId, window) };
  }

  async refund(agentId: string, deltaMicros: number, at: Date, window: BudgetWindow): Promise<StoredBudgetState> {
    const result = await this.pool.query<BudgetRow>(
      `UPDATE budget_states SET
         cumulative_micros = GREATEST(cumulative_micros - $3::bigint, 0),
         breaker = CASE WHEN GREATEST(cumulative_micros - $3::bigint, 0) * 100 >= limit_micros * $4
                        THEN 'open' ELSE 'closed' END,
         updated_at = $5
       WHERE agent_id = $1 AND period_start = $2
       RETURNING ${COLUMNS}`,
      [agentId, window.period_start, deltaMicros, BREAKER_PERCENT, at.toISOString()]
    );
    const row = result.rows[0];
    return row ? mapRow(row) : this.getState(agentId, window);
  }

  async getState(agentId: string, window: BudgetWindow): Promise<StoredBudgetState> {
    const result = await this.pool.query<BudgetRow>(
      `SELECT ${COLUMNS} FROM budget_states WHERE agent_id = $1 AND period_start = $2`,
      [agentId, window.period_start]
    );
    const row = result.rows[0];
    return row ? mapRow(row) : freshState(agentId, window, new Date(window.period_start));
  }

  async reset(agentId: string, at: Date, window: BudgetWindow): Promise<StoredBudgetState> {
    const next = freshState(agentId, window, at);
    const result = await this.pool.query<BudgetRow>(
      `INSERT INTO budget_states (${COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, 0, 'closed', $7)
       ON CONFLICT (agent_id) DO UPDATE SET
         period_start = EXCLUDED.period_start,
         period_end = EXCLUDED.period_end,
         daily_limit_micros = EXCLUDED.daily_limit_micros,
         monthly_limit_micros = EXCLUDED.monthly_limit_micros,
         limit_micros = EXCLUDED.limit_micros,
         cumulative_micros = 0,
         breaker = 'closed',
         updated_at = EXCLUDED.updated_at
       RETURNING ${COLUMNS}`,
      [
        agentId,
        next.period_start,
        next.period_end,
        next.daily_limit_micros,
        next.monthly_limit_micros,
        next.limit_micros,
        next.updated_at
      ]
    );
    const row = result.rows[0];
    return row ? mapRow(row) : next;
  }
}
