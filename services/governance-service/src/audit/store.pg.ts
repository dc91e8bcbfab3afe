import type { Pool } from "pg";
import { getPool } from "../db";
import { auditRecordSchema, siemEventSchema } from "./schema";
import type { AuditStore } from "./store";
import type { AuditRecord, SiemEvent } from "./types";

type RecordRow = { record_json: unknown };
type EventRow = { event_json: unknown };

export class PostgresAuditStore implements AuditStore {
  constructor(private readonly pool: Pool = getPool()) {}

  async appendAuditRecord(record: AuditRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO audit_records (audit_id, recorded_at, actor, action, workflow_step, evidence_hash, record_json)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        record.audit_id,
        record.timestamp,
        record.actor,
        record.action,
        record.workflow_step,
        record.evidence_hash,
        JSON.stringify(record)
      ]
    );
  }

  async appendSiemEvents(events: SiemEvent[]): Promise<void> {
    if (!events.length) {
      return;
    }

    const values: unknown[] = [];
    const rows: string[] = [];
    events.forEach((event, index) => {
      const base = index * 6;
      rows.push(`($${base + 1},$${base + 2},$${base + 3},$${base + 4},$${base + 5},$${base + 6})`);
      values.push(
        event.siem_event_id,
        index,
        event.timestamp,
        event.event_type,
        event.ocsf_mapping.severity_id,
        JSON.stringify(event)
      );
    });

    await this.pool.query(
      `INSERT INTO siem_events (siem_event_id, seq, occurred_at, event_type, severity_id, event_json)
       VALUES ${rows.join(",")}
       ON CONFLICT (siem_event_id, seq) DO NOTHING`,
      values
    );
  }

  async getAuditRecord(auditId: string): Promise<AuditRecord | null> {
    const result = await this.pool.query<RecordRow>("SELECT record_json FROM audit_records WHERE audit_id = $1", [auditId]);
    const row = result.rows[0];
    return row ? auditRecordSchema.parse(row.record_json) : null;
  }

  async listSiemEvents(auditId: string): Promise<SiemEvent[]> {
    const result = await this.pool.query<EventRow>(
      "SELECT event_json FROM siem_events WHERE siem_event_id = $1 ORDER BY seq ASC",
      [auditId]
    );
    return result.rows.map((row) => siemEventSchema.parse(row.event_json));
  }
}
