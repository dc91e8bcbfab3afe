import type { AuditStore } from "./store";
import type { AuditRecord, SiemEvent } from "./types";

export class AuditRecordConflictError extends Error {
  constructor(public readonly auditId: string) {
    super(`Audit record ${auditId} already exists`);
    this.name = "AuditRecordConflictError";
  }
}

export class InMemoryAuditStore implements AuditStore {
  private readonly records = new Map<string, AuditRecord>();
  private readonly events = new Map<string, SiemEvent[]>();

  async appendAuditRecord(record: AuditRecord): Promise<void> {
    if (this.records.has(record.audit_id)) {
      throw new AuditRecordConflictError(record.audit_id);
    }
    this.records.set(record.audit_id, structuredClone(record));
  }

  async appendSiemEvents(events: SiemEvent[]): Promise<void> {
    events.forEach((event) => {
      const existing = this.events.get(event.siem_event_id) ?? [];
      existing.push(structuredClone(event));
      this.events.set(event.siem_event_id, existing);
    });
  }

  async getAuditRecord(auditId: string): Promise<AuditRecord | null> {
    const record = this.records.get(auditId);
    return record ? structuredClone(record) : null;
  }

  async listSiemEvents(auditId: string): Promise<SiemEvent[]> {
    return (this.events.get(auditId) ?? []).map((event) => structuredClone(event));
  }
}
