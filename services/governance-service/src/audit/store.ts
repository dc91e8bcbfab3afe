import { config } from "../config";
import { InMemoryAuditStore } from "./store.memory";
import { PostgresAuditStore } from "./store.pg";
import type { AuditRecord, SiemEvent } from "./types";

export type AuditStore = {
  appendAuditRecord: (record: AuditRecord) => Promise<void>;
  appendSiemEvents: (events: SiemEvent[]) => Promise<void>;
  getAuditRecord: (auditId: string) => Promise<AuditRecord | null>;
  listSiemEvents: (auditId: string) => Promise<SiemEvent[]>;
};

// Audit writes never fall back to memory: a record that did not reach the
// durable store must surface as a failed invocation.
export function createAuditStore(): AuditStore {
  if (config.useInMemoryStore) {
    return new InMemoryAuditStore();
  }
  return new PostgresAuditStore();
}
