import pino from "pino";
import { afterEach, beforeEach, expect, test } from "vitest";
import { createAuditCorrelator } from "../src/audit/correlator";
import { buildEvidenceHash } from "../src/audit/hash";
import type { AuditStore } from "../src/audit/store";
import { InMemoryAuditStore } from "../src/audit/store.memory";
import type { AuditInput, AuditRecord, SiemEvent } from "../src/audit/types";
import { buildComplianceReport } from "../src/compliance/score";
import { AuditWriteFailure } from "../src/errors";
import { InMemoryMetricsSink } from "../src/siem/sink";
import { configureDeterminism, resetDeterminism } from "../src/support/determinism";

const silent = pino({ level: "silent" });

function input(overrides: Partial<AuditInput> = {}): AuditInput {
  return {
    actor: "security-agent",
    action: "deploy:prod",
    workflow_step: "action_decision",
    agent_id: "security-agent",
    tier: 3,
    control_id: "MI-020",
    event_type: "action_decision",
    severity: "info",
    jira_reference: { cr_id: "CR-2025-1042", approver_role: "Change Manager", status: "Approved" },
    inputs: { tier: 3, environment: "prod" },
    outputs: { decision: "allow" },
    policy_controls_checked: ["MI-020"],
    compliance_result: "pass",
    ...overrides
  };
}

class RecordingStore implements AuditStore {
  readonly calls: string[] = [];
  readonly inner = new InMemoryAuditStore();

  constructor(private readonly failures: { audit?: Error; siem?: Error; hang?: boolean } = {}) {}

  async appendAuditRecord(record: AuditRecord): Promise<void> {
    this.calls.push(`audit:${record.audit_id}`);
    if (this.failures.hang) {
      return new Promise<void>(() => undefined);
    }
    if (this.failures.audit) {
      throw this.failures.audit;
    }
    await this.inner.appendAuditRecord(record);
  }

  async appendSiemEvents(events: SiemEvent[]): Promise<void> {
    this.calls.push(`siem:${events.length}`);
    if (this.failures.siem) {
      throw this.failures.siem;
    }
    await this.inner.appendSiemEvents(events);
  }

  getAuditRecord(auditId: string): Promise<AuditRecord | null> {
    return this.inner.getAuditRecord(auditId);
  }

  listSiemEvents(auditId: string): Promise<SiemEvent[]> {
    return this.inner.listSiemEvents(auditId);
  }
}

beforeEach(() => {
  configureDeterminism({ start: new Date("2025-01-15T10:00:00.000Z"), idPrefix: "audit" });
});

afterEach(() => {
  resetDeterminism();
});

test("writes the audit record before its correlated SIEM events", async () => {
  const store = new RecordingStore();
  const sink = new InMemoryMetricsSink();
  const correlator = createAuditCorrelator({ store, sink, writeTimeoutMs: 1_000, auditorAgent: "governance-control-plane", logger: silent });

  const { audit, siem_events } = await correlator.record(input());

  expect(audit.audit_id).toBe("audit-0001");
  expect(audit.timestamp).toBe("2025-01-15T10:00:00.000Z");
  expect(audit.auditor_agent).toBe("governance-control-plane");
  expect(audit.evidence_hash).toBe(
    buildEvidenceHash({ inputs: { tier: 3, environment: "prod" }, outputs: { decision: "allow" }, timestamp: audit.timestamp })
  );
  expect(store.calls).toEqual(["audit:audit-0001", "siem:1"]);
  expect(siem_events).toHaveLength(1);
  expect(siem_events[0]).toMatchObject({
    siem_event_id: "audit-0001",
    timestamp: "2025-01-15T10:00:00.000Z",
    source: "agent-runtime",
    event_type: "action_decision",
    ocsf_mapping: { category_uid: 6, class_uid: 6003, severity_id: 1, activity_id: 1 },
    jira_reference: { cr_id: "CR-2025-1042", approver_role: "Change Manager", status: "Approved" },
    metadata: { correlation_id: "audit-0001" }
  });
  expect(sink.published).toEqual(siem_events);
  await expect(store.getAuditRecord("audit-0001")).resolves.toEqual(audit);
});

test("failed checks and related events share the audit id", async () => {
  const store = new RecordingStore();
  const correlator = createAuditCorrelator({
    store,
    sink: new InMemoryMetricsSink(),
    writeTimeoutMs: 1_000,
    auditorAgent: "governance-control-plane",
    logger: silent
  });
  const report = buildComplianceReport(
    [
      { control_id: "AU-002", check_name: "CloudTrail logging", status: "pass", details: "trail is logging", resource_ref: "org-trail" },
      { control_id: "SC-028", check_name: "S3 encryption", status: "fail", details: "default encryption missing", resource_ref: "audit-logs" }
    ],
    "report-1"
  );

  const { siem_events } = await correlator.record(input({ compliance_result: "fail", severity: "medium", compliance_report: report }), {
    related: [
      { event_type: "budget_threshold", control_id: "MI-021", compliance_result: "fail", severity: 5, payload: { threshold_percent: 90 } }
    ]
  });

  expect(siem_events.map((event) => [event.event_type, event.control_id, event.ocsf_mapping.severity_id])).toEqual([
    ["action_decision", "MI-020", 4],
    ["compliance_check", "SC-028", 4],
    ["budget_threshold", "MI-021", 5]
  ]);
  expect(new Set(siem_events.map((event) => event.siem_event_id))).toEqual(new Set(["audit-0001"]));
  expect(siem_events[1].payload).toEqual({
    check_name: "S3 encryption",
    details: "default encryption missing",
    resource_ref: "audit-logs",
    report_id: "report-1"
  });
  await expect(store.listSiemEvents("audit-0001")).resolves.toHaveLength(3);
});

test("a failed audit write emits no SIEM events", async () => {
  const store = new RecordingStore({ audit: new Error("disk full") });
  const sink = new InMemoryMetricsSink();
  const correlator = createAuditCorrelator({ store, sink, writeTimeoutMs: 1_000, auditorAgent: "auditor", logger: silent });

  const error = await correlator.record(input()).catch((caught: unknown) => caught);

  expect(error).toBeInstanceOf(AuditWriteFailure);
  expect(error).toMatchObject({ auditId: "audit-0001", statusCode: 503 });
  expect(store.calls).toEqual(["audit:audit-0001"]);
  expect(sink.published).toEqual([]);
});

test("a write that outlives its deadline fails the invocation", async () => {
  const store = new RecordingStore({ hang: true });
  const correlator = createAuditCorrelator({
    store,
    sink: new InMemoryMetricsSink(),
    writeTimeoutMs: 20,
    auditorAgent: "auditor",
    logger: silent
  });
  await expect(correlator.record(input())).rejects.toThrow("Audit record audit-0001 could not be written: audit write timed out after 20ms");
  expect(store.calls).toEqual(["audit:audit-0001"]);
});

test("a cancelled invocation writes nothing", async () => {
  const store = new RecordingStore();
  const correlator = createAuditCorrelator({ store, sink: new InMemoryMetricsSink(), writeTimeoutMs: 1_000, auditorAgent: "auditor", logger: silent });
  const controller = new AbortController();
  controller.abort();

  await expect(correlator.record(input(), { signal: controller.signal })).rejects.toThrow("audit write aborted");
  expect(store.calls).toEqual([]);
});

test("a SIEM store failure after a durable audit record is logged, not thrown", async () => {
  const store = new RecordingStore({ siem: new Error("siem table locked") });
  const sink = new InMemoryMetricsSink();
  const correlator = createAuditCorrelator({ store, sink, writeTimeoutMs: 1_000, auditorAgent: "auditor", logger: silent });

  const { audit, siem_events } = await correlator.record(input());

  await expect(store.getAuditRecord(audit.audit_id)).resolves.toEqual(audit);
  expect(sink.published).toEqual(siem_events);
});

test("a failing metrics sink does not fail the invocation", async () => {
  const correlator = createAuditCorrelator({
    store: new RecordingStore(),
    sink: {
      publish: async () => {
        throw new Error("broker down");
      }
    },
    writeTimeoutMs: 1_000,
    auditorAgent: "auditor",
    logger: silent
  });
  await expect(correlator.record(input())).resolves.toMatchObject({ audit: { audit_id: "audit-0001" } });
});
