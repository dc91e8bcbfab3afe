import type { Logger } from "pino";
import { AuditWriteFailure } from "../errors";
import { logger as rootLogger } from "../logger";
import { mapOcsf, sourceFor } from "../ocsf/mapper";
import type { MetricsSink } from "../siem/sink";
import { generateId, now } from "../support/determinism";
import { describeError, throwIfAborted, withTimeout } from "../support/timeout";
import { buildEvidenceHash } from "./hash";
import { auditRecordSchema, siemEventSchema } from "./schema";
import type { AuditStore } from "./store";
import type { AuditInput, AuditRecord, CorrelatedRecord, RelatedEvent, SiemEvent } from "./types";

export type AuditCorrelatorOptions = {
  store: AuditStore;
  sink: MetricsSink;
  writeTimeoutMs: number;
  auditorAgent: string;
  logger?: Logger;
};

export type RecordOptions = {
  signal?: AbortSignal;
  related?: RelatedEvent[];
};

export type AuditCorrelator = {
  record: (input: AuditInput, options?: RecordOptions) => Promise<CorrelatedRecord>;
};

function buildEvent(record: AuditRecord, input: AuditInput, event: RelatedEvent): SiemEvent {
  return siemEventSchema.parse({
    siem_event_id: record.audit_id,
    timestamp: record.timestamp,
    source: sourceFor(event.event_type),
    event_type: event.event_type,
    control_id: event.control_id,
    agent_id: input.agent_id,
    tier: input.tier,
    ocsf_mapping: mapOcsf(event.event_type, event.compliance_result, event.severity),
    payload: event.payload,
    compliance_result: event.compliance_result,
    jira_reference: record.jira_reference,
    metadata: {
      correlation_id: record.audit_id,
      ...(input.trace_id ? { trace_id: input.trace_id } : {})
    }
  });
}

/** Primary event for the step, then one finding per failed check, then related events. */
export function deriveSiemEvents(record: AuditRecord, input: AuditInput, related: RelatedEvent[] = []): SiemEvent[] {
  const primary: RelatedEvent = {
    event_type: input.event_type,
    control_id: input.control_id,
    compliance_result: input.compliance_result,
    severity: input.severity,
    payload: {
      workflow_step: record.workflow_step,
      action: record.action,
      actor: record.actor,
      outputs: record.outputs,
      evidence_hash: record.evidence_hash
    }
  };

  const findings: RelatedEvent[] = (input.compliance_report?.checks ?? [])
    .filter((check) => check.status === "fail")
    .map((check): RelatedEvent => ({
      event_type: "compliance_check",
      control_id: check.control_id,
      compliance_result: "fail",
      severity: "medium",
      payload: {
        check_name: check.check_name,
        details: check.details,
        resource_ref: check.resource_ref,
        report_id: input.compliance_report?.report_id ?? null
      }
    }));

  return [primary, ...findings, ...related].map((event) => buildEvent(record, input, event));
}

export function createAuditCorrelator(options: AuditCorrelatorOptions): AuditCorrelator {
  const log = options.logger ?? rootLogger;

  const publish = (events: SiemEvent[], auditId: string) => {
    void options.sink.publish(events).catch((error: unknown) => {
      log.warn({ auditId, error: describeError(error) }, "Metrics sink publish failed");
    });
  };

  const record: AuditCorrelator["record"] = async (input, recordOptions) => {
    const signal = recordOptions?.signal;
    throwIfAborted("audit write", signal);

    const timestamp = now().toISOString();
    const auditId = generateId();

    let audit: AuditRecord;
    try {
      audit = auditRecordSchema.parse({
        audit_id: auditId,
        timestamp,
        actor: input.actor,
        action: input.action,
        workflow_step: input.workflow_step,
        jira_reference: input.jira_reference,
        inputs: input.inputs,
        outputs: input.outputs,
        policy_controls_checked: input.policy_controls_checked,
        compliance_result: input.compliance_result,
        evidence_hash: buildEvidenceHash({ inputs: input.inputs, outputs: input.outputs, timestamp }),
        auditor_agent: options.auditorAgent,
        ...(input.trace_id ? { trace_id: input.trace_id } : {})
      });
    } catch (error) {
      throw new AuditWriteFailure(auditId, error);
    }

    try {
      await withTimeout("audit write", options.writeTimeoutMs, () => options.store.appendAuditRecord(audit), signal);
    } catch (error) {
      log.error({ auditId, error: describeError(error) }, "Audit record write failed");
      throw new AuditWriteFailure(auditId, error);
    }

    const events = deriveSiemEvents(audit, input, recordOptions?.related);

    try {
      await options.store.appendSiemEvents(events);
    } catch (error) {
      log.error({ auditId, eventCount: events.length, error: describeError(error) }, "SIEM event write failed after audit record");
    }

    publish(events, auditId);
    return { audit, siem_events: events };
  };

  return { record };
}
