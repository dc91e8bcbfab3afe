import type { z } from "zod";
import type { ComplianceReport } from "../compliance/types";
import type { ComplianceOutcome, SeverityId, SeverityName, SiemEventType } from "../ocsf/mapper";
import type { auditRecordSchema, jiraReferenceSchema, siemEventSchema } from "./schema";

export type JiraReference = z.infer<typeof jiraReferenceSchema>;
export type AuditRecord = z.infer<typeof auditRecordSchema>;
export type SiemEvent = z.infer<typeof siemEventSchema>;

export type AuditInput = {
  actor: string;
  action: string;
  workflow_step: string;
  agent_id: string;
  tier: number | null;
  control_id: string;
  event_type: SiemEventType;
  severity?: SeverityName | SeverityId;
  jira_reference: JiraReference | null;
  inputs: Record<string, unknown>;
  outputs: Record<string, unknown>;
  policy_controls_checked: string[];
  compliance_result: ComplianceOutcome;
  compliance_report?: ComplianceReport | null;
  trace_id?: string;
};

/** An additional SIEM event correlated with the same audit record. */
export type RelatedEvent = {
  event_type: SiemEventType;
  control_id: string;
  compliance_result: ComplianceOutcome;
  severity?: SeverityName | SeverityId;
  payload: Record<string, unknown>;
};

export type CorrelatedRecord = {
  audit: AuditRecord;
  siem_events: SiemEvent[];
};
