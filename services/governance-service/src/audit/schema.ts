import { z } from "zod";
import { SIEM_EVENT_TYPES, SIEM_SOURCES } from "../ocsf/mapper";

export const complianceOutcomeSchema = z.enum(["pass", "fail", "warning"]);

export const jiraReferenceSchema = z.object({
  cr_id: z.string().min(1),
  approver_role: z.string().nullable(),
  status: z.string().min(1)
});

export const auditRecordSchema = z.object({
  audit_id: z.string().min(1),
  timestamp: z.string().datetime(),
  actor: z.string().min(1),
  action: z.string().min(1),
  workflow_step: z.string().min(1),
  jira_reference: jiraReferenceSchema.nullable(),
  inputs: z.record(z.unknown()),
  outputs: z.record(z.unknown()),
  policy_controls_checked: z.array(z.string()),
  compliance_result: complianceOutcomeSchema,
  evidence_hash: z.string().regex(/^sha256:[0-9a-f]{64}$/),
  auditor_agent: z.string().min(1),
  trace_id: z.string().optional()
});

export const ocsfMappingSchema = z.object({
  category_uid: z.number().int().positive(),
  class_uid: z.number().int().positive(),
  severity_id: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5)]),
  activity_id: z.number().int().nonnegative()
});

export const siemEventSchema = z.object({
  siem_event_id: z.string().min(1),
  timestamp: z.string().datetime(),
  source: z.enum(SIEM_SOURCES),
  event_type: z.enum(SIEM_EVENT_TYPES),
  control_id: z.string().min(1),
  agent_id: z.string().min(1),
  tier: z.number().int().min(1).max(4).nullable(),
  ocsf_mapping: ocsfMappingSchema,
  payload: z.record(z.unknown()),
  compliance_result: complianceOutcomeSchema,
  jira_reference: jiraReferenceSchema.nullable(),
  metadata: z.object({
    correlation_id: z.string().min(1),
    trace_id: z.string().optional()
  })
});
