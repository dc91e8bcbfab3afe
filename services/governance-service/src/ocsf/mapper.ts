export const OCSF_CATEGORIES = {
  system: 1,
  findings: 2,
  iam: 3,
  network: 4,
  discovery: 5,
  application: 6
} as const;

export const OCSF_CLASSES = {
  authentication: 3001,
  account_change: 3005,
  compliance_finding: 2001,
  detection_finding: 2004,
  api_activity: 6003,
  web_activity: 6004
} as const;

export const OCSF_SEVERITY = {
  info: 1,
  low: 2,
  medium: 3,
  high: 4,
  critical: 5
} as const;

export type OcsfCategory = keyof typeof OCSF_CATEGORIES;
export type OcsfClass = keyof typeof OCSF_CLASSES;
export type SeverityName = keyof typeof OCSF_SEVERITY;
export type SeverityId = (typeof OCSF_SEVERITY)[SeverityName];

export const SIEM_SOURCES = ["audit-trail", "infra", "agent-runtime", "jira"] as const;
export type SiemSource = (typeof SIEM_SOURCES)[number];

export const SIEM_EVENT_TYPES = [
  "compliance_check",
  "security_finding",
  "iam_change",
  "api_call",
  "authentication",
  "resource_access",
  "approval_decision",
  "action_decision",
  "budget_threshold",
  "budget_reset"
] as const;
export type SiemEventType = (typeof SIEM_EVENT_TYPES)[number];

export type ComplianceOutcome = "pass" | "fail" | "warning";

export type OcsfMapping = {
  category_uid: number;
  class_uid: number;
  severity_id: SeverityId;
  activity_id: number;
};

type EventTypeMapping = {
  category: OcsfCategory;
  class: OcsfClass;
  activity_id: number;
  default_severity: SeverityName;
  source: SiemSource;
};

// activity ids: 1 create, 2 read, 3 update
const EVENT_TYPES = {
  compliance_check: { category: "findings", class: "compliance_finding", activity_id: 1, default_severity: "info", source: "audit-trail" },
  security_finding: { category: "findings", class: "detection_finding", activity_id: 2, default_severity: "medium", source: "infra" },
  iam_change: { category: "iam", class: "account_change", activity_id: 3, default_severity: "medium", source: "infra" },
  api_call: { category: "application", class: "api_activity", activity_id: 1, default_severity: "info", source: "agent-runtime" },
  authentication: { category: "iam", class: "authentication", activity_id: 1, default_severity: "info", source: "jira" },
  resource_access: { category: "application", class: "api_activity", activity_id: 2, default_severity: "info", source: "infra" },
  approval_decision: { category: "iam", class: "authentication", activity_id: 1, default_severity: "info", source: "jira" },
  action_decision: { category: "application", class: "api_activity", activity_id: 1, default_severity: "info", source: "agent-runtime" },
  budget_threshold: { category: "findings", class: "detection_finding", activity_id: 1, default_severity: "info", source: "agent-runtime" },
  budget_reset: { category: "application", class: "api_activity", activity_id: 3, default_severity: "low", source: "audit-trail" }
} satisfies Record<SiemEventType, EventTypeMapping>;

export function clampSeverity(value: number): SeverityId {
  if (value <= 1) {
    return 1;
  }
  if (value >= 5) {
    return 5;
  }
  switch (Math.round(value)) {
    case 2:
      return 2;
    case 3:
      return 3;
    default:
      return 4;
  }
}

export function sourceFor(eventType: SiemEventType): SiemSource {
  return EVENT_TYPES[eventType].source;
}

/**
 * Resolves the OCSF identifiers for an event. A failing result raises the
 * severity one step above the given (or default) level.
 */
export function mapOcsf(eventType: SiemEventType, complianceResult: ComplianceOutcome, severity?: SeverityName | SeverityId): OcsfMapping {
  const entry: EventTypeMapping = EVENT_TYPES[eventType];
  const base = severity === undefined ? OCSF_SEVERITY[entry.default_severity] : typeof severity === "number" ? severity : OCSF_SEVERITY[severity];
  return {
    category_uid: OCSF_CATEGORIES[entry.category],
    class_uid: OCSF_CLASSES[entry.class],
    severity_id: clampSeverity(complianceResult === "fail" ? base + 1 : base),
    activity_id: entry.activity_id
  };
}
