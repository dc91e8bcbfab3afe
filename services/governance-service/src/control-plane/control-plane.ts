import type { Logger } from "pino";
import type { ApprovalGate } from "../approvals/gate";
import type { ApprovalResult } from "../approvals/types";
import type { AuditCorrelator } from "../audit/correlator";
import type { AuditStore } from "../audit/store";
import type { AuditInput, AuditRecord, CorrelatedRecord, JiraReference, RelatedEvent, SiemEvent } from "../audit/types";
import type { BudgetMonitor } from "../budget/monitor";
import type { BudgetAlert, BudgetReport, BudgetState } from "../budget/types";
import { runComplianceChecks } from "../compliance/aggregator";
import { buildComplianceChecks, type ComplianceCatalogDeps } from "../compliance/checks";
import { failureReasons } from "../compliance/score";
import type { ComplianceReport } from "../compliance/types";
import { InvalidRequestError } from "../errors";
import { logger as rootLogger } from "../logger";
import type { ComplianceOutcome, SeverityName } from "../ocsf/mapper";
import { now } from "../support/determinism";
import { describeError, throwIfAborted } from "../support/timeout";
import { evaluateTierPolicy } from "../tiers/evaluator";
import type { RequiredControls, TierPolicyDocument } from "../tiers/types";
import { actionRequestSchema, budgetResetSchema, type ActionRequest } from "./request";

export type Decision = "allow" | "warn" | "deny";

export type ActionDecision = {
  decision: Decision;
  reasons: string[];
  audit_id: string;
  siem_event_ids: string[];
  compliance_report: ComplianceReport;
  required_controls: RequiredControls;
  budget: BudgetState | null;
  budget_alerts: BudgetAlert[];
};

export type BudgetResetResult = {
  audit_id: string;
  state: BudgetState;
};

export type AuditTrail = {
  audit: AuditRecord;
  siem_events: SiemEvent[];
};

export type InvocationOptions = {
  signal?: AbortSignal;
  traceId?: string;
  logger?: Logger;
};

export type ControlPlaneDeps = {
  tierPolicy: () => TierPolicyDocument;
  approvals: ApprovalGate;
  compliance: ComplianceCatalogDeps;
  checkTimeoutMs: number;
  budget: BudgetMonitor;
  correlator: AuditCorrelator;
  auditStore: AuditStore;
  logger?: Logger;
};

export type ControlPlane = {
  handleAction: (request: unknown, options?: InvocationOptions) => Promise<ActionDecision>;
  resetBudget: (agentId: string, request: unknown, options?: InvocationOptions) => Promise<BudgetResetResult>;
  getAuditTrail: (auditId: string) => Promise<AuditTrail | null>;
  budgetReport: (agentId: string) => Promise<BudgetReport>;
};

const OUTCOME_BY_DECISION: Record<Decision, ComplianceOutcome> = {
  allow: "pass",
  warn: "warning",
  deny: "fail"
};

const SEVERITY_BY_DECISION: Record<Decision, SeverityName> = {
  allow: "info",
  warn: "low",
  deny: "medium"
};

function jiraReference(request: ActionRequest, approval: ApprovalResult | null): JiraReference | null {
  const changeRequest = approval?.change_request ?? null;
  if (changeRequest) {
    return {
      cr_id: changeRequest.cr_id,
      approver_role: changeRequest.approver_role,
      status: changeRequest.status
    };
  }
  if (request.cr_id) {
    return { cr_id: request.cr_id, approver_role: null, status: "Unverified" };
  }
  return null;
}

function controlsChecked(controls: RequiredControls, report: ComplianceReport): string[] {
  return Array.from(new Set([...controls.mitigations, ...report.checks.map((check) => check.control_id)]));
}

function budgetEvent(alert: BudgetAlert): RelatedEvent {
  const compliance_result: ComplianceOutcome =
    alert.level === "critical" ? "fail" : alert.level === "warning" ? "warning" : "pass";
  return {
    event_type: "budget_threshold",
    control_id: "MI-021",
    compliance_result,
    severity: alert.severity_id,
    payload: {
      threshold_percent: alert.threshold,
      level: alert.level,
      cumulative_cost: alert.cumulative_cost,
      limit: alert.limit,
      breaker_opened: alert.breaker_opened,
      message: alert.message
    }
  };
}

/**
 * Runs one action request through tier policy, approval, compliance and the
 * budget breaker, then records the outcome. Every valid request is audited,
 * whatever its decision; a request that cannot be audited has no decision.
 */
export function createControlPlane(deps: ControlPlaneDeps): ControlPlane {
  const baseLogger = deps.logger ?? rootLogger;

  const refundCharge = async (agentId: string, cost: number, at: Date, log: Logger, cause: unknown) => {
    try {
      await deps.budget.refund(agentId, cost, at);
    } catch (error) {
      log.error(
        { agentId, cost, cause: describeError(cause), error: describeError(error) },
        "Budget charge could not be refunded after an unrecorded decision"
      );
    }
  };

  const handleAction: ControlPlane["handleAction"] = async (raw, options) => {
    const log = options?.logger ?? baseLogger;
    const parsed = actionRequestSchema.safeParse(raw);
    if (!parsed.success) {
      throw InvalidRequestError.fromZodIssues(parsed.error.issues);
    }
    const request = parsed.data;

    const evaluation = evaluateTierPolicy(deps.tierPolicy(), request);
    if (!evaluation.ok) {
      throw new InvalidRequestError(evaluation.error.message, [`${evaluation.error.kind}: ${evaluation.error.message}`]);
    }
    const controls = evaluation.controls;

    const reasons: string[] = [];
    let deny = false;
    let warn = false;

    if (controls.prohibited_reason) {
      deny = true;
      reasons.push(controls.prohibited_reason);
    }

    let approval: ApprovalResult | null = null;
    if (!deny && controls.requires_approval) {
      approval = await deps.approvals.check(
        controls,
        { cr_id: request.cr_id ?? null, agent_id: request.agent_id },
        { signal: options?.signal }
      );
      if (approval.outcome === "denied") {
        deny = true;
        reasons.push(approval.reason);
      }
    }

    const report = await runComplianceChecks(
      buildComplianceChecks(deps.compliance, controls),
      { agent_id: request.agent_id, controls },
      { timeoutMs: deps.checkTimeoutMs, signal: options?.signal, logger: log }
    );
    if (report.overall_result === "fail" && !controls.prohibited_reason) {
      if (controls.violation_mode === "blocking") {
        deny = true;
        reasons.push(...failureReasons(report));
      } else {
        warn = true;
        reasons.push(...failureReasons(report).map((reason) => `advisory: ${reason}`));
      }
    }

    let budget: BudgetState | null = null;
    let alerts: BudgetAlert[] = [];
    let chargedAt: Date | null = null;
    if (!deny) {
      throwIfAborted("action decision", options?.signal);
      const at = now();
      const charge = await deps.budget.charge(request.agent_id, request.cost_estimate, at);
      budget = charge.state;
      if (charge.accepted) {
        chargedAt = at;
        alerts = charge.alerts;
        if (alerts.length) {
          warn = true;
          reasons.push(...alerts.map((alert) => alert.message));
        }
      } else {
        deny = true;
        reasons.push(charge.reason);
      }
    } else {
      // The breaker vetoes even after an earlier deny.
      const standing = await deps.budget.check(request.agent_id, now());
      if (!standing.allowed) {
        reasons.push(standing.reason);
      }
    }

    const decision: Decision = deny ? "deny" : warn ? "warn" : "allow";

    const auditInput: AuditInput = {
      actor: request.actor ?? request.agent_id,
      action: `${request.action_class}:${request.environment}`,
      workflow_step: "action_decision",
      agent_id: request.agent_id,
      tier: controls.tier,
      control_id: "MI-020",
      event_type: "action_decision",
      severity: SEVERITY_BY_DECISION[decision],
      jira_reference: jiraReference(request, approval),
      inputs: {
        agent_id: request.agent_id,
        tier: request.tier,
        environment: request.environment,
        action_class: request.action_class,
        cr_id: request.cr_id ?? null,
        cost_estimate: request.cost_estimate,
        ...(request.inputs ? { context: request.inputs } : {})
      },
      outputs: {
        decision,
        reasons,
        compliance_score: report.score,
        compliance_overall: report.overall_result,
        budget_cumulative_cost: budget?.cumulative_cost ?? null,
        breaker: budget?.breaker ?? null
      },
      policy_controls_checked: controlsChecked(controls, report),
      compliance_result: OUTCOME_BY_DECISION[decision],
      compliance_report: report,
      trace_id: options?.traceId
    };

    let recorded: CorrelatedRecord;
    try {
      recorded = await deps.correlator.record(auditInput, { signal: options?.signal, related: alerts.map(budgetEvent) });
    } catch (error) {
      // The decision never happened, so its charge is taken back.
      if (chargedAt) {
        await refundCharge(request.agent_id, request.cost_estimate, chargedAt, log, error);
      }
      throw error;
    }
    const { audit, siem_events } = recorded;

    log.info(
      { auditId: audit.audit_id, agentId: request.agent_id, decision, reasonCount: reasons.length },
      "Action decision recorded"
    );

    return {
      decision,
      reasons,
      audit_id: audit.audit_id,
      siem_event_ids: siem_events.map((event) => event.siem_event_id),
      compliance_report: report,
      required_controls: controls,
      budget,
      budget_alerts: alerts
    };
  };

  const resetBudget: ControlPlane["resetBudget"] = async (agentId, raw, options) => {
    const parsed = budgetResetSchema.safeParse(raw);
    if (!parsed.success) {
      throw InvalidRequestError.fromZodIssues(parsed.error.issues);
    }
    const at = now();
    const before = await deps.budget.check(agentId, at);

    // The reset is only applied once its audit record is durable.
    const { audit } = await deps.correlator.record(
      {
        actor: parsed.data.actor,
        action: "budget_reset",
        workflow_step: "budget_reset",
        agent_id: agentId,
        tier: null,
        control_id: "MI-021",
        event_type: "budget_reset",
        jira_reference: null,
        inputs: { agent_id: agentId, reason: parsed.data.reason },
        outputs: {
          previous_cumulative_cost: before.state.cumulative_cost,
          previous_breaker: before.state.breaker,
          cumulative_cost: 0,
          breaker: "closed"
        },
        policy_controls_checked: ["MI-021"],
        compliance_result: "pass",
        trace_id: options?.traceId
      },
      { signal: options?.signal }
    );

    const state = await deps.budget.reset(agentId, at);
    (options?.logger ?? baseLogger).info({ auditId: audit.audit_id, agentId }, "Budget reset");
    return { audit_id: audit.audit_id, state };
  };

  const getAuditTrail: ControlPlane["getAuditTrail"] = async (auditId) => {
    const audit = await deps.auditStore.getAuditRecord(auditId);
    if (!audit) {
      return null;
    }
    return { audit, siem_events: await deps.auditStore.listSiemEvents(auditId) };
  };

  const budgetReport: ControlPlane["budgetReport"] = async (agentId) => deps.budget.report(agentId, now());

  return { handleAction, resetBudget, getAuditTrail, budgetReport };
}
