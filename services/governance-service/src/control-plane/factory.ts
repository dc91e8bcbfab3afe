import type { Logger } from "pino";
import { createApprovalGate } from "../approvals/gate";
import { JiraChangeRequestTracker } from "../approvals/jira-tracker";
import { InMemoryChangeRequestTracker, type ChangeRequestTracker } from "../approvals/tracker";
import { createAuditCorrelator } from "../audit/correlator";
import { createAuditStore, type AuditStore } from "../audit/store";
import { createBudgetMonitor } from "../budget/monitor";
import { createBudgetStore, type BudgetStore } from "../budget/store";
import { AwsResourceInspector } from "../compliance/aws-inspector";
import type { CloudResourceInspector } from "../compliance/inspector";
import { FileThreatModelRegistry, type ThreatModelRegistry } from "../compliance/threat-models";
import { config } from "../config";
import { logger as rootLogger } from "../logger";
import { KafkaMetricsSink } from "../siem/sink.kafka";
import { NoopMetricsSink, type MetricsSink } from "../siem/sink";
import { createTierPolicyLoader, type TierPolicyLoader } from "../tiers/loader";
import { createControlPlane, type ControlPlane } from "./control-plane";

export type ControlPlaneOverrides = {
  tracker?: ChangeRequestTracker;
  inspector?: CloudResourceInspector | null;
  threatModels?: ThreatModelRegistry;
  auditStore?: AuditStore;
  budgetStore?: BudgetStore;
  sink?: MetricsSink;
  tierPolicy?: TierPolicyLoader;
  logger?: Logger;
};

export type ControlPlaneRuntime = {
  controlPlane: ControlPlane;
  tierPolicy: TierPolicyLoader;
  close: () => Promise<void>;
};

function defaultTracker(log: Logger): ChangeRequestTracker {
  const { jiraUrl, jiraUser, jiraToken } = config.approvals;
  if (jiraUrl) {
    return new JiraChangeRequestTracker({ baseUrl: jiraUrl, user: jiraUser, token: jiraToken });
  }
  log.warn({ traceId: "system" }, "JIRA_URL not set; change requests resolve from an empty in-memory tracker");
  return new InMemoryChangeRequestTracker();
}

function defaultSink(): MetricsSink {
  if (!config.metricsSink.enabled) {
    return new NoopMetricsSink();
  }
  return new KafkaMetricsSink({
    clientId: config.serviceName,
    brokers: config.metricsSink.brokers,
    topic: config.metricsSink.topic
  });
}

/** Wires the control plane from configuration; tests substitute collaborators. */
export function createControlPlaneRuntime(overrides: ControlPlaneOverrides = {}): ControlPlaneRuntime {
  const log = overrides.logger ?? rootLogger;
  const tierPolicy =
    overrides.tierPolicy ?? createTierPolicyLoader({ policyPath: config.tierPolicyPath, handleSignals: false, logger: log });
  const auditStore = overrides.auditStore ?? createAuditStore();
  const sink = overrides.sink ?? defaultSink();
  const inspector =
    overrides.inspector !== undefined
      ? overrides.inspector
      : config.compliance.awsEnabled
        ? new AwsResourceInspector({ region: config.compliance.awsRegion, profile: config.compliance.awsProfile })
        : null;

  const controlPlane = createControlPlane({
    tierPolicy: () => tierPolicy.getSnapshot().policy,
    approvals: createApprovalGate({
      tracker: overrides.tracker ?? defaultTracker(log),
      timeoutMs: config.approvals.timeoutMs,
      logger: log
    }),
    compliance: {
      threatModels: overrides.threatModels ?? new FileThreatModelRegistry(config.compliance.threatModelDir),
      budgetLimits: { daily: config.budget.dailyLimit, monthly: config.budget.monthlyLimit },
      inspector,
      resources: config.compliance.resources
    },
    checkTimeoutMs: config.compliance.checkTimeoutMs,
    budget: createBudgetMonitor({
      store: overrides.budgetStore ?? createBudgetStore(),
      limits: { daily: config.budget.dailyLimit, monthly: config.budget.monthlyLimit },
      period: config.budget.period
    }),
    correlator: createAuditCorrelator({
      store: auditStore,
      sink,
      writeTimeoutMs: config.audit.writeTimeoutMs,
      auditorAgent: config.auditorAgent,
      logger: log
    }),
    auditStore,
    logger: log
  });

  return {
    controlPlane,
    tierPolicy,
    close: async () => {
      if (sink.close) {
        await sink.close();
      }
    }
  };
}
