import dotenv from "dotenv";

dotenv.config();

export type BudgetPeriodUnit = "day" | "month";

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (value.toLowerCase() === "true") {
    return true;
  }
  if (value.toLowerCase() === "false") {
    return false;
  }
  return fallback;
}

function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function parseBudgetPeriod(value: string | undefined, fallback: BudgetPeriodUnit): BudgetPeriodUnit {
  if (!value) {
    return fallback;
  }
  const normalized = value.toLowerCase();
  if (normalized === "day" || normalized === "month") {
    return normalized;
  }
  return fallback;
}

export const config = {
  port: Number(process.env.PORT ?? 3010),
  serviceName: process.env.SERVICE_NAME ?? "governance-service",
  logLevel: process.env.LOG_LEVEL ?? "info",
  useInMemoryStore: process.env.USE_INMEMORY_STORE === "true",
  auditorAgent: process.env.AUDITOR_AGENT ?? "governance-control-plane",
  budget: {
    dailyLimit: parseNumber(process.env.DAILY_COST_BUDGET, 50),
    monthlyLimit: parseNumber(process.env.MONTHLY_COST_BUDGET, 500),
    period: parseBudgetPeriod(process.env.BUDGET_PERIOD, "day")
  },
  approvals: {
    jiraUrl: process.env.JIRA_URL ?? "",
    jiraUser: process.env.JIRA_USER ?? "",
    jiraToken: process.env.JIRA_TOKEN ?? "",
    timeoutMs: parseNumber(process.env.APPROVAL_TIMEOUT_MS, 10_000)
  },
  compliance: {
    checkTimeoutMs: parseNumber(process.env.CHECK_TIMEOUT_MS, 5_000),
    threatModelDir: process.env.THREAT_MODEL_DIR ?? "workflows/threat-modeling/reports",
    awsEnabled: parseBoolean(process.env.AWS_INSPECTOR_ENABLED, false),
    awsRegion: process.env.AWS_REGION ?? "us-east-1",
    awsProfile: process.env.AWS_PROFILE,
    resources: {
      buckets: parseList(process.env.COMPLIANCE_S3_BUCKETS),
      kmsKeys: parseList(process.env.COMPLIANCE_KMS_KEYS),
      trails: parseList(process.env.COMPLIANCE_TRAILS),
      iamRoles: parseList(process.env.COMPLIANCE_IAM_ROLES),
      secrets: parseList(process.env.COMPLIANCE_SECRETS)
    }
  },
  audit: {
    writeTimeoutMs: parseNumber(process.env.AUDIT_WRITE_TIMEOUT_MS, 5_000)
  },
  tierPolicyPath: process.env.TIER_POLICY_PATH,
  telemetry: {
    enabled: parseBoolean(process.env.OTEL_ENABLED, true),
    consoleSpans: parseBoolean(process.env.OTEL_CONSOLE_SPANS, false)
  },
  metricsSink: {
    enabled: parseBoolean(process.env.METRICS_SINK_ENABLED, false),
    brokers: parseList(process.env.BROKER_BROKERS ?? "localhost:9092"),
    topic: process.env.SIEM_TOPIC ?? "governance.siem.events"
  },
  db: {
    host: process.env.DB_HOST ?? "localhost",
    port: Number(process.env.DB_PORT ?? 5432),
    user: process.env.DB_USER ?? "governance",
    password: process.env.DB_PASSWORD ?? "governance",
    database: process.env.DB_NAME ?? "governance"
  }
};
