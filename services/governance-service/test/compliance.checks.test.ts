import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import { runComplianceChecks } from "../src/compliance/aggregator";
import { buildComplianceChecks } from "../src/compliance/checks";
import type { CloudResourceInspector } from "../src/compliance/inspector";
import { FileThreatModelRegistry, InMemoryThreatModelRegistry } from "../src/compliance/threat-models";
import { defaultTierPolicy } from "../src/tiers/default-policy";
import { evaluateTierPolicy } from "../src/tiers/evaluator";
import type { RequiredControls } from "../src/tiers/types";

function controls(tier: number, environment: string, action_class: string): RequiredControls {
  const result = evaluateTierPolicy(defaultTierPolicy, { tier, environment, action_class });
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.controls;
}

const healthyInspector: CloudResourceInspector = {
  isEncrypted: async () => true,
  blocksPublicAccess: async () => true,
  hasVersioning: async () => true,
  isKeyEnabled: async () => true,
  hasRotationEnabled: async () => true,
  hasScopedKeyPolicy: async () => true,
  isLoggingEnabled: async () => true,
  hasLogValidation: async () => true,
  isTrailEncrypted: async () => true,
  hasScopedRoleResources: async () => true,
  avoidsBroadActions: async () => true,
  usesCustomerManagedKey: async () => true,
  hasSecretRotation: async () => true
};

test("tier 1 reads only run the tier validation check", () => {
  const checks = buildComplianceChecks(
    { threatModels: new InMemoryThreatModelRegistry(), budgetLimits: { daily: 50, monthly: 500 } },
    controls(1, "prod", "read")
  );
  expect(checks.map((check) => check.control_id)).toEqual(["MI-020"]);
});

test("tier 3 in prod adds budget, threat model and cloud resource checks", async () => {
  const cloudControls = controls(3, "prod", "deploy");
  const checks = buildComplianceChecks(
    {
      threatModels: new InMemoryThreatModelRegistry({ "security-agent": "reports/security-agent-threat-model.md" }),
      budgetLimits: { daily: 50, monthly: 500 },
      inspector: { ...healthyInspector, isEncrypted: async () => false },
      resources: {
        buckets: ["audit-logs"],
        kmsKeys: ["alias/agents"],
        trails: ["org-trail"],
        iamRoles: ["agent-runtime"],
        secrets: ["agent-api-key"]
      }
    },
    cloudControls
  );
  expect(checks.map((check) => `${check.control_id} ${check.check_name}`)).toEqual([
    "MI-020 tier validation",
    "MI-021 budget limit configured",
    "TM-001 threat model present",
    "SC-028 KMS key state",
    "SEC-001 KMS rotation",
    "SEC-001 KMS key policy",
    "SC-028 S3 encryption",
    "SEC-002 S3 public access block",
    "AU-009 S3 versioning",
    "AU-002 CloudTrail logging",
    "AU-002 CloudTrail log validation",
    "SC-028 CloudTrail encryption",
    "SEC-001 IAM least privilege",
    "SEC-001 IAM dangerous permissions",
    "SEC-001 Secret encryption",
    "MI-003 Secret rotation"
  ]);

  const report = await runComplianceChecks(checks, { agent_id: "security-agent", controls: cloudControls }, { timeoutMs: 1_000 });
  expect(report).toMatchObject({ passed: 15, failed: 1, warnings: 0, score: 93.8, overall_result: "fail" });
  expect(report.checks[1].details).toBe("daily limit $50.00, monthly limit $500.00");
  expect(report.checks[6]).toEqual({
    control_id: "SC-028",
    check_name: "S3 encryption",
    status: "fail",
    details: "default encryption missing",
    resource_ref: "audit-logs"
  });
});

test("hygiene findings on versioning, roles, secrets and key policies are warnings", async () => {
  const cloudControls = controls(3, "prod", "deploy");
  const checks = buildComplianceChecks(
    {
      threatModels: new InMemoryThreatModelRegistry({ "security-agent": "reports/security-agent-threat-model.md" }),
      budgetLimits: { daily: 50, monthly: 500 },
      inspector: {
        ...healthyInspector,
        hasVersioning: async () => false,
        hasScopedKeyPolicy: async () => false,
        avoidsBroadActions: async () => false,
        hasSecretRotation: async () => false
      },
      resources: {
        buckets: ["audit-logs"],
        kmsKeys: ["alias/agents"],
        trails: [],
        iamRoles: ["agent-runtime"],
        secrets: ["agent-api-key"]
      }
    },
    cloudControls
  );

  const report = await runComplianceChecks(checks, { agent_id: "security-agent", controls: cloudControls }, { timeoutMs: 1_000 });
  expect(report).toMatchObject({ passed: 9, failed: 0, warnings: 4, overall_result: "pass" });
  expect(report.checks.filter((check) => check.status === "warning").map((check) => [check.check_name, check.details])).toEqual([
    ["KMS key policy", "key policy allows a wildcard principal"],
    ["S3 versioning", "versioning disabled"],
    ["IAM dangerous permissions", "attached policy allows service-wide actions"],
    ["Secret rotation", "rotation disabled"]
  ]);
});

test("a disabled KMS key fails", async () => {
  const cloudControls = controls(3, "dev", "deploy");
  const checks = buildComplianceChecks(
    {
      threatModels: new InMemoryThreatModelRegistry(),
      budgetLimits: { daily: 50, monthly: 500 },
      inspector: { ...healthyInspector, isKeyEnabled: async () => false },
      resources: { buckets: [], kmsKeys: ["alias/retired"], trails: [], iamRoles: [], secrets: [] }
    },
    cloudControls
  );
  const report = await runComplianceChecks(checks, { agent_id: "ops-agent", controls: cloudControls }, { timeoutMs: 1_000 });
  expect(report.checks[2]).toEqual({
    control_id: "SC-028",
    check_name: "KMS key state",
    status: "fail",
    details: "key is not enabled",
    resource_ref: "alias/retired"
  });
});

test("a missing threat model is a warning", async () => {
  const stagingControls = controls(4, "staging", "admin");
  const checks = buildComplianceChecks(
    { threatModels: new InMemoryThreatModelRegistry(), budgetLimits: { daily: 50, monthly: 500 } },
    stagingControls
  );
  const report = await runComplianceChecks(checks, { agent_id: "architect-agent", controls: stagingControls }, { timeoutMs: 1_000 });
  expect(report.checks[2]).toMatchObject({ status: "warning", details: "no threat model found for architect-agent" });
  expect(report.overall_result).toBe("pass");
});

test("a prohibited request fails tier validation with the reason", async () => {
  const prohibited = controls(1, "dev", "write");
  const checks = buildComplianceChecks(
    { threatModels: new InMemoryThreatModelRegistry(), budgetLimits: { daily: 50, monthly: 500 } },
    prohibited
  );
  const report = await runComplianceChecks(checks, { agent_id: "reader", controls: prohibited }, { timeoutMs: 1_000 });
  expect(report.checks[0]).toMatchObject({
    status: "fail",
    details: "tier 1 (read-only) agents may not perform write actions"
  });
});

test("a zero budget limit fails the budget check", async () => {
  const devControls = controls(2, "dev", "write");
  const checks = buildComplianceChecks(
    { threatModels: new InMemoryThreatModelRegistry(), budgetLimits: { daily: 0, monthly: 500 } },
    devControls
  );
  const report = await runComplianceChecks(checks, { agent_id: "dev-agent", controls: devControls }, { timeoutMs: 1_000 });
  expect(report.checks[1]).toMatchObject({ control_id: "MI-021", status: "fail" });
});

test("the file registry finds reports by agent name", async () => {
  const dir = mkdtempSync(path.join(tmpdir(), "threat-models-"));
  writeFileSync(path.join(dir, "security-agent-threat-model.md"), "# Threat model\n");
  const registry = new FileThreatModelRegistry(dir);
  await expect(registry.locate("security-agent")).resolves.toBe(path.join(dir, "security-agent-threat-model.md"));
  await expect(registry.locate("other-agent")).resolves.toBeNull();
});
