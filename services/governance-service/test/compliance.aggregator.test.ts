import { expect, test } from "vitest";
import { runComplianceChecks } from "../src/compliance/aggregator";
import type { ComplianceCheck, ComplianceContext } from "../src/compliance/types";
import { defaultTierPolicy } from "../src/tiers/default-policy";
import { evaluateTierPolicy } from "../src/tiers/evaluator";

function context(): ComplianceContext {
  const result = evaluateTierPolicy(defaultTierPolicy, { tier: 3, environment: "prod", action_class: "deploy" });
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return { agent_id: "security-agent", controls: result.controls };
}

function fixed(control_id: string, status: "pass" | "fail" | "warning"): ComplianceCheck {
  return { control_id, check_name: `${control_id} check`, run: async () => ({ status, details: status }) };
}

test("runs checks in order and aggregates their results", async () => {
  const order: string[] = [];
  const tracked = (check: ComplianceCheck): ComplianceCheck => ({
    ...check,
    run: async (ctx, signal) => {
      order.push(check.control_id);
      return check.run(ctx, signal);
    }
  });

  const report = await runComplianceChecks(
    [tracked(fixed("AU-002", "pass")), tracked(fixed("SC-028", "fail")), tracked(fixed("TM-001", "warning"))],
    context(),
    { timeoutMs: 1_000, reportId: "r-1" }
  );

  expect(order).toEqual(["AU-002", "SC-028", "TM-001"]);
  expect(report.checks.map((check) => check.status)).toEqual(["pass", "fail", "warning"]);
  expect(report).toMatchObject({ report_id: "r-1", passed: 1, failed: 1, warnings: 1, score: 33.3, overall_result: "fail" });
});

test("a throwing check becomes a warning", async () => {
  const report = await runComplianceChecks(
    [
      {
        control_id: "SEC-001",
        check_name: "KMS rotation",
        run: async () => {
          throw new Error("AccessDenied");
        }
      }
    ],
    context(),
    { timeoutMs: 1_000 }
  );
  expect(report.checks[0]).toEqual({
    control_id: "SEC-001",
    check_name: "KMS rotation",
    status: "warning",
    details: "check aborted: AccessDenied",
    resource_ref: null
  });
  expect(report.overall_result).toBe("pass");
});

test("a check past its deadline becomes a warning and later checks still run", async () => {
  const slow: ComplianceCheck = {
    control_id: "AU-009",
    check_name: "S3 versioning",
    run: () => new Promise(() => undefined)
  };
  const report = await runComplianceChecks([slow, fixed("AU-002", "pass")], context(), { timeoutMs: 20 });
  expect(report.checks[0].status).toBe("warning");
  expect(report.checks[0].details).toBe("check aborted: S3 versioning timed out after 20ms");
  expect(report.checks[1].status).toBe("pass");
  expect(report.score).toBe(50);
});

test("results are frozen", async () => {
  const report = await runComplianceChecks([fixed("AU-002", "pass")], context(), { timeoutMs: 1_000 });
  expect(Object.isFrozen(report.checks[0])).toBe(true);
});
