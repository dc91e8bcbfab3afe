import { expect, test } from "vitest";
import { buildComplianceReport, computeComplianceScore, failureReasons } from "../src/compliance/score";
import type { ComplianceCheckResult } from "../src/compliance/types";

function result(control_id: string, status: ComplianceCheckResult["status"], details = "details"): ComplianceCheckResult {
  return { control_id, check_name: `${control_id} check`, status, details, resource_ref: null };
}

test("eight passes, one failure and one warning score 80.0 and fail", () => {
  expect(computeComplianceScore(8, 1, 1)).toEqual({ score: 80, overall_result: "fail" });
});

test("scores round half up to one decimal", () => {
  expect(computeComplianceScore(1, 0, 2).score).toBe(33.3);
  expect(computeComplianceScore(2, 1, 0).score).toBe(66.7);
  expect(computeComplianceScore(1, 0, 7).score).toBe(12.5);
  expect(computeComplianceScore(5, 0, 0).score).toBe(100);
});

test("warnings alone do not fail a report", () => {
  expect(computeComplianceScore(3, 0, 2)).toEqual({ score: 60, overall_result: "pass" });
});

test("an empty report scores 100 and passes", () => {
  expect(computeComplianceScore(0, 0, 0)).toEqual({ score: 100, overall_result: "pass" });
});

test("reports count each status and list failures", () => {
  const checks = [
    ...Array.from({ length: 8 }, (_, index) => result(`AU-00${index}`, "pass")),
    result("SC-028", "fail", "default encryption missing"),
    result("TM-001", "warning")
  ];
  const report = buildComplianceReport(checks, "report-1");
  expect(report).toMatchObject({ report_id: "report-1", passed: 8, failed: 1, warnings: 1, score: 80, overall_result: "fail" });
  expect(report.checks).toHaveLength(10);
  expect(Object.isFrozen(report.checks)).toBe(true);
  expect(failureReasons(report)).toEqual(["SC-028 SC-028 check: default encryption missing"]);
});
