import { generateId, now } from "../support/determinism";
import type { ComplianceCheckResult, ComplianceReport, OverallResult } from "./types";

/**
 * Percentage of passing checks rounded half-up to one decimal place, computed
 * on integers so that 8 of 10 is exactly 80.0. No checks scores 100.0.
 */
export function computeComplianceScore(
  passed: number,
  failed: number,
  warnings: number
): { score: number; overall_result: OverallResult } {
  const total = passed + failed + warnings;
  const overall_result: OverallResult = failed > 0 ? "fail" : "pass";
  if (total === 0) {
    return { score: 100, overall_result };
  }
  const tenths = Math.floor((passed * 2000 + total) / (2 * total));
  return { score: tenths / 10, overall_result };
}

export function buildComplianceReport(checks: readonly ComplianceCheckResult[], reportId = generateId()): ComplianceReport {
  let passed = 0;
  let failed = 0;
  let warnings = 0;
  for (const check of checks) {
    if (check.status === "pass") {
      passed += 1;
    } else if (check.status === "fail") {
      failed += 1;
    } else {
      warnings += 1;
    }
  }
  const { score, overall_result } = computeComplianceScore(passed, failed, warnings);
  return {
    report_id: reportId,
    generated_at: now().toISOString(),
    checks: Object.freeze([...checks]),
    passed,
    failed,
    warnings,
    score,
    overall_result
  };
}

export function failureReasons(report: ComplianceReport): string[] {
  return report.checks
    .filter((check) => check.status === "fail")
    .map((check) => `${check.control_id} ${check.check_name}: ${check.details}`);
}
