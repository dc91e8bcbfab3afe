import type { Logger } from "pino";
import { logger as rootLogger } from "../logger";
import { describeError, withTimeout } from "../support/timeout";
import { buildComplianceReport } from "./score";
import type { ComplianceCheck, ComplianceCheckResult, ComplianceContext, ComplianceReport } from "./types";

export type RunChecksOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
  logger?: Logger;
  reportId?: string;
};

function freezeResult(check: ComplianceCheck, result: Omit<ComplianceCheckResult, "control_id" | "check_name">): ComplianceCheckResult {
  return Object.freeze({
    control_id: check.control_id,
    check_name: check.check_name,
    status: result.status,
    details: result.details,
    resource_ref: result.resource_ref
  });
}

/**
 * Runs each check in turn under its own deadline. A check that throws, times
 * out or is cancelled is recorded as a warning instead of failing the batch.
 */
export async function runComplianceChecks(
  checks: readonly ComplianceCheck[],
  context: ComplianceContext,
  options: RunChecksOptions
): Promise<ComplianceReport> {
  const log = options.logger ?? rootLogger;
  const results: ComplianceCheckResult[] = [];

  for (const check of checks) {
    try {
      const outcome = await withTimeout(
        check.check_name,
        options.timeoutMs,
        (signal) => check.run(context, signal),
        options.signal
      );
      results.push(
        freezeResult(check, {
          status: outcome.status,
          details: outcome.details,
          resource_ref: outcome.resource_ref ?? null
        })
      );
    } catch (error) {
      const cause = describeError(error);
      log.warn({ controlId: check.control_id, check: check.check_name, cause }, "Compliance check aborted");
      results.push(freezeResult(check, { status: "warning", details: `check aborted: ${cause}`, resource_ref: null }));
    }
  }

  return buildComplianceReport(results, options.reportId);
}
