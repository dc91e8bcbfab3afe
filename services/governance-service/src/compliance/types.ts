import type { RequiredControls } from "../tiers/types";

export type ComplianceStatus = "pass" | "fail" | "warning";
export type OverallResult = "pass" | "fail";

export type ComplianceCheckResult = Readonly<{
  control_id: string;
  check_name: string;
  status: ComplianceStatus;
  details: string;
  resource_ref: string | null;
}>;

export type ComplianceReport = {
  report_id: string;
  generated_at: string;
  checks: readonly ComplianceCheckResult[];
  passed: number;
  failed: number;
  warnings: number;
  score: number;
  overall_result: OverallResult;
};

export type ComplianceContext = {
  agent_id: string;
  controls: RequiredControls;
};

export type CheckOutcome = {
  status: ComplianceStatus;
  details: string;
  resource_ref?: string | null;
};

export type ComplianceCheck = {
  control_id: string;
  check_name: string;
  run: (context: ComplianceContext, signal: AbortSignal) => Promise<CheckOutcome>;
};
