import type { Logger } from "pino";
import { logger as rootLogger } from "../logger";
import { describeError, OperationTimeoutError, withTimeout } from "../support/timeout";
import type { RequiredControls } from "../tiers/types";
import type { ChangeRequestTracker } from "./tracker";
import type { ApprovalReference, ApprovalResult, ChangeRequest } from "./types";

export const APPROVAL_UNAVAILABLE_REASON = "approval source unavailable";
export const NO_CHANGE_REQUEST_REASON = "approval required: no change request referenced";

export type ApprovalGateOptions = {
  tracker: ChangeRequestTracker;
  timeoutMs: number;
  logger?: Logger;
};

export type ApprovalGate = {
  check: (
    controls: RequiredControls,
    reference: ApprovalReference,
    options?: { signal?: AbortSignal }
  ) => Promise<ApprovalResult>;
};

function normalizeRole(role: string | null | undefined): string {
  return (role ?? "").trim().toLowerCase();
}

function listedRoles(request: ChangeRequest): string[] {
  const roles = request.approver_roles?.length ? request.approver_roles : [request.approver_role];
  return roles.filter((role): role is string => Boolean(role?.trim()));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// The agent id must appear as a whole token: "ops-agent" does not match "ops-agent-2".
function mentionsAgent(request: ChangeRequest, agentId: string): boolean {
  if (request.linked_agent_id === agentId) {
    return true;
  }
  const token = new RegExp(`(^|[^A-Za-z0-9_-])${escapeRegExp(agentId)}($|[^A-Za-z0-9_-])`, "i");
  return token.test(request.summary);
}

/**
 * Applies the change-request sub-checks in order and returns the first
 * failure. Anything that keeps the tracker from answering is reported as
 * unavailable, which callers treat as a deny.
 */
export function createApprovalGate(options: ApprovalGateOptions): ApprovalGate {
  const log = options.logger ?? rootLogger;

  const check: ApprovalGate["check"] = async (controls, reference, checkOptions) => {
    if (!controls.requires_approval) {
      return { outcome: "allowed", change_request: null };
    }

    const crId = reference.cr_id?.trim();
    if (!crId) {
      return { outcome: "denied", kind: "denied", reason: NO_CHANGE_REQUEST_REASON, change_request: null };
    }

    let request: ChangeRequest | null;
    try {
      request = await withTimeout(
        "approval lookup",
        options.timeoutMs,
        (signal) => options.tracker.getChangeRequest(crId, { signal }),
        checkOptions?.signal
      );
    } catch (error) {
      log.warn(
        { crId, agentId: reference.agent_id, timedOut: error instanceof OperationTimeoutError, error: describeError(error) },
        "Change request lookup failed"
      );
      return { outcome: "denied", kind: "unavailable", reason: APPROVAL_UNAVAILABLE_REASON, change_request: null };
    }

    if (!request) {
      return { outcome: "denied", kind: "denied", reason: `${crId} not found`, change_request: null };
    }

    if (request.status !== "Approved") {
      return {
        outcome: "denied",
        kind: "denied",
        reason: `${crId} not approved (status=${request.status})`,
        change_request: request
      };
    }

    const requiredRole = controls.required_approver_role ?? "";
    const roles = listedRoles(request);
    const matchedRole = roles.find((role) => normalizeRole(role) === normalizeRole(requiredRole));
    if (!requiredRole || !matchedRole) {
      return {
        outcome: "denied",
        kind: "denied",
        reason: `${crId} approver role mismatch (required=${requiredRole}, actual=${roles.map((role) => role.trim()).join(", ") || "none"})`,
        change_request: request
      };
    }

    if (!mentionsAgent(request, reference.agent_id)) {
      return {
        outcome: "denied",
        kind: "denied",
        reason: `${crId} does not reference agent ${reference.agent_id}`,
        change_request: request
      };
    }

    return { outcome: "allowed", change_request: { ...request, approver_role: matchedRole } };
  };

  return { check };
}
