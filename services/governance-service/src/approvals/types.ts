export type ChangeRequestStatus = "Draft" | "Pending" | "Approved" | "Rejected";

export type ChangeRequest = {
  cr_id: string;
  status: ChangeRequestStatus;
  approver_role: string | null;
  /** Every approver listed on the request; `approver_role` is the first. */
  approver_roles?: string[];
  linked_agent_id: string | null;
  summary: string;
  description?: string;
};

export type ApprovalReference = {
  cr_id: string | null;
  agent_id: string;
};

export type ApprovalDenialKind = "denied" | "unavailable";

export type ApprovalResult =
  | { outcome: "allowed"; change_request: ChangeRequest | null }
  | {
      outcome: "denied";
      kind: ApprovalDenialKind;
      reason: string;
      change_request: ChangeRequest | null;
    };
