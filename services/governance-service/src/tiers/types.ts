import type { z } from "zod";
import type { actionClassSchema, environmentSchema, tierPolicyDocumentSchema, violationModeSchema } from "./schema";

export type Tier = 1 | 2 | 3 | 4;
export type Environment = z.infer<typeof environmentSchema>;
export type ActionClass = z.infer<typeof actionClassSchema>;
export type ViolationMode = z.infer<typeof violationModeSchema>;

export type TierPolicyDocument = z.infer<typeof tierPolicyDocumentSchema>;
export type TierPolicyEntry = TierPolicyDocument["tiers"][keyof TierPolicyDocument["tiers"]];

export type TierPolicyInput = {
  tier: number;
  environment: string;
  action_class: string;
};

export type RequiredControls = {
  tier: Tier;
  tier_label: string;
  environment: Environment;
  action_class: ActionClass;
  mitigations: string[];
  requires_approval: boolean;
  requires_threat_model: boolean;
  requires_budget_control: boolean;
  required_approver_role: string | null;
  violation_mode: ViolationMode;
  prohibited_reason: string | null;
};

export type TierPolicyError =
  | { kind: "InvalidTier"; message: string }
  | { kind: "InvalidEnvironment"; message: string }
  | { kind: "InvalidActionClass"; message: string };

export type TierPolicyResult = { ok: true; controls: RequiredControls } | { ok: false; error: TierPolicyError };

export type TierPolicyInfo = {
  version: string;
  hash: string;
  loadedAt: string;
  path: string;
};
