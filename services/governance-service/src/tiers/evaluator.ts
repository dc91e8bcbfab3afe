import { actionClassSchema, environmentSchema } from "./schema";
import type {
  ActionClass,
  Environment,
  RequiredControls,
  Tier,
  TierPolicyDocument,
  TierPolicyEntry,
  TierPolicyInput,
  TierPolicyResult
} from "./types";

const UNGATED_ENVIRONMENT: Environment = "dev";

export function parseTier(value: number): Tier | null {
  switch (value) {
    case 1:
    case 2:
    case 3:
    case 4:
      return value;
    default:
      return null;
  }
}

function entryFor(policy: TierPolicyDocument, tier: Tier): TierPolicyEntry {
  switch (tier) {
    case 1:
      return policy.tiers["1"];
    case 2:
      return policy.tiers["2"];
    case 3:
      return policy.tiers["3"];
    case 4:
      return policy.tiers["4"];
    default: {
      const unreachable: never = tier;
      throw new Error(`Unhandled tier ${String(unreachable)}`);
    }
  }
}

function prohibitedReason(
  tier: Tier,
  entry: TierPolicyEntry,
  environment: Environment,
  actionClass: ActionClass
): string | null {
  if (!entry.allowedEnvironments.includes(environment)) {
    return `tier ${tier} (${entry.label}) agents may not act in ${environment}`;
  }
  if (!entry.allowedActionClasses.includes(actionClass)) {
    return `tier ${tier} (${entry.label}) agents may not perform ${actionClass} actions`;
  }
  return null;
}

/**
 * Resolves the controls a request must satisfy. Pure over the policy table:
 * the same table and input always yield the same result.
 */
export function evaluateTierPolicy(policy: TierPolicyDocument, input: TierPolicyInput): TierPolicyResult {
  const tier = Number.isInteger(input.tier) ? parseTier(input.tier) : null;
  if (tier === null) {
    return { ok: false, error: { kind: "InvalidTier", message: `invalid tier ${input.tier} (must be 1-4)` } };
  }

  const environment = environmentSchema.safeParse(input.environment);
  if (!environment.success) {
    return {
      ok: false,
      error: {
        kind: "InvalidEnvironment",
        message: `invalid environment "${input.environment}" (expected ${environmentSchema.options.join(", ")})`
      }
    };
  }

  const actionClass = actionClassSchema.safeParse(input.action_class);
  if (!actionClass.success) {
    return {
      ok: false,
      error: {
        kind: "InvalidActionClass",
        message: `invalid action class "${input.action_class}" (expected ${actionClassSchema.options.join(", ")})`
      }
    };
  }

  const entry = entryFor(policy, tier);
  const gated = environment.data !== UNGATED_ENVIRONMENT;
  const requiresApproval = gated && entry.approverRole !== null;

  const controls: RequiredControls = {
    tier,
    tier_label: entry.label,
    environment: environment.data,
    action_class: actionClass.data,
    mitigations: [...entry.mitigations],
    requires_approval: requiresApproval,
    requires_threat_model: gated && entry.requiresThreatModel,
    requires_budget_control: entry.requiresBudgetControl,
    required_approver_role: requiresApproval ? entry.approverRole : null,
    violation_mode: policy.violationModes[environment.data],
    prohibited_reason: prohibitedReason(tier, entry, environment.data, actionClass.data)
  };

  return { ok: true, controls };
}
