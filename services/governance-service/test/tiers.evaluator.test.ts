import { expect, test } from "vitest";
import { defaultTierPolicy } from "../src/tiers/default-policy";
import { evaluateTierPolicy } from "../src/tiers/evaluator";
import type { RequiredControls } from "../src/tiers/types";

function controlsFor(tier: number, environment: string, action_class: string): RequiredControls {
  const result = evaluateTierPolicy(defaultTierPolicy, { tier, environment, action_class });
  if (!result.ok) {
    throw new Error(`expected controls, got ${result.error.kind}`);
  }
  return result.controls;
}

test("approval is required exactly for tiers 3 and 4 outside dev", () => {
  for (const tier of [1, 2, 3, 4]) {
    for (const environment of ["dev", "staging", "prod"]) {
      const controls = controlsFor(tier, environment, "read");
      expect(controls.requires_approval).toBe(tier >= 3 && environment !== "dev");
    }
  }
});

test("tier 3 in prod needs a change manager and a threat model", () => {
  const controls = controlsFor(3, "prod", "deploy");
  expect(controls.tier_label).toBe("operations");
  expect(controls.required_approver_role).toBe("Change Manager");
  expect(controls.requires_threat_model).toBe(true);
  expect(controls.requires_budget_control).toBe(true);
  expect(controls.violation_mode).toBe("blocking");
  expect(controls.prohibited_reason).toBeNull();
  expect(controls.mitigations).toEqual(["MI-001", "MI-020", "MI-003", "MI-009", "MI-021", "APP-001"]);
});

test("tier 4 admin actions name the change advisory board", () => {
  const controls = controlsFor(4, "staging", "admin");
  expect(controls.required_approver_role).toBe("Change Advisory Board");
  expect(controls.prohibited_reason).toBeNull();
});

test("dev is advisory and skips approval for every tier", () => {
  const controls = controlsFor(4, "dev", "admin");
  expect(controls.violation_mode).toBe("advisory");
  expect(controls.requires_approval).toBe(false);
  expect(controls.required_approver_role).toBeNull();
  expect(controls.requires_threat_model).toBe(false);
});

test("tier 1 writes are valid but prohibited", () => {
  const controls = controlsFor(1, "dev", "write");
  expect(controls.prohibited_reason).toBe("tier 1 (read-only) agents may not perform write actions");
});

test("tier 2 outside dev is prohibited", () => {
  expect(controlsFor(2, "prod", "read").prohibited_reason).toBe("tier 2 (dev-only) agents may not act in prod");
  expect(controlsFor(2, "dev", "write").prohibited_reason).toBeNull();
  expect(controlsFor(2, "dev", "deploy").prohibited_reason).toBe("tier 2 (dev-only) agents may not perform deploy actions");
});

test("tier 3 may not take admin actions", () => {
  expect(controlsFor(3, "staging", "admin").prohibited_reason).toBe(
    "tier 3 (operations) agents may not perform admin actions"
  );
});

test("rejects tiers, environments and action classes outside the table", () => {
  expect(evaluateTierPolicy(defaultTierPolicy, { tier: 5, environment: "dev", action_class: "read" })).toEqual({
    ok: false,
    error: { kind: "InvalidTier", message: "invalid tier 5 (must be 1-4)" }
  });
  expect(evaluateTierPolicy(defaultTierPolicy, { tier: 2.5, environment: "dev", action_class: "read" })).toEqual({
    ok: false,
    error: { kind: "InvalidTier", message: "invalid tier 2.5 (must be 1-4)" }
  });
  expect(evaluateTierPolicy(defaultTierPolicy, { tier: 1, environment: "qa", action_class: "read" })).toEqual({
    ok: false,
    error: { kind: "InvalidEnvironment", message: 'invalid environment "qa" (expected dev, staging, prod)' }
  });
  expect(evaluateTierPolicy(defaultTierPolicy, { tier: 1, environment: "dev", action_class: "delete" })).toEqual({
    ok: false,
    error: { kind: "InvalidActionClass", message: 'invalid action class "delete" (expected read, write, deploy, admin)' }
  });
});

test("evaluation is pure over the table", () => {
  const first = evaluateTierPolicy(defaultTierPolicy, { tier: 3, environment: "prod", action_class: "deploy" });
  const second = evaluateTierPolicy(defaultTierPolicy, { tier: 3, environment: "prod", action_class: "deploy" });
  expect(second).toEqual(first);
});
