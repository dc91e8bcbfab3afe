import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import { defaultTierPolicy } from "../src/tiers/default-policy";
import { createTierPolicyLoader, parseTierPolicy, TierPolicySourceError } from "../src/tiers/loader";

const bundledPolicy = path.resolve(__dirname, "../policies/tier-policy.v1.yaml");

test("the bundled policy file matches the built-in table", () => {
  const loader = createTierPolicyLoader({ policyPath: bundledPolicy });
  const snapshot = loader.getSnapshot();
  expect(snapshot.source).toBe("file");
  expect(snapshot.info.path).toBe(bundledPolicy);
  expect(snapshot.info.hash).toMatch(/^[0-9a-f]{64}$/);
  expect(snapshot.policy).toEqual(defaultTierPolicy);
});

test("without a path the built-in table is served", () => {
  const snapshot = createTierPolicyLoader().getSnapshot();
  expect(snapshot.source).toBe("default");
  expect(snapshot.info.path).toBe("builtin");
  expect(snapshot.policy).toBe(defaultTierPolicy);
});

test("a policy that moves the approval gate is rejected", () => {
  const yaml = `version: "v1"
violationModes: { dev: advisory, staging: blocking, prod: blocking }
tiers:
  "1": { label: a, allowedActionClasses: [read], allowedEnvironments: [dev] }
  "2": { label: b, allowedActionClasses: [read], allowedEnvironments: [dev], approverRole: Manager }
  "3": { label: c, allowedActionClasses: [read], allowedEnvironments: [dev], approverRole: Manager }
  "4": { label: d, allowedActionClasses: [read], allowedEnvironments: [dev] }
`;
  expect(() => parseTierPolicy(yaml)).toThrow(TierPolicySourceError);
  expect(() => parseTierPolicy(yaml)).toThrow(
    "Tier policy failed validation: tiers.2.approverRole: tier 2 does not take an approver role; tiers.4.approverRole: tier 4 requires an approver role"
  );
});

test("a broken file keeps the last good snapshot on reload", () => {
  const dir = mkdtempSync(path.join(tmpdir(), "tier-policy-"));
  const file = path.join(dir, "policy.yaml");
  writeFileSync(file, `version: "v1"
violationModes: { dev: blocking, staging: blocking, prod: blocking }
tiers:
  "1": { label: observer, allowedActionClasses: [read], allowedEnvironments: [dev, staging, prod] }
  "2": { label: builder, allowedActionClasses: [read, write], allowedEnvironments: [dev] }
  "3": { label: operator, allowedActionClasses: [read, write, deploy], allowedEnvironments: [dev, staging, prod], approverRole: Release Manager }
  "4": { label: owner, allowedActionClasses: [read, write, deploy, admin], allowedEnvironments: [dev, staging, prod], approverRole: Board }
`);

  const loader = createTierPolicyLoader({ policyPath: file });
  const first = loader.getSnapshot();
  expect(first.source).toBe("file");
  expect(first.policy.tiers["3"].approverRole).toBe("Release Manager");
  expect(first.policy.violationModes.dev).toBe("blocking");

  writeFileSync(file, "version: [unterminated");
  const second = loader.reload();
  expect(second).toBe(first);
});
