import type { TierPolicyDocument } from "./types";

const BASELINE_MITIGATIONS = ["MI-001", "MI-020"];
const COST_MITIGATIONS = ["MI-003", "MI-009", "MI-021"];

export const defaultTierPolicy: TierPolicyDocument = {
  version: "v1",
  violationModes: {
    dev: "advisory",
    staging: "blocking",
    prod: "blocking"
  },
  tiers: {
    "1": {
      label: "read-only",
      allowedActionClasses: ["read"],
      allowedEnvironments: ["dev", "staging", "prod"],
      mitigations: [...BASELINE_MITIGATIONS],
      requiresBudgetControl: false,
      approverRole: null,
      requiresThreatModel: false
    },
    "2": {
      label: "dev-only",
      allowedActionClasses: ["read", "write"],
      allowedEnvironments: ["dev"],
      mitigations: [...BASELINE_MITIGATIONS, ...COST_MITIGATIONS],
      requiresBudgetControl: true,
      approverRole: null,
      requiresThreatModel: false
    },
    "3": {
      label: "operations",
      allowedActionClasses: ["read", "write", "deploy"],
      allowedEnvironments: ["dev", "staging", "prod"],
      mitigations: [...BASELINE_MITIGATIONS, ...COST_MITIGATIONS, "APP-001"],
      requiresBudgetControl: true,
      approverRole: "Change Manager",
      requiresThreatModel: true
    },
    "4": {
      label: "architect",
      allowedActionClasses: ["read", "write", "deploy", "admin"],
      allowedEnvironments: ["dev", "staging", "prod"],
      mitigations: [...BASELINE_MITIGATIONS, ...COST_MITIGATIONS, "APP-001"],
      requiresBudgetControl: true,
      approverRole: "Change Advisory Board",
      requiresThreatModel: true
    }
  }
};
