import type { RequiredControls } from "../tiers/types";
import type { CloudResourceInspector, ResourceInventory } from "./inspector";
import type { ThreatModelRegistry } from "./threat-models";
import type { CheckOutcome, ComplianceCheck } from "./types";

export type ComplianceCatalogDeps = {
  threatModels: ThreatModelRegistry;
  budgetLimits: { daily: number; monthly: number };
  inspector?: CloudResourceInspector | null;
  resources?: ResourceInventory;
};

type ResourceCheckSpec = {
  control_id: string;
  check_name: string;
  resource: string;
  test: () => Promise<boolean>;
  passDetails: string;
  failDetails: string;
  failStatus?: "fail" | "warning";
};

function resourceCheck(spec: ResourceCheckSpec): ComplianceCheck {
  return {
    control_id: spec.control_id,
    check_name: spec.check_name,
    run: async (): Promise<CheckOutcome> => {
      const ok = await spec.test();
      return {
        status: ok ? "pass" : spec.failStatus ?? "fail",
        details: ok ? spec.passDetails : spec.failDetails,
        resource_ref: spec.resource
      };
    }
  };
}

export function tierValidationCheck(): ComplianceCheck {
  return {
    control_id: "MI-020",
    check_name: "tier validation",
    run: async ({ controls }) => {
      if (controls.prohibited_reason) {
        return { status: "fail", details: controls.prohibited_reason };
      }
      return {
        status: "pass",
        details: `tier ${controls.tier} (${controls.tier_label}) permits ${controls.action_class} in ${controls.environment}`
      };
    }
  };
}

export function budgetLimitCheck(limits: { daily: number; monthly: number }): ComplianceCheck {
  return {
    control_id: "MI-021",
    check_name: "budget limit configured",
    run: async () => {
      if (limits.daily > 0 && limits.monthly > 0) {
        return {
          status: "pass",
          details: `daily limit $${limits.daily.toFixed(2)}, monthly limit $${limits.monthly.toFixed(2)}`
        };
      }
      return { status: "fail", details: "no positive daily and monthly budget limit configured" };
    }
  };
}

export function threatModelCheck(registry: ThreatModelRegistry): ComplianceCheck {
  return {
    control_id: "TM-001",
    check_name: "threat model present",
    run: async ({ agent_id }) => {
      const location = await registry.locate(agent_id);
      if (!location) {
        return { status: "warning", details: `no threat model found for ${agent_id}` };
      }
      return { status: "pass", details: "threat model found", resource_ref: location };
    }
  };
}

export function cloudResourceChecks(inspector: CloudResourceInspector, resources: ResourceInventory): ComplianceCheck[] {
  const checks: ComplianceCheck[] = [];
  for (const keyId of resources.kmsKeys) {
    checks.push(
      resourceCheck({
        control_id: "SC-028",
        check_name: "KMS key state",
        resource: keyId,
        test: () => inspector.isKeyEnabled(keyId),
        passDetails: "key is enabled",
        failDetails: "key is not enabled"
      }),
      resourceCheck({
        control_id: "SEC-001",
        check_name: "KMS rotation",
        resource: keyId,
        test: () => inspector.hasRotationEnabled(keyId),
        passDetails: "automatic rotation enabled",
        failDetails: "rotation disabled"
      }),
      resourceCheck({
        control_id: "SEC-001",
        check_name: "KMS key policy",
        resource: keyId,
        test: () => inspector.hasScopedKeyPolicy(keyId),
        passDetails: "no wildcard principals",
        failDetails: "key policy allows a wildcard principal",
        failStatus: "warning"
      })
    );
  }
  for (const bucket of resources.buckets) {
    checks.push(
      resourceCheck({
        control_id: "SC-028",
        check_name: "S3 encryption",
        resource: bucket,
        test: () => inspector.isEncrypted(bucket),
        passDetails: "default encryption enabled",
        failDetails: "default encryption missing"
      }),
      resourceCheck({
        control_id: "SEC-002",
        check_name: "S3 public access block",
        resource: bucket,
        test: () => inspector.blocksPublicAccess(bucket),
        passDetails: "all public access blocked",
        failDetails: "public access not fully blocked"
      }),
      resourceCheck({
        control_id: "AU-009",
        check_name: "S3 versioning",
        resource: bucket,
        test: () => inspector.hasVersioning(bucket),
        passDetails: "versioning enabled",
        failDetails: "versioning disabled",
        failStatus: "warning"
      })
    );
  }
  for (const trail of resources.trails) {
    checks.push(
      resourceCheck({
        control_id: "AU-002",
        check_name: "CloudTrail logging",
        resource: trail,
        test: () => inspector.isLoggingEnabled(trail),
        passDetails: "trail is logging",
        failDetails: "trail is not logging"
      }),
      resourceCheck({
        control_id: "AU-002",
        check_name: "CloudTrail log validation",
        resource: trail,
        test: () => inspector.hasLogValidation(trail),
        passDetails: "log file validation enabled",
        failDetails: "log file validation disabled"
      }),
      resourceCheck({
        control_id: "SC-028",
        check_name: "CloudTrail encryption",
        resource: trail,
        test: () => inspector.isTrailEncrypted(trail),
        passDetails: "logs encrypted with KMS",
        failDetails: "logs not encrypted with KMS",
        failStatus: "warning"
      })
    );
  }
  for (const role of resources.iamRoles) {
    checks.push(
      resourceCheck({
        control_id: "SEC-001",
        check_name: "IAM least privilege",
        resource: role,
        test: () => inspector.hasScopedRoleResources(role),
        passDetails: "no wildcard resources",
        failDetails: "attached policy allows a wildcard resource",
        failStatus: "warning"
      }),
      resourceCheck({
        control_id: "SEC-001",
        check_name: "IAM dangerous permissions",
        resource: role,
        test: () => inspector.avoidsBroadActions(role),
        passDetails: "no service-wide actions",
        failDetails: "attached policy allows service-wide actions",
        failStatus: "warning"
      })
    );
  }
  for (const secret of resources.secrets) {
    checks.push(
      resourceCheck({
        control_id: "SEC-001",
        check_name: "Secret encryption",
        resource: secret,
        test: () => inspector.usesCustomerManagedKey(secret),
        passDetails: "encrypted with a customer managed key",
        failDetails: "encrypted with the default KMS key",
        failStatus: "warning"
      }),
      resourceCheck({
        control_id: "MI-003",
        check_name: "Secret rotation",
        resource: secret,
        test: () => inspector.hasSecretRotation(secret),
        passDetails: "automatic rotation enabled",
        failDetails: "rotation disabled",
        failStatus: "warning"
      })
    );
  }
  return checks;
}

/** The checks that apply to a request carrying `controls`. */
export function buildComplianceChecks(deps: ComplianceCatalogDeps, controls: RequiredControls): ComplianceCheck[] {
  const checks: ComplianceCheck[] = [tierValidationCheck()];
  if (controls.requires_budget_control) {
    checks.push(budgetLimitCheck(deps.budgetLimits));
  }
  if (controls.requires_threat_model) {
    checks.push(threatModelCheck(deps.threatModels));
  }
  if (deps.inspector && deps.resources) {
    checks.push(...cloudResourceChecks(deps.inspector, deps.resources));
  }
  return checks;
}
