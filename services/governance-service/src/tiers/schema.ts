import { z } from "zod";

export const environmentSchema = z.enum(["dev", "staging", "prod"]);
export const actionClassSchema = z.enum(["read", "write", "deploy", "admin"]);
export const violationModeSchema = z.enum(["blocking", "advisory"]);

const controlIdSchema = z.string().regex(/^[A-Z]{1,4}-\d{3}$/, "control ids look like MI-001");

const tierPolicyEntrySchema = z.object({
  label: z.string().min(1),
  allowedActionClasses: z.array(actionClassSchema).min(1),
  allowedEnvironments: z.array(environmentSchema).min(1),
  mitigations: z.array(controlIdSchema).default([]),
  requiresBudgetControl: z.boolean().default(false),
  approverRole: z.string().min(1).nullable().default(null),
  requiresThreatModel: z.boolean().default(false)
});

// Approval outside dev is fixed to tiers 3 and 4; a policy file may rename the
// approver role but cannot move the gate.
export const tierPolicyDocumentSchema = z
  .object({
    version: z.literal("v1"),
    violationModes: z.object({
      dev: violationModeSchema,
      staging: violationModeSchema,
      prod: violationModeSchema
    }),
    tiers: z.object({
      "1": tierPolicyEntrySchema,
      "2": tierPolicyEntrySchema,
      "3": tierPolicyEntrySchema,
      "4": tierPolicyEntrySchema
    })
  })
  .superRefine((document, ctx) => {
    (["1", "2"] as const).forEach((tier) => {
      if (document.tiers[tier].approverRole !== null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tiers", tier, "approverRole"],
          message: `tier ${tier} does not take an approver role`
        });
      }
    });
    (["3", "4"] as const).forEach((tier) => {
      if (document.tiers[tier].approverRole === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tiers", tier, "approverRole"],
          message: `tier ${tier} requires an approver role`
        });
      }
    });
  });
