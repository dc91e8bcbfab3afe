import { z } from "zod";

export const actionRequestSchema = z.object({
  agent_id: z.string().trim().min(1),
  tier: z.number().int(),
  environment: z.string().trim().min(1),
  action_class: z.string().trim().min(1),
  cr_id: z.string().trim().min(1).nullish(),
  cost_estimate: z.number().finite().nonnegative().default(0),
  actor: z.string().trim().min(1).optional(),
  inputs: z.record(z.unknown()).optional()
});

export type ActionRequest = z.infer<typeof actionRequestSchema>;

export const budgetResetSchema = z.object({
  actor: z.string().trim().min(1),
  reason: z.string().trim().min(1)
});

export type BudgetResetRequest = z.infer<typeof budgetResetSchema>;
