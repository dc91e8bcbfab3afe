import { z } from "zod";

// Service-wide grants flagged on agent roles.
export const BROAD_ACTIONS = ["*", "iam:*", "s3:*", "dynamodb:*", "kms:*", "secretsmanager:*"] as const;

const stringOrList = z.union([z.string(), z.array(z.string())]);

const statementSchema = z
  .object({
    Effect: z.string(),
    Action: stringOrList.optional(),
    Resource: stringOrList.optional(),
    Principal: z.union([z.string(), z.record(stringOrList)]).optional()
  })
  .passthrough();

const policyDocumentSchema = z
  .object({
    Statement: z.union([statementSchema, z.array(statementSchema)])
  })
  .passthrough();

export type PolicyStatement = z.infer<typeof statementSchema>;

function listOf(value: string | string[] | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/** Parses a policy document as returned by IAM (URL-encoded) or KMS (plain JSON). */
export function parsePolicyDocument(raw: string): PolicyStatement[] {
  const text = raw.trim().startsWith("{") ? raw : decodeURIComponent(raw);
  const parsed: unknown = JSON.parse(text);
  const document = policyDocumentSchema.parse(parsed);
  return Array.isArray(document.Statement) ? document.Statement : [document.Statement];
}

function allows(statement: PolicyStatement): boolean {
  return statement.Effect === "Allow";
}

export function allowsWildcardPrincipal(statements: PolicyStatement[]): boolean {
  return statements.filter(allows).some((statement) => {
    const principal = statement.Principal;
    if (principal === undefined) {
      return false;
    }
    if (typeof principal === "string") {
      return principal === "*";
    }
    return Object.values(principal).some((value) => listOf(value).includes("*"));
  });
}

export function allowsWildcardResource(statements: PolicyStatement[]): boolean {
  return statements.filter(allows).some((statement) => listOf(statement.Resource).includes("*"));
}

export function broadActions(statements: PolicyStatement[]): string[] {
  const broad = new Set<string>(BROAD_ACTIONS);
  const found = statements.filter(allows).flatMap((statement) => listOf(statement.Action).filter((action) => broad.has(action)));
  return Array.from(new Set(found));
}
