import { z } from "zod";
import type { ChangeRequestTracker } from "./tracker";
import type { ChangeRequest, ChangeRequestStatus } from "./types";

const APPROVER_FIELDS = ["customfield_10100", "customfield_10200", "approvers", "approval"] as const;
const AGENT_LABEL_PREFIX = "agent:";

const approverSchema = z
  .object({
    role: z.string().optional(),
    displayName: z.string().optional(),
    name: z.string().optional()
  })
  .passthrough();

const issueSchema = z.object({
  key: z.string(),
  fields: z
    .object({
      summary: z.string().nullish(),
      status: z.object({ name: z.string() }).nullish(),
      description: z.unknown().optional(),
      labels: z.array(z.string()).nullish()
    })
    .passthrough()
});

type JiraIssue = z.infer<typeof issueSchema>;
type JiraApprover = z.infer<typeof approverSchema>;

export class JiraRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = "JiraRequestError";
  }
}

export type JiraTrackerOptions = {
  baseUrl: string;
  user: string;
  token: string;
  fetchImpl?: typeof fetch;
};

/** Flattens an Atlassian Document Format tree into space-separated text. */
export function flattenAdf(node: unknown): string {
  const parts: string[] = [];
  const visit = (value: unknown): void => {
    if (Array.isArray(value)) {
      value.forEach(visit);
      return;
    }
    if (!value || typeof value !== "object") {
      return;
    }
    const type = "type" in value ? value.type : undefined;
    const text = "text" in value ? value.text : undefined;
    if (type === "text" && typeof text === "string") {
      parts.push(text);
    }
    if ("content" in value) {
      visit(value.content);
    }
  };
  visit(node);
  return parts.join(" ");
}

export function normalizeStatus(name: string | undefined): ChangeRequestStatus {
  switch ((name ?? "").trim().toLowerCase()) {
    case "approved":
      return "Approved";
    case "rejected":
    case "declined":
      return "Rejected";
    case "draft":
    case "open":
    case "to do":
      return "Draft";
    default:
      return "Pending";
  }
}

function readApprovers(fields: Record<string, unknown>): JiraApprover[] {
  const approvers: JiraApprover[] = [];
  for (const fieldId of APPROVER_FIELDS) {
    const value = fields[fieldId];
    const entries = Array.isArray(value) ? value : value ? [value] : [];
    for (const entry of entries) {
      const parsed = approverSchema.safeParse(entry);
      if (parsed.success) {
        approvers.push(parsed.data);
      } else if (typeof entry === "string" && entry.trim()) {
        approvers.push({ role: entry });
      }
    }
  }
  return approvers;
}

export function toChangeRequest(issue: JiraIssue): ChangeRequest {
  const approverRoles = readApprovers(issue.fields)
    .map((approver) => approver.role ?? approver.displayName ?? approver.name ?? "")
    .filter((role) => role.trim().length > 0);
  const linkedLabel = (issue.fields.labels ?? []).find((label) => label.startsWith(AGENT_LABEL_PREFIX));
  const description =
    typeof issue.fields.description === "string" ? issue.fields.description : flattenAdf(issue.fields.description);

  return {
    cr_id: issue.key,
    status: normalizeStatus(issue.fields.status?.name),
    approver_role: approverRoles[0] ?? null,
    approver_roles: approverRoles,
    linked_agent_id: linkedLabel ? linkedLabel.slice(AGENT_LABEL_PREFIX.length) : null,
    summary: issue.fields.summary ?? "",
    description
  };
}

export class JiraChangeRequestTracker implements ChangeRequestTracker {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: JiraTrackerOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.authorization = `Basic ${Buffer.from(`${options.user}:${options.token}`).toString("base64")}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async getChangeRequest(crId: string, options?: { signal?: AbortSignal }): Promise<ChangeRequest | null> {
    const response = await this.fetchImpl(`${this.baseUrl}/rest/api/3/issue/${encodeURIComponent(crId)}`, {
      method: "GET",
      headers: {
        accept: "application/json",
        authorization: this.authorization
      },
      signal: options?.signal
    });

    if (response.status === 404) {
      return null;
    }
    if (response.status === 401) {
      throw new JiraRequestError("Jira authentication failed", response.status);
    }
    if (response.status === 403) {
      throw new JiraRequestError(`Access denied to ${crId}`, response.status);
    }
    if (!response.ok) {
      throw new JiraRequestError(`Jira API error: ${response.status}`, response.status);
    }

    const issue = issueSchema.safeParse(await response.json());
    if (!issue.success) {
      throw new JiraRequestError(`Unexpected Jira payload for ${crId}`, response.status);
    }
    return toChangeRequest(issue.data);
  }
}
