import type { ZodIssue } from "zod";

export class InvalidRequestError extends Error {
  public readonly statusCode = 400;

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = "InvalidRequestError";
  }

  static fromZodIssues(issues: ZodIssue[]): InvalidRequestError {
    const details = issues.map((issue) => {
      const path = issue.path.length ? issue.path.join(".") : "request";
      return `${path}: ${issue.message}`;
    });
    return new InvalidRequestError("Invalid action request.", details);
  }
}

export class AuditWriteFailure extends Error {
  public readonly statusCode = 503;

  constructor(
    public readonly auditId: string,
    cause: unknown
  ) {
    super(`Audit record ${auditId} could not be written: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "AuditWriteFailure";
  }
}
