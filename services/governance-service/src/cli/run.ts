import { parseArgs } from "node:util";
import type { ControlPlane } from "../control-plane/control-plane";
import { AuditWriteFailure, InvalidRequestError } from "../errors";

export const EXIT_PERMITTED = 0;
export const EXIT_DENIED = 1;
export const EXIT_INVALID = 2;

export type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

export const USAGE = `Usage:
  governance-check --agent <id> --tier <1-4> --environment <dev|staging|prod> --action-class <read|write|deploy|admin> [--cr-id <id>] [--cost <usd>] [--actor <name>]`;

function parseNumberFlag(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidRequestError(`--${name} must be a number`, [`${name}: expected a number, got "${value}"`]);
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): Record<string, unknown> | "help" {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    options: {
      agent: { type: "string" },
      tier: { type: "string" },
      environment: { type: "string" },
      "action-class": { type: "string" },
      "cr-id": { type: "string" },
      cost: { type: "string" },
      actor: { type: "string" },
      help: { type: "boolean", short: "h" }
    }
  });

  if (values.help) {
    return "help";
  }

  return {
    agent_id: values.agent,
    tier: parseNumberFlag("tier", values.tier),
    environment: values.environment,
    action_class: values["action-class"],
    cr_id: values["cr-id"],
    cost_estimate: parseNumberFlag("cost", values.cost) ?? 0,
    actor: values.actor
  };
}

/** Evaluates one request and returns the process exit code. */
export async function runCli(argv: string[], controlPlane: ControlPlane, io: CliIo): Promise<number> {
  let request: Record<string, unknown> | "help";
  try {
    request = parseCliArgs(argv);
  } catch (error) {
    io.stderr(error instanceof Error ? error.message : String(error));
    io.stderr(USAGE);
    return EXIT_INVALID;
  }
  if (request === "help") {
    io.stdout(USAGE);
    return EXIT_PERMITTED;
  }

  try {
    const decision = await controlPlane.handleAction(request);
    io.stdout(JSON.stringify(decision, null, 2));
    return decision.decision === "deny" ? EXIT_DENIED : EXIT_PERMITTED;
  } catch (error) {
    if (error instanceof InvalidRequestError) {
      io.stderr(JSON.stringify({ error: error.message, issues: error.issues }, null, 2));
      return EXIT_INVALID;
    }
    if (error instanceof AuditWriteFailure) {
      io.stderr(JSON.stringify({ error: error.message, auditId: error.auditId }, null, 2));
      return EXIT_DENIED;
    }
    throw error;
  }
}
