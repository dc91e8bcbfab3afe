import { readFileSync } from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { parse as parseYaml } from "yaml";
import { canonicalJson, sha256 } from "../audit/hash";
import { logger } from "../logger";
import { defaultTierPolicy } from "./default-policy";
import { tierPolicyDocumentSchema } from "./schema";
import type { TierPolicyDocument, TierPolicyInfo } from "./types";

export type TierPolicySnapshot = {
  policy: TierPolicyDocument;
  info: TierPolicyInfo;
  source: "file" | "default";
};

export type TierPolicyLoader = {
  getSnapshot: () => TierPolicySnapshot;
  reload: () => TierPolicySnapshot;
};

export class TierPolicySourceError extends Error {
  constructor(
    message: string,
    public readonly policyPath: string
  ) {
    super(message);
    this.name = "TierPolicySourceError";
  }
}

export function parseTierPolicy(raw: string, policyPath = "inline"): TierPolicyDocument {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    throw new TierPolicySourceError(
      `Tier policy is not valid YAML: ${error instanceof Error ? error.message : String(error)}`,
      policyPath
    );
  }
  const result = tierPolicyDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new TierPolicySourceError(`Tier policy failed validation: ${issues.join("; ")}`, policyPath);
  }
  return result.data;
}

function defaultSnapshot(): TierPolicySnapshot {
  return {
    policy: defaultTierPolicy,
    info: {
      version: defaultTierPolicy.version,
      hash: sha256(canonicalJson(defaultTierPolicy)),
      loadedAt: new Date().toISOString(),
      path: "builtin"
    },
    source: "default"
  };
}

function loadFromDisk(policyPath: string): TierPolicySnapshot {
  const raw = readFileSync(policyPath, "utf-8");
  const policy = parseTierPolicy(raw, policyPath);
  return {
    policy,
    info: {
      version: policy.version,
      hash: sha256(raw),
      loadedAt: new Date().toISOString(),
      path: policyPath
    },
    source: "file"
  };
}

/**
 * Loads the tier table from `policyPath` when one is configured, otherwise
 * serves the built-in table. A file that stops parsing keeps the last good
 * snapshot in place.
 */
export function createTierPolicyLoader(options?: {
  policyPath?: string;
  handleSignals?: boolean;
  logger?: Logger;
}): TierPolicyLoader {
  const log = options?.logger ?? logger;
  const policyPath = options?.policyPath ? path.resolve(options.policyPath) : undefined;
  let current: TierPolicySnapshot | null = null;

  const load = (): TierPolicySnapshot => {
    if (!policyPath) {
      current = current ?? defaultSnapshot();
      return current;
    }
    try {
      current = loadFromDisk(policyPath);
      return current;
    } catch (error) {
      log.error({ error, policyPath, traceId: "system" }, "Failed to load tier policy");
      current = current ?? defaultSnapshot();
      return current;
    }
  };

  load();

  if (options?.handleSignals ?? false) {
    process.on("SIGHUP", () => {
      load();
    });
  }

  return {
    getSnapshot: () => current ?? load(),
    reload: () => load()
  };
}
