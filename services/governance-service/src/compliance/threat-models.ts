import { access } from "node:fs/promises";
import path from "node:path";

export type ThreatModelRegistry = {
  locate: (agentId: string) => Promise<string | null>;
};

/** Looks for `<agent>-threat-model.md` under the reports directory. */
export class FileThreatModelRegistry implements ThreatModelRegistry {
  constructor(private readonly directory: string) {}

  async locate(agentId: string): Promise<string | null> {
    const candidate = path.join(this.directory, `${path.basename(agentId)}-threat-model.md`);
    try {
      await access(candidate);
      return candidate;
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }
  }
}

export class InMemoryThreatModelRegistry implements ThreatModelRegistry {
  constructor(private readonly models: Record<string, string> = {}) {}

  async locate(agentId: string): Promise<string | null> {
    return this.models[agentId] ?? null;
  }
}
