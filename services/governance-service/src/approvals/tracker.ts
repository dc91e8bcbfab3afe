import type { ChangeRequest } from "./types";

export type ChangeRequestTracker = {
  getChangeRequest: (crId: string, options?: { signal?: AbortSignal }) => Promise<ChangeRequest | null>;
};

export class InMemoryChangeRequestTracker implements ChangeRequestTracker {
  private readonly requests = new Map<string, ChangeRequest>();

  constructor(requests: ChangeRequest[] = []) {
    requests.forEach((request) => this.upsert(request));
  }

  upsert(request: ChangeRequest): void {
    this.requests.set(request.cr_id, { ...request });
  }

  async getChangeRequest(crId: string): Promise<ChangeRequest | null> {
    const request = this.requests.get(crId);
    return request ? { ...request } : null;
  }
}
