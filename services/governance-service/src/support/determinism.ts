import { randomBytes } from "node:crypto";

export type DeterminismConfig = {
  start?: Date;
  stepMs?: number;
  idPrefix?: string;
  idStart?: number;
};

type PinnedState = {
  clockMs: number;
  stepMs: number;
  idPrefix: string;
  idCounter: number;
};

let pinned: PinnedState | null = null;

/**
 * Pins the clock and the id generator so that audit timestamps, evidence
 * hashes and report ids are reproducible in tests and demo runs. Each
 * `now()` advances the pinned clock by `stepMs`.
 */
export function configureDeterminism(config?: DeterminismConfig): void {
  pinned = {
    clockMs: (config?.start ?? new Date()).getTime(),
    stepMs: config?.stepMs ?? 1,
    idPrefix: config?.idPrefix ?? "deterministic",
    idCounter: config?.idStart ?? 0
  };
}

export function resetDeterminism(): void {
  pinned = null;
}

export function now(): Date {
  if (!pinned) {
    return new Date();
  }
  const value = new Date(pinned.clockMs);
  pinned.clockMs += pinned.stepMs;
  return value;
}

/** Audit and report ids: 32 hex characters, or `<prefix>-0001` while pinned. */
export function generateId(): string {
  if (!pinned) {
    return randomBytes(16).toString("hex");
  }
  pinned.idCounter += 1;
  return `${pinned.idPrefix}-${String(pinned.idCounter).padStart(4, "0")}`;
}
