import { reachesPercent } from "./money";
import type { AlertLevel } from "./types";

export const BREAKER_PERCENT = 90;

export const ALERT_THRESHOLDS = [
  { percent: 50, level: "info", severity_id: 1 },
  { percent: 75, level: "warning", severity_id: 3 },
  { percent: 90, level: "critical", severity_id: 5 }
] as const satisfies ReadonlyArray<{ percent: number; level: AlertLevel; severity_id: number }>;

export type AlertThreshold = (typeof ALERT_THRESHOLDS)[number];

/** Thresholds the cumulative cost passed on its way from `before` to `after`. */
export function crossedThresholds(beforeMicros: number, afterMicros: number, limitMicros: number): AlertThreshold[] {
  return ALERT_THRESHOLDS.filter(
    (threshold) =>
      !reachesPercent(beforeMicros, limitMicros, threshold.percent) &&
      reachesPercent(afterMicros, limitMicros, threshold.percent)
  );
}
