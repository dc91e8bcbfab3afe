export const MICROS_PER_DOLLAR = 1_000_000;

/** Dollars to integer micro-dollars, rounded to the nearest micro. */
export function toMicros(dollars: number): number {
  return Math.round(dollars * MICROS_PER_DOLLAR);
}

export function fromMicros(micros: number): number {
  return micros / MICROS_PER_DOLLAR;
}

export function formatUsd(micros: number): string {
  return `$${fromMicros(micros).toFixed(2)}`;
}

/** `used * 100 >= limit * percent`, evaluated on integers. */
export function reachesPercent(usedMicros: number, limitMicros: number, percent: number): boolean {
  return usedMicros * 100 >= limitMicros * percent;
}

/** Usage as a percentage rounded half-up to one decimal place. */
export function percentUsed(usedMicros: number, limitMicros: number): number {
  if (limitMicros <= 0) {
    return usedMicros > 0 ? 100 : 0;
  }
  return Math.floor((usedMicros * 2000 + limitMicros) / (2 * limitMicros)) / 10;
}
