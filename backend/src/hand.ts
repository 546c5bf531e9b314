import type { SignalLevel } from "../../shared/schemas.js";

export const FORCED_BLUFF_LABEL = "forced_bluff";

const BUST_TOTALS: ReadonlySet<number> = new Set([20, 21, 22]);

/** Lowest and highest totals a schedule is expected to produce. */
export const MIN_EXPECTED_TOTAL = 14;
export const MAX_EXPECTED_TOTAL = 22;

/** Sum of both cards; totals of 20-22 bust to 0. */
export function handValue(a: number, b: number): number {
  const total = a + b;
  return BUST_TOTALS.has(total) ? 0 : total;
}

/**
 * Strength category of a two-card hand, or `null` for a forced bluff (20-22).
 *
 * Totals outside 14-22 are folded into medium (>= 16) or low (< 16) instead of
 * failing; callers loading schedules warn about them via `isExpectedTotal`.
 */
export function handCategory(a: number, b: number): SignalLevel | null {
  const total = a + b;
  if (total === 19) return "high";
  if (total >= 16 && total <= 18) return "medium";
  if (total === 14 || total === 15) return "low";
  if (BUST_TOTALS.has(total)) return null;
  return total >= 16 ? "medium" : "low";
}

export function handCategoryLabel(a: number, b: number): string {
  return handCategory(a, b) ?? FORCED_BLUFF_LABEL;
}

export function isExpectedTotal(a: number, b: number): boolean {
  const total = a + b;
  return total >= MIN_EXPECTED_TOTAL && total <= MAX_EXPECTED_TOTAL;
}
