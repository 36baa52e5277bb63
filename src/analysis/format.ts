// ── Display formatting ──────────────────────────────────────────────
// Cosmetic helpers for callout text. Raw values never pass through here.

/**
 * Render a number with a magnitude suffix: `2.5M`, `1.2K`, `42`, `0.37`.
 * Anything below 1 (negatives included) keeps two decimals.
 */
export function formatNumber(value: number): string {
  if (value >= 1_000_000) return `${(value / 1_000_000).toFixed(1)}M`;
  if (value >= 1_000) return `${(value / 1_000).toFixed(1)}K`;
  if (value >= 1) return value.toFixed(0);
  return value.toFixed(2);
}

/** `DURATION_HOURS` -> `duration hours` */
export function humanizeColumn(column: string): string {
  return column.replace(/_/g, " ").toLowerCase();
}

export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}
