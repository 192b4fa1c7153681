/**
 * Ordered palette — series colors cycle through `series`, named keys for semantic use.
 * Every battery aging chart pulls colors from this single source.
 */
export const CHART_PALETTE = {
  series: [
    "#2563eb", // blue-600
    "#dc2626", // red-600
    "#16a34a", // green-600
    "#a855f7", // purple-500
    "#f97316", // orange-500
    "#0ea5e9", // sky-500
    "#ec4899", // pink-500
    "#84cc16", // lime-500
  ],
  resistance: "#2563eb",
  terminalVoltage: "#dc2626",
  band: "rgba(255, 215, 0, 0.2)",
} as const;

/** Standard chart heights (px) */
export const CHART_HEIGHTS = {
  compact: 400,
  tall: 600,
} as const;

/** Return the palette color at a given series index (cycles) */
export function seriesColor(index: number): string {
  const palette = CHART_PALETTE.series;
  return palette[((index % palette.length) + palette.length) % palette.length]!;
}
