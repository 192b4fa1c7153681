import type {
  Options,
  SeriesArearangeOptions,
  SeriesLineOptions,
  SeriesOptionsType,
  SeriesScatterOptions,
} from "highcharts";
import { CHART_HEIGHTS, CHART_PALETTE, seriesColor } from "./chartTokens";
import { formatTemperature } from "./format";
import type { CapacityBand, CapacityCurve } from "./capacityDecay";
import type { AgingScenarioResult, ResistanceUnit, StorageTimeAxis } from "@/types/batteryAging";

export const RESISTANCE_UNIT_LABEL: Record<ResistanceUnit, string> = { mOhm: "mΩ", Ohm: "Ω" };

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

/** Base options shared by ALL charts — credits, theme */
export function createBaseOptions(overrides?: Partial<Options>): Options {
  return {
    credits: { enabled: false },
    accessibility: { enabled: false },
    ...overrides,
    chart: {
      style: { fontFamily: "system-ui, -apple-system, sans-serif" },
      ...overrides?.chart,
    },
  };
}

// ---------------------------------------------------------------------------
// Line
// ---------------------------------------------------------------------------

export type LineChartFactoryOpts = {
  title: string;
  series: SeriesOptionsType[];
  xAxisTitle: string;
  yAxisTitle: string;
  height?: number;
  unifiedHover?: boolean;
};

/** Numeric x axis line chart with a bottom legend */
export function createLineChartOptions(opts: LineChartFactoryOpts): Options {
  return createBaseOptions({
    chart: { type: "line", height: opts.height ?? CHART_HEIGHTS.compact },
    title: { text: opts.title },
    xAxis: { title: { text: opts.xAxisTitle }, gridLineWidth: 1, gridLineColor: "#f3f4f6" },
    yAxis: { title: { text: opts.yAxisTitle }, gridLineColor: "#f3f4f6" },
    tooltip: { shared: opts.unifiedHover ?? false, valueDecimals: 2 },
    legend: { enabled: true, align: "center", verticalAlign: "bottom", layout: "horizontal" },
    series: opts.series,
  });
}

// ---------------------------------------------------------------------------
// Capacity retention
// ---------------------------------------------------------------------------

export const capacitySeriesName = (curve: CapacityCurve) =>
  `${formatTemperature(curve.temperatureC)} — Final: ${curve.finalPercent.toFixed(1)}%`;

/** One line per curve plus a final-point marker whose hover shows the elapsed hours. */
export function buildCapacitySeries(timeAxis: StorageTimeAxis, curves: readonly CapacityCurve[]): SeriesOptionsType[] {
  const { months, hours } = timeAxis;
  const lastMonth = months[months.length - 1] ?? 0;
  const lastHours = hours[hours.length - 1] ?? 0;
  return curves.flatMap((curve, index): SeriesOptionsType[] => {
    const color = seriesColor(index);
    const line: SeriesLineOptions = {
      type: "line",
      id: `capacity-${curve.temperatureC}`,
      name: capacitySeriesName(curve),
      color,
      data: months.map((month, i): [number, number | null] => [month, curve.values[i] ?? null]),
      tooltip: { valueSuffix: "%" },
    };
    const finalMarker: SeriesScatterOptions = {
      type: "scatter",
      linkedTo: line.id,
      name: `${formatTemperature(curve.temperatureC)} final`,
      color,
      showInLegend: false,
      marker: { radius: 4 },
      data: [{ x: lastMonth, y: curve.finalPercent, custom: { hours: lastHours } }],
      tooltip: { pointFormat: "{point.y:.1f}% after {point.custom.hours:.0f} h" },
    };
    return [line, finalMarker];
  });
}

/**
 * Shaded range between the two highlight curves. `arearange` lives in the
 * `highcharts/highcharts-more` module, which the chart shell must load.
 */
export function buildCapacityBandSeries(
  months: readonly number[],
  band: CapacityBand,
): SeriesArearangeOptions {
  return {
    type: "arearange",
    name: `${formatTemperature(band.lowerTempC)} to ${formatTemperature(band.upperTempC)}`,
    color: CHART_PALETTE.band,
    fillColor: CHART_PALETTE.band,
    lineWidth: 0,
    enableMouseTracking: false,
    showInLegend: false,
    data: months.map((month, i): [number, number, number] => {
      const a = band.lower[i] ?? 0;
      const b = band.upper[i] ?? 0;
      return [month, Math.min(a, b), Math.max(a, b)];
    }),
  };
}

export function createCapacityChartOptions(result: AgingScenarioResult): Options {
  const months = result.timeAxis.months;
  const series = buildCapacitySeries(result.timeAxis, result.capacityCurves);
  if (result.highlightBand) {
    series.push(buildCapacityBandSeries(months, result.highlightBand));
  }
  return createLineChartOptions({
    title: `${result.preset.name} — Capacity Retention vs. Time & Temperature`,
    xAxisTitle: "Storage Time (Months)",
    yAxisTitle: "Remaining Capacity (%)",
    height: CHART_HEIGHTS.tall,
    unifiedHover: true,
    series,
  });
}

// ---------------------------------------------------------------------------
// Aging (resistance, terminal voltage)
// ---------------------------------------------------------------------------

export function createResistanceChartOptions(result: AgingScenarioResult): Options {
  const { correctedResistance, agingYears } = result;
  const unit = RESISTANCE_UNIT_LABEL[result.resistanceUnit];
  const target = formatTemperature(correctedResistance.targetTempC);
  const line: SeriesLineOptions = {
    type: "line",
    name: `Internal Resistance @${target}`,
    color: CHART_PALETTE.resistance,
    marker: { enabled: true },
    data: agingYears.map((year, i): [number, number | null] => [year, correctedResistance.values[i] ?? null]),
    tooltip: { valueSuffix: ` ${unit}`, valueDecimals: 1 },
  };
  return createLineChartOptions({
    title: `Internal Resistance vs. Aging Time (${target})`,
    xAxisTitle: "Time (Years)",
    yAxisTitle: `Internal Resistance (${unit})`,
    series: [line],
  });
}

export function createTerminalVoltageChartOptions(result: AgingScenarioResult): Options {
  const target = formatTemperature(result.correctedResistance.targetTempC);
  const line: SeriesLineOptions = {
    type: "line",
    name: `Terminal Voltage (${target} Aging)`,
    color: CHART_PALETTE.terminalVoltage,
    marker: { enabled: true },
    data: result.agingYears.map((year, i): [number, number | null] => [
      year,
      result.terminalVoltage[i]?.terminalVoltage ?? null,
    ]),
    tooltip: { valueSuffix: " V" },
  };
  return createLineChartOptions({
    title: `Terminal Voltage vs. Aging Time (${target})`,
    xAxisTitle: "Time (Years)",
    yAxisTitle: "Terminal Voltage (V)",
    series: [line],
  });
}
