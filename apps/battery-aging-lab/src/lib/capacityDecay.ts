import { invalidDomain, isFiniteNumber, ok, type ModelDomainWarning, type ModelResult } from "@/lib/modelResult";

export const REFERENCE_TEMP_C = 25;

/** Highlight buckets preselected when the caller has not chosen any. */
export const DEFAULT_HIGHLIGHT_TEMPS_C = { start: -5, end: 35 } as const;

export type CapacityCurve = {
  temperatureC: number;
  /** Monthly loss fraction k(T) used for this curve. */
  rate: number;
  values: number[];
  finalPercent: number;
  warnings: ModelDomainWarning[];
};

/**
 * Band between the curves of two selected temperatures. `lower`/`upper` refer to the
 * temperatures, so `lower` is the colder (higher-capacity) curve.
 */
export type CapacityBand = {
  lowerTempC: number;
  upperTempC: number;
  lower: number[];
  upper: number[];
};

/** Rate doubles for every 10°C above the reference temperature. */
export function rateAtTemperature(
  baseRateAt25C: number,
  temperatureC: number,
  referenceTempC: number = REFERENCE_TEMP_C,
): number {
  return baseRateAt25C * 2 ** ((temperatureC - referenceTempC) / 10);
}

export function computeCapacityCurve(
  initialPercent: number,
  temperatureC: number,
  timeAxisMonths: readonly number[],
  baseRateAt25C: number,
  referenceTempC: number = REFERENCE_TEMP_C,
): number[] {
  const retainedPerMonth = 1 - rateAtTemperature(baseRateAt25C, temperatureC, referenceTempC);
  return timeAxisMonths.map((t) => initialPercent * retainedPerMonth ** t);
}

function decayWarnings(
  temperatureC: number,
  rate: number,
  initialPercent: number,
  values: readonly number[],
): ModelDomainWarning[] {
  const warnings: ModelDomainWarning[] = [];
  if (rate >= 1) {
    warnings.push({
      kind: "model_domain",
      temperatureC,
      message: `Decay rate ${rate.toFixed(3)}/month at ${temperatureC}°C is at or above 1; the curve is outside the model's validity region.`,
    });
  }
  const index = values.findIndex((v) => !Number.isFinite(v) || v < 0 || v > initialPercent);
  if (index >= 0) {
    warnings.push({
      kind: "model_domain",
      temperatureC,
      index,
      message: `Capacity at ${temperatureC}°C leaves [0, ${initialPercent}]% from point ${index}.`,
    });
  }
  return warnings;
}

export type CapacityCurvesParams = {
  initialPercent: number;
  temperaturesC: readonly number[];
  timeAxisMonths: readonly number[];
  baseRateAt25C: number;
  referenceTempC?: number;
};

export function computeCapacityCurves({
  initialPercent,
  temperaturesC,
  timeAxisMonths,
  baseRateAt25C,
  referenceTempC = REFERENCE_TEMP_C,
}: CapacityCurvesParams): ModelResult<CapacityCurve[]> {
  if (!isFiniteNumber(initialPercent) || initialPercent < 0 || initialPercent > 100) {
    return invalidDomain("initialPercent", "Initial capacity must be within 0..100%.");
  }
  if (!isFiniteNumber(baseRateAt25C) || baseRateAt25C < 0) {
    return invalidDomain("baseRateAt25C", "Base decay rate must be a non-negative number.");
  }
  if (!timeAxisMonths.length) {
    return invalidDomain("timeAxisMonths", "Time axis must contain at least one point.");
  }

  const curves = temperaturesC.map((temperatureC): CapacityCurve => {
    const rate = rateAtTemperature(baseRateAt25C, temperatureC, referenceTempC);
    const values = computeCapacityCurve(initialPercent, temperatureC, timeAxisMonths, baseRateAt25C, referenceTempC);
    return {
      temperatureC,
      rate,
      values,
      finalPercent: values[values.length - 1] ?? initialPercent,
      warnings: decayWarnings(temperatureC, rate, initialPercent, values),
    };
  });

  return ok(
    curves,
    curves.flatMap((curve) => curve.warnings),
  );
}

/** Index of the entry nearest to `target`; the first one wins on ties, -1 when empty. */
export function closestIndex(values: readonly number[], target: number): number {
  let best = -1;
  let bestDistance = Infinity;
  values.forEach((value, i) => {
    const distance = Math.abs(value - target);
    if (distance < bestDistance) {
      best = i;
      bestDistance = distance;
    }
  });
  return best;
}

export function buildCapacityBand(
  curves: readonly CapacityCurve[],
  startTempC: number,
  endTempC: number,
): CapacityBand | null {
  const temps = curves.map((curve) => curve.temperatureC);
  const start = curves[closestIndex(temps, startTempC)];
  const end = curves[closestIndex(temps, endTempC)];
  if (!start || !end || start === end) return null;

  const [lower, upper] = start.temperatureC < end.temperatureC ? [start, end] : [end, start];
  return {
    lowerTempC: lower.temperatureC,
    upperTempC: upper.temperatureC,
    lower: lower.values,
    upper: upper.values,
  };
}
