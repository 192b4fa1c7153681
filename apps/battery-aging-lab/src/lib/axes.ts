import { invalidDomain, isFiniteNumber, ok, type ModelResult } from "@/lib/modelResult";

/** Average month length used to fold extra days/hours into the storage duration. */
export const DAYS_PER_MONTH = 30.42;

export const DEFAULT_TIME_RESOLUTION_MONTHS = 0.1;

// Tolerance for float steps landing a hair past an inclusive bound.
const STEP_EPSILON = 1e-9;

export type TemperatureRange = {
  minC: number;
  maxC: number;
  stepC: number;
};

export type StorageDuration = {
  months: number;
  days?: number;
  hours?: number;
};

export function buildTemperatureSeries({ minC, maxC, stepC }: TemperatureRange): ModelResult<number[]> {
  if (!isFiniteNumber(minC) || !isFiniteNumber(maxC)) {
    return invalidDomain("temperature", "Temperature bounds must be finite numbers.");
  }
  if (minC > maxC) {
    return invalidDomain("temperature", `Min temperature (${minC}°C) must not exceed max temperature (${maxC}°C).`);
  }
  if (!isFiniteNumber(stepC) || stepC <= 0) {
    return invalidDomain("tempStepC", "Temperature step must be greater than 0.");
  }

  const count = Math.floor((maxC - minC) / stepC + STEP_EPSILON) + 1;
  return ok(Array.from({ length: count }, (_, i) => minC + i * stepC));
}

export function totalStorageMonths({ months, days = 0, hours = 0 }: StorageDuration): number {
  return months + days / DAYS_PER_MONTH + hours / 24 / DAYS_PER_MONTH;
}

export function buildTimeAxis({
  durationMonths,
  resolutionMonths = DEFAULT_TIME_RESOLUTION_MONTHS,
}: {
  durationMonths: number;
  resolutionMonths?: number;
}): ModelResult<number[]> {
  if (!isFiniteNumber(durationMonths) || durationMonths < 0) {
    return invalidDomain("durationMonths", "Storage duration must be a non-negative number of months.");
  }
  if (!isFiniteNumber(resolutionMonths) || resolutionMonths <= 0) {
    return invalidDomain("resolutionMonths", "Time resolution must be greater than 0.");
  }

  const steps = Math.floor(durationMonths / resolutionMonths + STEP_EPSILON);
  const axis = Array.from({ length: steps + 1 }, (_, i) => i * resolutionMonths);
  const last = axis[axis.length - 1] ?? 0;
  if (durationMonths - last > STEP_EPSILON) {
    axis.push(durationMonths);
  } else {
    axis[axis.length - 1] = durationMonths;
  }
  return ok(axis);
}

export const monthsToDays = (months: number) => months * DAYS_PER_MONTH;

export const monthsToHours = (months: number) => monthsToDays(months) * 24;
