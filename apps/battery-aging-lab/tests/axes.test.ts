import { describe, expect, it } from "vitest";
import {
  buildTemperatureSeries,
  buildTimeAxis,
  monthsToDays,
  monthsToHours,
  totalStorageMonths,
} from "@/lib/axes";

describe("buildTemperatureSeries", () => {
  it("includes both bounds when the step lands on max", () => {
    const result = buildTemperatureSeries({ minC: -15, maxC: 45, stepC: 5 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toHaveLength(13);
    expect(result.value[0]).toBe(-15);
    expect(result.value[12]).toBe(45);
  });

  it("stops at the last step below max", () => {
    const result = buildTemperatureSeries({ minC: -20, maxC: 25, stepC: 10 });
    expect(result).toEqual({ ok: true, value: [-20, -10, 0, 10, 20], warnings: [] });
  });

  it("yields a single temperature when min equals max", () => {
    const result = buildTemperatureSeries({ minC: 25, maxC: 25, stepC: 3 });
    expect(result.ok && result.value).toEqual([25]);
  });

  it("rejects inverted bounds and non-positive steps", () => {
    const inverted = buildTemperatureSeries({ minC: 30, maxC: 25, stepC: 1 });
    expect(inverted.ok).toBe(false);
    if (!inverted.ok) expect(inverted.error).toMatchObject({ kind: "invalid_domain", field: "temperature" });

    const flat = buildTemperatureSeries({ minC: 0, maxC: 25, stepC: 0 });
    expect(flat.ok).toBe(false);
    if (!flat.ok) expect(flat.error).toMatchObject({ kind: "invalid_domain", field: "tempStepC" });
  });
});

describe("totalStorageMonths", () => {
  it("folds days and hours into months of 30.42 days", () => {
    expect(totalStorageMonths({ months: 1, days: 30.42 })).toBe(2);
    expect(totalStorageMonths({ months: 0, hours: 24 })).toBeCloseTo(1 / 30.42, 12);
    expect(totalStorageMonths({ months: 12 })).toBe(12);
  });
});

describe("buildTimeAxis", () => {
  it("starts at 0, ends exactly at the duration, and increases strictly", () => {
    const result = buildTimeAxis({ durationMonths: 12 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const axis = result.value;
    expect(axis).toHaveLength(121);
    expect(axis[0]).toBe(0);
    expect(axis[120]).toBe(12);
    for (let i = 1; i < axis.length; i += 1) {
      expect(axis[i]!).toBeGreaterThan(axis[i - 1]!);
    }
  });

  it("appends the duration when it falls between steps", () => {
    const result = buildTimeAxis({ durationMonths: 0.25 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toHaveLength(4);
    expect(result.value[2]).toBeCloseTo(0.2, 12);
    expect(result.value[3]).toBe(0.25);
  });

  it("collapses a zero duration to the origin", () => {
    expect(buildTimeAxis({ durationMonths: 0 })).toEqual({ ok: true, value: [0], warnings: [] });
  });

  it("rejects negative durations and non-positive resolutions", () => {
    expect(buildTimeAxis({ durationMonths: -1 }).ok).toBe(false);
    expect(buildTimeAxis({ durationMonths: 1, resolutionMonths: 0 }).ok).toBe(false);
  });
});

describe("month conversions", () => {
  it("converts months to days and hours", () => {
    expect(monthsToDays(1)).toBe(30.42);
    expect(monthsToHours(1)).toBeCloseTo(730.08, 9);
  });
});
