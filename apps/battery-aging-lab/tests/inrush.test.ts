import { describe, expect, it } from "vitest";
import {
  estimateInrushFromPower,
  estimateInrushFromResistiveLoad,
  terminalVoltageSeries,
  terminalVoltageUnderLoad,
} from "@/lib/inrush";

describe("estimateInrushFromPower", () => {
  it("divides load power by nominal voltage", () => {
    expect(estimateInrushFromPower(12_000, 240)).toEqual({ ok: true, value: 50, warnings: [] });
  });

  it("surfaces a zero voltage as division by zero", () => {
    const result = estimateInrushFromPower(12_000, 0);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toMatchObject({ kind: "division_by_zero", field: "nominalVoltage" });
  });

  it("rejects negative voltage and power", () => {
    const voltage = estimateInrushFromPower(1000, -12);
    expect(voltage.ok).toBe(false);
    if (!voltage.ok) expect(voltage.error.kind).toBe("invalid_domain");

    expect(estimateInrushFromPower(-1, 12).ok).toBe(false);
  });
});

describe("estimateInrushFromResistiveLoad", () => {
  it("splits the open-circuit voltage across internal and load resistance", () => {
    const result = estimateInrushFromResistiveLoad(12, 1.1, 1.0);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.current).toBeCloseTo(5.714285714, 8);
    expect(result.value.voltageAcrossLoad).toBeCloseTo(5.714285714, 8);
  });

  it("puts no voltage across a shorted load", () => {
    const result = estimateInrushFromResistiveLoad(12, 0.5, 0);
    expect(result).toEqual({ ok: true, value: { current: 24, voltageAcrossLoad: 0 }, warnings: [] });
  });

  it("reports division by zero instead of an infinite current", () => {
    const result = estimateInrushFromResistiveLoad(12, 0, 0);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("division_by_zero");
  });

  it("rejects negative resistances", () => {
    const result = estimateInrushFromResistiveLoad(12, -0.1, 1);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toMatchObject({ kind: "invalid_domain", field: "internalResistanceOhm" });
  });
});

describe("terminalVoltageUnderLoad", () => {
  it("subtracts the internal voltage drop", () => {
    const result = terminalVoltageUnderLoad(240, 0.01383, 50);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.current).toBe(50);
    expect(result.value.voltageDrop).toBeCloseTo(0.6915, 12);
    expect(result.value.terminalVoltage).toBeCloseTo(239.3085, 10);
    expect(result.value.clamped).toBe(false);
  });

  it("clamps at 0 V when the drop exceeds the source", () => {
    const result = terminalVoltageUnderLoad(12, 1, 20);
    expect(result).toEqual({
      ok: true,
      value: { current: 20, voltageDrop: 20, terminalVoltage: 0, clamped: true },
      warnings: [],
    });
  });

  it("clamps at the source voltage for a negative current", () => {
    const result = terminalVoltageUnderLoad(12, 0.5, -4);
    expect(result.ok && result.value.terminalVoltage).toBe(12);
    expect(result.ok && result.value.clamped).toBe(true);
  });

  it("rejects a non-positive nominal voltage", () => {
    expect(terminalVoltageUnderLoad(0, 0.1, 10).ok).toBe(false);
  });
});

describe("terminalVoltageSeries", () => {
  it("maps each resistance to a terminal voltage", () => {
    const result = terminalVoltageSeries(240, [0.01, 0.02], 50);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map((r) => r.terminalVoltage)).toEqual([239.5, 239]);
  });

  it("stops at the first invalid resistance", () => {
    const result = terminalVoltageSeries(240, [0.01, -1], 50);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.field).toBe("internalResistanceOhm");
  });
});
