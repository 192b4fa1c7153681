import { describe, expect, it } from "vitest";
import { evaluateAgingScenario } from "@/lib/agingScenario";
import { buildFinalCapacityLines, buildScenarioSummary } from "@/lib/agingSummary";
import { formatAmps, formatMilliamps, formatPercent, formatTemperature, formatVolts } from "@/lib/format";

describe("format helpers", () => {
  it("formats values with units and a dash for non-finite input", () => {
    expect(formatPercent(12.34)).toBe("12.3%");
    expect(formatPercent(null)).toBe("—");
    expect(formatAmps(50)).toBe("50.0 A");
    expect(formatVolts(Number.NaN)).toBe("—");
    expect(formatMilliamps(256.5)).toBe("257 mA");
    expect(formatTemperature(-15)).toBe("-15°C");
    expect(formatTemperature(2.25)).toBe("2.3°C");
  });
});

describe("buildScenarioSummary", () => {
  const result = evaluateAgingScenario({});
  if (!result.ok) throw new Error(result.error.message);
  const scenario = result.value;

  it("lists final capacity per temperature", () => {
    const lines = buildFinalCapacityLines(scenario);
    expect(lines).toHaveLength(13);
    expect(lines[0]).toBe("-15°C: 92.6%");
    expect(lines[8]).toBe("25°C: 62.6%");
    expect(lines[12]).toBe("45°C: 16.3%");
  });

  it("reports self-discharge, inrush and resistive-load figures", () => {
    const sections = buildScenarioSummary(scenario);
    expect(sections.map((s) => s.title)).toEqual([
      "Final Capacity",
      "Estimated Self-Discharge Current",
      "Inrush Current and Voltage Drop Estimation",
      "Resistive Load Check",
    ]);
    expect(sections[1]?.lines).toEqual([
      "Input temperature: 25°C",
      "Self-discharge rate: 3.42% per month",
      "Nominal capacity: 7.5 Ah",
      "Self-discharge current: 257 mA",
    ]);
    expect(sections[2]?.lines).toEqual([
      "Maximum load power: 12.0 kW",
      "Nominal voltage: 240 V",
      "Estimated inrush current: 50.0 A",
      "Internal resistance at year 2.5: 17.43 mΩ",
      "Voltage drop: 0.87 V",
      "Terminal voltage: 239.13 V",
    ]);
    expect(sections[3]?.lines).toEqual([
      "Open-circuit voltage: 12.00 V",
      "Load resistance: 1.000 Ω",
      "Load current: 11.794 A",
      "Voltage across load: 11.794 V",
    ]);
  });
});
