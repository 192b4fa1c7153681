import { RESISTANCE_UNIT_LABEL } from "@/lib/chartFactories";
import {
  formatAmps,
  formatKw,
  formatMilliamps,
  formatOhms,
  formatPercent,
  formatTemperature,
  formatVolts,
} from "@/lib/format";
import type { AgingScenarioResult } from "@/types/batteryAging";

export type SummarySection = {
  title: string;
  lines: string[];
};

export function buildFinalCapacityLines(result: AgingScenarioResult): string[] {
  return result.capacityCurves.map(
    (curve) => `${formatTemperature(curve.temperatureC)}: ${formatPercent(curve.finalPercent)}`,
  );
}

export function buildScenarioSummary(result: AgingScenarioResult): SummarySection[] {
  const { inputs, selfDischarge, inrushAtAgingYear, resistiveLoad } = result;
  const unit = RESISTANCE_UNIT_LABEL[result.resistanceUnit];

  return [
    {
      title: "Final Capacity",
      lines: buildFinalCapacityLines(result),
    },
    {
      title: "Estimated Self-Discharge Current",
      lines: [
        `Input temperature: ${formatTemperature(selfDischarge.temperatureC)}`,
        `Self-discharge rate: ${formatPercent(selfDischarge.ratePercentPerMonth, 2)} per month`,
        `Nominal capacity: ${result.preset.nominalCapacityAh} Ah`,
        `Self-discharge current: ${formatMilliamps(selfDischarge.currentMilliamps)}`,
      ],
    },
    {
      title: "Inrush Current and Voltage Drop Estimation",
      lines: [
        `Maximum load power: ${formatKw(inputs.maxLoadPowerKw)}`,
        `Nominal voltage: ${inputs.nominalVoltage} V`,
        `Estimated inrush current: ${formatAmps(result.inrushCurrentA)}`,
        `Internal resistance at year ${result.agingYear}: ${result.interpolatedResistance.toFixed(2)} ${unit}`,
        `Voltage drop: ${formatVolts(inrushAtAgingYear.voltageDrop)}`,
        `Terminal voltage: ${formatVolts(inrushAtAgingYear.terminalVoltage)}${inrushAtAgingYear.clamped ? " (clamped)" : ""}`,
      ],
    },
    {
      title: "Resistive Load Check",
      lines: [
        `Open-circuit voltage: ${formatVolts(inputs.openCircuitVoltage)}`,
        `Load resistance: ${formatOhms(inputs.loadResistanceOhm)}`,
        `Load current: ${formatAmps(resistiveLoad.current, 3)}`,
        `Voltage across load: ${formatVolts(resistiveLoad.voltageAcrossLoad, 3)}`,
      ],
    },
  ];
}
