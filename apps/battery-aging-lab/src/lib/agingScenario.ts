import { parseAgingInputs } from "@/lib/agingConfig";
import { correctResistanceSeries } from "@/lib/arrhenius";
import {
  buildTemperatureSeries,
  buildTimeAxis,
  monthsToDays,
  monthsToHours,
  totalStorageMonths,
} from "@/lib/axes";
import { DEFAULT_PRESET } from "@/lib/batteryPresets";
import { buildCapacityBand, computeCapacityCurves } from "@/lib/capacityDecay";
import {
  estimateInrushFromPower,
  estimateInrushFromResistiveLoad,
  terminalVoltageSeries,
  terminalVoltageUnderLoad,
} from "@/lib/inrush";
import { interpolateTable, validateTable } from "@/lib/interpolate";
import { emitModelEvent } from "@/lib/modelEvents";
import { ok, type ModelError, type ModelResult } from "@/lib/modelResult";
import { computeSelfDischarge } from "@/lib/selfDischarge";
import type { AgingScenarioResult, BatteryPreset, ResistanceUnit } from "@/types/batteryAging";

export const toOhm = (value: number, unit: ResistanceUnit) => (unit === "mOhm" ? value / 1000 : value);

function rejected(error: ModelError): ModelResult<AgingScenarioResult> {
  emitModelEvent("scenario_rejected", { kind: error.kind, field: error.field ?? null, message: error.message });
  return { ok: false, error };
}

/**
 * Recompute every curve and summary for one set of inputs. Called by the
 * presentation layer on each input change; holds no state between calls.
 */
export function evaluateAgingScenario(
  rawInputs: unknown,
  preset: BatteryPreset = DEFAULT_PRESET,
): ModelResult<AgingScenarioResult> {
  const parsed = parseAgingInputs(rawInputs);
  if (!parsed.ok) return rejected(parsed.error);
  const inputs = parsed.value;

  const durationMonths = totalStorageMonths({
    months: inputs.storageMonths,
    days: inputs.storageDays,
    hours: inputs.storageHours,
  });
  const months = buildTimeAxis({ durationMonths });
  if (!months.ok) return rejected(months.error);

  const temperatures = buildTemperatureSeries({
    minC: inputs.minTempC,
    maxC: inputs.maxTempC,
    stepC: inputs.tempStepC,
  });
  if (!temperatures.ok) return rejected(temperatures.error);

  const curves = computeCapacityCurves({
    initialPercent: inputs.initialCapacityPercent,
    temperaturesC: temperatures.value,
    timeAxisMonths: months.value,
    baseRateAt25C: preset.selfDischargeRateAt25C,
    referenceTempC: preset.referenceTempC,
  });
  if (!curves.ok) return rejected(curves.error);

  const selfDischarge = computeSelfDischarge(
    inputs.estimationTempC,
    preset.selfDischargeRateAt25C,
    preset.referenceTempC,
    preset.nominalCapacityAh,
  );
  if (!selfDischarge.ok) return rejected(selfDischarge.error);

  const inrushCurrent = estimateInrushFromPower(inputs.maxLoadPowerKw * 1000, inputs.nominalVoltage);
  if (!inrushCurrent.ok) return rejected(inrushCurrent.error);

  const table = preset.resistanceTable;
  const tableCheck = validateTable(table.years, table.resistance);
  if (!tableCheck.ok) return rejected(tableCheck.error);

  const corrected = correctResistanceSeries({
    baseResistanceSeries: table.resistance,
    baseTempC: table.referenceTempC,
    targetTempC: inputs.resistanceTargetTempC,
    activationEnergy: preset.activationEnergyJPerMol,
    gasConstant: preset.gasConstant,
  });
  if (!corrected.ok) return rejected(corrected.error);

  const correctedOhm = corrected.value.values.map((r) => toOhm(r, table.unit));
  const terminal = terminalVoltageSeries(inputs.nominalVoltage, correctedOhm, inrushCurrent.value);
  if (!terminal.ok) return rejected(terminal.error);

  const interpolated = interpolateTable(inputs.agingYear, table.years, corrected.value.values);
  if (!interpolated.ok) return rejected(interpolated.error);
  const interpolatedResistance = interpolated.value;
  const interpolatedOhm = toOhm(interpolatedResistance, table.unit);
  const atAgingYear = terminalVoltageUnderLoad(inputs.nominalVoltage, interpolatedOhm, inrushCurrent.value);
  if (!atAgingYear.ok) return rejected(atAgingYear.error);

  const resistiveLoad = estimateInrushFromResistiveLoad(
    inputs.openCircuitVoltage,
    interpolatedOhm,
    inputs.loadResistanceOhm,
  );
  if (!resistiveLoad.ok) return rejected(resistiveLoad.error);

  const warnings = curves.warnings;
  for (const warning of warnings) {
    emitModelEvent("model_domain_warning", { ...warning });
  }

  const result: AgingScenarioResult = {
    inputs,
    preset: { id: preset.id, name: preset.name, nominalCapacityAh: preset.nominalCapacityAh },
    timeAxis: {
      months: months.value,
      days: months.value.map(monthsToDays),
      hours: months.value.map(monthsToHours),
    },
    temperaturesC: temperatures.value,
    capacityCurves: curves.value,
    highlightBand: buildCapacityBand(curves.value, inputs.highlightStartTempC, inputs.highlightEndTempC),
    selfDischarge: selfDischarge.value,
    inrushCurrentA: inrushCurrent.value,
    agingYears: [...table.years],
    resistanceUnit: table.unit,
    correctedResistance: corrected.value,
    terminalVoltage: terminal.value,
    agingYear: inputs.agingYear,
    interpolatedResistance,
    inrushAtAgingYear: atAgingYear.value,
    resistiveLoad: resistiveLoad.value,
  };

  emitModelEvent("scenario_evaluated", {
    preset: preset.id,
    temperatures: temperatures.value.length,
    points: months.value.length,
    warnings: warnings.length,
  });
  return ok(result, warnings);
}
