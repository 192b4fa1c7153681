import type { CapacityBand, CapacityCurve } from "@/lib/capacityDecay";
import type { CorrectedResistanceSeries } from "@/lib/arrhenius";
import type { InrushResult, ResistiveLoadEstimate } from "@/lib/inrush";
import type { SelfDischargeEstimate } from "@/lib/selfDischarge";

export type BatteryChemistry = "lead_acid";

export type ResistanceUnit = "mOhm" | "Ohm";

/** (year, resistance) pairs measured at `referenceTempC`. */
export type ResistanceTable = {
  referenceTempC: number;
  unit: ResistanceUnit;
  years: readonly number[];
  resistance: readonly number[];
};

export type BatteryPreset = {
  id: string;
  name: string;
  chemistry: BatteryChemistry;
  nominalCapacityAh: number;
  /** Fraction of capacity lost per month at `referenceTempC`. */
  selfDischargeRateAt25C: number;
  referenceTempC: number;
  resistanceTable: ResistanceTable;
  activationEnergyJPerMol: number;
  gasConstant: number;
};

export type AgingInputs = {
  initialCapacityPercent: number;
  storageMonths: number;
  storageDays: number;
  storageHours: number;
  minTempC: number;
  maxTempC: number;
  tempStepC: number;
  highlightStartTempC: number;
  highlightEndTempC: number;
  estimationTempC: number;
  nominalVoltage: number;
  maxLoadPowerKw: number;
  openCircuitVoltage: number;
  loadResistanceOhm: number;
  agingYear: number;
  resistanceTargetTempC: number;
};

export type StorageTimeAxis = {
  months: number[];
  days: number[];
  hours: number[];
};

export type AgingScenarioResult = {
  inputs: AgingInputs;
  preset: Pick<BatteryPreset, "id" | "name" | "nominalCapacityAh">;
  timeAxis: StorageTimeAxis;
  temperaturesC: number[];
  capacityCurves: CapacityCurve[];
  highlightBand: CapacityBand | null;
  selfDischarge: SelfDischargeEstimate;
  inrushCurrentA: number;
  agingYears: number[];
  resistanceUnit: ResistanceUnit;
  /** Same unit as `resistanceUnit`. */
  correctedResistance: CorrectedResistanceSeries;
  terminalVoltage: InrushResult[];
  agingYear: number;
  interpolatedResistance: number;
  inrushAtAgingYear: InrushResult;
  resistiveLoad: ResistiveLoadEstimate;
};
