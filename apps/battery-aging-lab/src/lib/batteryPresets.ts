import { GAS_CONSTANT_J_PER_MOL_K } from "@/lib/arrhenius";
import { REFERENCE_TEMP_C } from "@/lib/capacityDecay";
import type { BatteryPreset, ResistanceTable } from "@/types/batteryAging";

const RESISTANCE_AGING_MULTIPLIERS = [1.0, 1.05, 1.1, 1.25, 1.5, 1.75, 2.0, 2.5, 3.0, 3.75, 4.5];
const NEW_BLOCK_RESISTANCE_MILLIOHM = 13.83;

// Presets are module-level and shared by every evaluation, so they are frozen all the way down.
const VRLA_12V_7AH5_RESISTANCE: ResistanceTable = {
  referenceTempC: REFERENCE_TEMP_C,
  unit: "mOhm",
  years: Object.freeze(RESISTANCE_AGING_MULTIPLIERS.map((_, year) => year)),
  resistance: Object.freeze(RESISTANCE_AGING_MULTIPLIERS.map((m) => m * NEW_BLOCK_RESISTANCE_MILLIOHM)),
};

export const VRLA_12V_7AH5: Readonly<BatteryPreset> = Object.freeze<BatteryPreset>({
  id: "vrla-12v-7.5ah",
  name: "12 V 7.5 Ah VRLA",
  chemistry: "lead_acid",
  nominalCapacityAh: 7.5,
  selfDischargeRateAt25C: 0.0342,
  referenceTempC: REFERENCE_TEMP_C,
  resistanceTable: Object.freeze(VRLA_12V_7AH5_RESISTANCE),
  activationEnergyJPerMol: 5000,
  gasConstant: GAS_CONSTANT_J_PER_MOL_K,
});

export const DEFAULT_PRESET = VRLA_12V_7AH5;
