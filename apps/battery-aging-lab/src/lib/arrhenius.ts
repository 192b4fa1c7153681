import { invalidDomain, isFiniteNumber, ok, type ModelResult } from "@/lib/modelResult";

export const GAS_CONSTANT_J_PER_MOL_K = 8.314;
export const KELVIN_OFFSET = 273.15;

const ELEMENTARY_CHARGE_C = 1.602176634e-19;
const AVOGADRO_PER_MOL = 6.02214076e23;

export const celsiusToKelvin = (celsius: number) => celsius + KELVIN_OFFSET;

/** eV per particle → J/mol, so eV-rated activation energies share the J/mol code path. */
export function activationEnergyFromElectronVolts(electronVolts: number): number {
  return electronVolts * ELEMENTARY_CHARGE_C * AVOGADRO_PER_MOL;
}

/**
 * exp((Ea/R) * (1/T_target - 1/T_base)) with temperatures in Kelvin.
 * A target colder than the base gives a factor above 1.
 */
export function arrheniusFactor(
  baseTempC: number,
  targetTempC: number,
  activationEnergy: number,
  gasConstant: number = GAS_CONSTANT_J_PER_MOL_K,
): number {
  const inverseDelta = 1 / celsiusToKelvin(targetTempC) - 1 / celsiusToKelvin(baseTempC);
  return Math.exp((activationEnergy / gasConstant) * inverseDelta);
}

/** Unit-agnostic: the output carries whatever unit the base series is in (mΩ or Ω). */
export function correctResistance(
  baseResistanceSeries: readonly number[],
  baseTempC: number,
  targetTempC: number,
  activationEnergy: number,
  gasConstant: number = GAS_CONSTANT_J_PER_MOL_K,
): number[] {
  const factor = arrheniusFactor(baseTempC, targetTempC, activationEnergy, gasConstant);
  return baseResistanceSeries.map((r) => r * factor);
}

export type CorrectedResistanceSeries = {
  baseTempC: number;
  targetTempC: number;
  factor: number;
  values: number[];
};

export type ResistanceCorrectionParams = {
  baseResistanceSeries: readonly number[];
  baseTempC: number;
  targetTempC: number;
  activationEnergy: number;
  gasConstant?: number;
};

export function correctResistanceSeries({
  baseResistanceSeries,
  baseTempC,
  targetTempC,
  activationEnergy,
  gasConstant = GAS_CONSTANT_J_PER_MOL_K,
}: ResistanceCorrectionParams): ModelResult<CorrectedResistanceSeries> {
  for (const [field, temp] of [
    ["baseTempC", baseTempC],
    ["targetTempC", targetTempC],
  ] as const) {
    if (!isFiniteNumber(temp) || celsiusToKelvin(temp) <= 0) {
      return invalidDomain(field, "Temperature must be above absolute zero.");
    }
  }
  if (!isFiniteNumber(activationEnergy)) {
    return invalidDomain("activationEnergy", "Activation energy must be a finite number.");
  }
  if (!isFiniteNumber(gasConstant) || gasConstant <= 0) {
    return invalidDomain("gasConstant", "Gas constant must be greater than 0.");
  }
  if (baseResistanceSeries.some((r) => !isFiniteNumber(r) || r < 0)) {
    return invalidDomain("baseResistanceSeries", "Resistance values must be non-negative numbers.");
  }

  const factor = arrheniusFactor(baseTempC, targetTempC, activationEnergy, gasConstant);
  return ok({
    baseTempC,
    targetTempC,
    factor,
    values: baseResistanceSeries.map((r) => r * factor),
  });
}
