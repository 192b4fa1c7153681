import { rateAtTemperature } from "@/lib/capacityDecay";
import { invalidDomain, isFiniteNumber, ok, type ModelResult } from "@/lib/modelResult";

export type SelfDischargeEstimate = {
  temperatureC: number;
  /** Fraction of nominal capacity lost per month. */
  rate: number;
  ratePercentPerMonth: number;
  currentAmps: number;
  currentMilliamps: number;
};

// Same rate law as capacity decay, read as an equivalent constant leakage current.
export function computeSelfDischarge(
  temperatureC: number,
  baseRateAt25C: number,
  referenceTempC: number,
  nominalCapacityAh: number,
): ModelResult<SelfDischargeEstimate> {
  if (!isFiniteNumber(temperatureC)) {
    return invalidDomain("estimationTempC", "Estimation temperature must be a finite number.");
  }
  if (!isFiniteNumber(baseRateAt25C) || baseRateAt25C < 0) {
    return invalidDomain("baseRateAt25C", "Base self-discharge rate must be a non-negative number.");
  }
  if (!isFiniteNumber(nominalCapacityAh) || nominalCapacityAh <= 0) {
    return invalidDomain("nominalCapacityAh", "Nominal capacity must be greater than 0 Ah.");
  }

  const rate = rateAtTemperature(baseRateAt25C, temperatureC, referenceTempC);
  const currentAmps = rate * nominalCapacityAh;
  return ok({
    temperatureC,
    rate,
    ratePercentPerMonth: rate * 100,
    currentAmps,
    currentMilliamps: currentAmps * 1000,
  });
}
