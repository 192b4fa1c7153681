import {
  divisionByZero,
  invalidDomain,
  isFiniteNumber,
  ok,
  type ModelResult,
} from "@/lib/modelResult";

export type ResistiveLoadEstimate = {
  current: number;
  voltageAcrossLoad: number;
};

export type InrushResult = {
  current: number;
  voltageDrop: number;
  terminalVoltage: number;
  /**
   * True when the terminal voltage was pinned to 0 or to the source voltage.
   * The clamp drops how far past the floor an over-discharge would go.
   */
  clamped: boolean;
};

/** Steady-state current a load of `maxPowerW` draws at `nominalVoltage`. */
export function estimateInrushFromPower(maxPowerW: number, nominalVoltage: number): ModelResult<number> {
  if (!isFiniteNumber(maxPowerW) || maxPowerW < 0) {
    return invalidDomain("maxPowerW", "Load power must be a non-negative number.");
  }
  if (nominalVoltage === 0) {
    return divisionByZero("nominalVoltage", "Nominal voltage is 0 V; inrush current is undefined.");
  }
  if (!isFiniteNumber(nominalVoltage) || nominalVoltage < 0) {
    return invalidDomain("nominalVoltage", "Nominal voltage must be greater than 0 V.");
  }
  return ok(maxPowerW / nominalVoltage);
}

export function estimateInrushFromResistiveLoad(
  openCircuitVoltage: number,
  internalResistanceOhm: number,
  loadResistanceOhm: number,
): ModelResult<ResistiveLoadEstimate> {
  if (!isFiniteNumber(openCircuitVoltage)) {
    return invalidDomain("openCircuitVoltage", "Open-circuit voltage must be a finite number.");
  }
  if (!isFiniteNumber(internalResistanceOhm) || internalResistanceOhm < 0) {
    return invalidDomain("internalResistanceOhm", "Internal resistance must be a non-negative number.");
  }
  if (!isFiniteNumber(loadResistanceOhm) || loadResistanceOhm < 0) {
    return invalidDomain("loadResistanceOhm", "Load resistance must be a non-negative number.");
  }
  const totalOhm = internalResistanceOhm + loadResistanceOhm;
  if (totalOhm === 0) {
    return divisionByZero("loadResistanceOhm", "Internal and load resistance are both 0 Ω; current is unbounded.");
  }

  const current = openCircuitVoltage / totalOhm;
  return ok({ current, voltageAcrossLoad: current * loadResistanceOhm });
}

export function terminalVoltageUnderLoad(
  nominalVoltage: number,
  internalResistanceOhm: number,
  inrushCurrent: number,
): ModelResult<InrushResult> {
  if (!isFiniteNumber(nominalVoltage) || nominalVoltage <= 0) {
    return invalidDomain("nominalVoltage", "Nominal voltage must be greater than 0 V.");
  }
  if (!isFiniteNumber(internalResistanceOhm) || internalResistanceOhm < 0) {
    return invalidDomain("internalResistanceOhm", "Internal resistance must be a non-negative number.");
  }
  if (!isFiniteNumber(inrushCurrent)) {
    return invalidDomain("inrushCurrent", "Inrush current must be a finite number.");
  }

  const voltageDrop = internalResistanceOhm * inrushCurrent;
  const unclamped = nominalVoltage - voltageDrop;
  const terminalVoltage = Math.max(0, Math.min(nominalVoltage, unclamped));
  return ok({
    current: inrushCurrent,
    voltageDrop,
    terminalVoltage,
    clamped: terminalVoltage !== unclamped,
  });
}

export function terminalVoltageSeries(
  nominalVoltage: number,
  resistanceSeriesOhm: readonly number[],
  inrushCurrent: number,
): ModelResult<InrushResult[]> {
  const results: InrushResult[] = [];
  for (const ohm of resistanceSeriesOhm) {
    const result = terminalVoltageUnderLoad(nominalVoltage, ohm, inrushCurrent);
    if (!result.ok) return result;
    results.push(result.value);
  }
  return ok(results);
}
