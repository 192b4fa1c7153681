import { z } from "zod";

import { DEFAULT_HIGHLIGHT_TEMPS_C } from "@/lib/capacityDecay";
import { ok, type ModelResult } from "@/lib/modelResult";
import type { AgingInputs } from "@/types/batteryAging";

export const DEFAULT_AGING_INPUTS: Readonly<AgingInputs> = Object.freeze({
  initialCapacityPercent: 95,
  storageMonths: 12,
  storageDays: 0,
  storageHours: 0,
  minTempC: -15,
  maxTempC: 45,
  tempStepC: 5,
  highlightStartTempC: DEFAULT_HIGHLIGHT_TEMPS_C.start,
  highlightEndTempC: DEFAULT_HIGHLIGHT_TEMPS_C.end,
  estimationTempC: 25,
  nominalVoltage: 240,
  maxLoadPowerKw: 12,
  openCircuitVoltage: 12,
  loadResistanceOhm: 1,
  agingYear: 2.5,
  resistanceTargetTempC: 15,
});

const bounded = (min: number, max: number) => z.number().finite().min(min).max(max);

export const AgingInputsSchema = z
  .object({
    initialCapacityPercent: bounded(50, 100),
    storageMonths: bounded(0, 120),
    storageDays: bounded(0, 31),
    storageHours: bounded(0, 23),
    minTempC: bounded(-20, 25),
    maxTempC: bounded(25, 60),
    tempStepC: bounded(1, 10),
    highlightStartTempC: z.number().finite(),
    highlightEndTempC: z.number().finite(),
    estimationTempC: bounded(-20, 60),
    nominalVoltage: bounded(12, 600),
    maxLoadPowerKw: bounded(1, 50),
    openCircuitVoltage: z.number().finite().nonnegative(),
    loadResistanceOhm: z.number().finite().nonnegative(),
    agingYear: bounded(0, 5),
    resistanceTargetTempC: bounded(-20, 60),
  })
  .refine((inputs) => inputs.minTempC <= inputs.maxTempC, {
    message: "Min temperature must not exceed max temperature.",
    path: ["minTempC"],
  });

export class AgingInputsError extends Error {
  issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(`Invalid aging inputs: ${issues.map(describeIssue).join("; ")}`);
    this.name = "AgingInputsError";
    this.issues = issues;
  }
}

function describeIssue(issue: z.ZodIssue): string {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

const withDefaults = (raw: unknown) =>
  typeof raw === "object" && raw !== null ? { ...DEFAULT_AGING_INPUTS, ...raw } : raw;

/** Missing fields fall back to DEFAULT_AGING_INPUTS; present ones must sit inside their slider domain. */
export function parseAgingInputs(raw: unknown): ModelResult<AgingInputs> {
  const result = AgingInputsSchema.safeParse(withDefaults(raw));
  if (!result.success) {
    const issue = result.error.issues[0];
    return {
      ok: false,
      error: {
        kind: "invalid_domain",
        field: issue?.path.join("."),
        message: result.error.issues.map(describeIssue).join("; "),
      },
    };
  }
  return ok(result.data);
}

export function parseAgingInputsOrThrow(raw: unknown): AgingInputs {
  const result = AgingInputsSchema.safeParse(withDefaults(raw));
  if (!result.success) {
    throw new AgingInputsError(result.error.issues);
  }
  return result.data;
}

export const MODEL_EVENTS_ENV = "BATTERY_AGING_EVENTS";

export function readModelEventsFlag(env: Record<string, string | undefined> = process.env): boolean {
  return env[MODEL_EVENTS_ENV] === "1";
}
