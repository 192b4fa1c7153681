export type ModelErrorKind = "invalid_domain" | "division_by_zero";

export type ModelError = {
  kind: ModelErrorKind;
  message: string;
  /** Input field that triggered the error, when one can be named. */
  field?: string;
};

/**
 * Non-fatal flag for values computed outside the model's validity region
 * (e.g. a decay rate at or above 1 per month). Callers decide how to display it.
 */
export type ModelDomainWarning = {
  kind: "model_domain";
  message: string;
  temperatureC?: number;
  index?: number;
};

export type ModelResult<T> =
  | { ok: true; value: T; warnings: ModelDomainWarning[] }
  | { ok: false; error: ModelError };

export function ok<T>(value: T, warnings: ModelDomainWarning[] = []): ModelResult<T> {
  return { ok: true, value, warnings };
}

export function invalidDomain<T>(field: string, message: string): ModelResult<T> {
  return { ok: false, error: { kind: "invalid_domain", field, message } };
}

export function divisionByZero<T>(field: string, message: string): ModelResult<T> {
  return { ok: false, error: { kind: "division_by_zero", field, message } };
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}
