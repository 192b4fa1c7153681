import { invalidDomain, isFiniteNumber, ok, type ModelResult } from "@/lib/modelResult";

export function validateTable(xs: readonly number[], ys: readonly number[]): ModelResult<void> {
  if (!xs.length) return invalidDomain("xs", "Table must contain at least one point.");
  if (xs.length !== ys.length) {
    return invalidDomain("ys", `Table columns differ in length (${xs.length} vs ${ys.length}).`);
  }
  if (!xs.every(isFiniteNumber) || !ys.every(isFiniteNumber)) {
    return invalidDomain("xs", "Table values must be finite numbers.");
  }
  for (let i = 1; i < xs.length; i += 1) {
    if (xs[i]! <= xs[i - 1]!) return invalidDomain("xs", "Table x values must be strictly increasing.");
  }
  return ok(undefined);
}

/**
 * Piecewise-linear lookup. Clamps to the end values outside the table; table
 * points return their y value exactly. Assumes `validateTable` passed.
 */
export function interpolate(x: number, xsAscending: readonly number[], ys: readonly number[]): number {
  const n = xsAscending.length;
  if (x <= xsAscending[0]!) return ys[0]!;
  if (x >= xsAscending[n - 1]!) return ys[n - 1]!;

  let hi = 1;
  while (xsAscending[hi]! < x) hi += 1;
  const x1 = xsAscending[hi]!;
  if (x1 === x) return ys[hi]!;

  const x0 = xsAscending[hi - 1]!;
  const y0 = ys[hi - 1]!;
  const y1 = ys[hi]!;
  return y0 + ((x - x0) / (x1 - x0)) * (y1 - y0);
}

/** Checked `interpolate` for tables that have not been through `validateTable`. */
export function interpolateTable(
  x: number,
  xsAscending: readonly number[],
  ys: readonly number[],
): ModelResult<number> {
  if (!isFiniteNumber(x)) return invalidDomain("x", "Lookup value must be a finite number.");
  const table = validateTable(xsAscending, ys);
  if (!table.ok) return table;
  return ok(interpolate(x, xsAscending, ys));
}
