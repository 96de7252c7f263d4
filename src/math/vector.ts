/**
 * Vector and matrix helpers. Binary operations require equal lengths and
 * throw `ShapeMismatchError` instead of truncating or padding.
 */

import { EmptyVectorError, ShapeMismatchError } from "../errors";
import { Matrix, Vector } from "../types";

function assertSameLength(
  op: string,
  a: readonly number[],
  b: readonly number[],
): void {
  if (a.length !== b.length) throw new ShapeMismatchError(op, a.length, b.length);
}

export function zeros(n: number): Vector {
  return new Array<number>(n).fill(0);
}

export function zerosLike(m: readonly (readonly number[])[]): Matrix {
  return m.map((row) => zeros(row.length));
}

export function dot(a: readonly number[], b: readonly number[]): number {
  assertSameLength("dot", a, b);
  let s = 0;
  for (let i = 0; i < a.length; i++) s += a[i]! * b[i]!;
  return s;
}

export function add(a: readonly number[], b: readonly number[]): Vector {
  assertSameLength("add", a, b);
  return a.map((v, i) => v + b[i]!);
}

export function subtract(a: readonly number[], b: readonly number[]): Vector {
  assertSameLength("subtract", a, b);
  return a.map((v, i) => v - b[i]!);
}

export function hadamard(a: readonly number[], b: readonly number[]): Vector {
  assertSameLength("hadamard", a, b);
  return a.map((v, i) => v * b[i]!);
}

/** a ⊗ b: rows follow `a`, columns follow `b`. */
export function outer(a: readonly number[], b: readonly number[]): Matrix {
  return a.map((ai) => b.map((bj) => ai * bj));
}

export function mean(a: readonly number[]): number {
  if (a.length === 0) throw new EmptyVectorError("mean");
  let s = 0;
  for (const v of a) s += v;
  return s / a.length;
}

/** Scale to unit L2 norm; the zero vector is returned unchanged. */
export function normalize(a: readonly number[]): Vector {
  if (a.length === 0) throw new EmptyVectorError("normalize");
  const norm = Math.sqrt(dot(a, a));
  if (norm === 0) return a.slice();
  return a.map((v) => v / norm);
}

/** Index of the largest entry (first on ties), or -1 for an empty vector. */
export function argMax(a: readonly number[]): number {
  if (a.length === 0) return -1;
  let best = 0;
  for (let i = 1; i < a.length; i++) {
    if (a[i]! > a[best]!) best = i;
  }
  return best;
}

/**
 * Fraction of rows whose argMax matches the target's argMax.
 * Empty or mismatched sets score 0.
 */
export function accuracy(
  predictions: readonly (readonly number[])[],
  targets: readonly (readonly number[])[],
): number {
  if (predictions.length === 0 || predictions.length !== targets.length) return 0;
  let correct = 0;
  predictions.forEach((p, i) => {
    if (argMax(p) === argMax(targets[i]!)) correct++;
  });
  return correct / predictions.length;
}

/** True if any entry is NaN or ±Infinity. */
export function hasNonFinite(data: readonly number[] | readonly (readonly number[])[]): boolean {
  for (const v of data) {
    if (typeof v === "number") {
      if (!Number.isFinite(v)) return true;
    } else if (hasNonFinite(v)) {
      return true;
    }
  }
  return false;
}

export function cloneMatrix(m: readonly (readonly number[])[]): Matrix {
  return m.map((r) => r.slice());
}
