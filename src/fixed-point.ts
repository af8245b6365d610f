import { D18n, D256_MAXn } from "./numbers";
import { ArithmeticOverflowError, DivisionByZeroError } from "./errors";

/**
 * Unsigned fixed-point number: D18{1}
 *
 * Every value lives in [0, 2^256 - 1]. Results and intermediate products outside that
 * range throw ArithmeticOverflowError; a zero denominator throws DivisionByZeroError.
 */
export type D18 = bigint;

const checked = (value: bigint, context: string): bigint => {
  if (value < 0n || value > D256_MAXn) {
    throw new ArithmeticOverflowError(context);
  }
  return value;
};

export const zero = (): D18 => 0n;

export const one = (): D18 => D18n;

/**
 * @param n {1} Whole number
 * @returns D18{1}
 */
export const from = (n: bigint | number): D18 => {
  return checked(BigInt(n) * D18n, `from(${n})`);
};

/**
 * @returns {1} The integer part, rounded down
 */
export const asUint = (a: D18): bigint => a / D18n;

export const add = (a: D18, b: D18): D18 => checked(a + b, `${a} + ${b}`);

export const sub = (a: D18, b: D18): D18 => checked(a - b, `${a} - ${b}`);

export const mul = (a: D18, b: D18): D18 => checked(a * b, `${a} * ${b}`) / D18n;

/**
 * D18{1} = {x} * D18 / {y}, rounded down
 *
 * Works for two whole numbers as well as two D18 values, the scale cancels out.
 */
export const ratio = (numerator: bigint, denominator: bigint): D18 => {
  if (denominator === 0n) {
    throw new DivisionByZeroError(`${numerator} / 0`);
  }
  return checked(numerator * D18n, `${numerator} * 1e18`) / checked(denominator, `denominator ${denominator}`);
};

export const div = (a: D18, b: D18): D18 => ratio(a, b);

/**
 * ratio(numerator, denominator), held at `cap` when the quotient would exceed it
 *
 * Never overflows, whatever the size of the numerator.
 */
export const cappedRatio = (numerator: bigint, denominator: bigint, cap: D18): D18 => {
  if (denominator === 0n) {
    throw new DivisionByZeroError(`${numerator} / 0`);
  }
  const quotient = (numerator * D18n) / denominator;
  return quotient > cap ? cap : quotient;
};

export const pow = (a: D18, n: number): D18 => {
  let result = one();
  for (let i = 0; i < n; i++) {
    result = mul(result, a);
  }
  return result;
};

/**
 * Floor of the fixed-point square root
 *
 * Newton's method on the raw integer `a * 1e18`, seeded at (n + 1) / 2 and stopped at the
 * first estimate that does not decrease.
 */
export const sqrt = (a: D18): D18 => {
  const n = checked(a * D18n, `sqrt(${a})`);

  let y = n;
  let z = (n + 1n) / 2n;
  while (z < y) {
    y = z;
    z = (n / z + z) / 2n;
  }
  return y;
};

export const lessThan = (a: D18, b: D18): boolean => a < b;

export const greaterThan = (a: D18, b: D18): boolean => a > b;

export const equals = (a: D18, b: D18): boolean => a === b;

export const min = (a: D18, b: D18): D18 => (a < b ? a : b);

export const absDiff = (a: D18, b: D18): D18 => (a > b ? a - b : b - a);

