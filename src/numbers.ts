import DecimalLight from "decimal.js-light";
import type { Decimal as DecimalType } from "decimal.js-light";

// precision well past 2^256 so D18 values convert exactly
export const Decimal = DecimalLight.clone({ precision: 100 });

export const D18n: bigint = 10n ** 18n;
export const D256_MAXn: bigint = 2n ** 256n - 1n;

export const D18d: DecimalType = new Decimal("1e18");

export const bn = (str: string | DecimalType): bigint => {
  return BigInt(new Decimal(str).toFixed(0));
};

/**
 * Parse a human decimal string into D18
 *
 * @param str {1} e.g. "1.05"
 * @returns D18{1}
 */
export const d18 = (str: string | number): bigint => {
  return bn(new Decimal(str).mul(D18d));
};
