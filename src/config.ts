import * as dotenv from "dotenv";

import { d18 } from "./numbers";
import { ConfigError } from "./errors";
import { RegulatorConstants } from "./types";

export const DEFAULT_CONSTANTS: RegulatorConstants = {
  supplyChangeDivisor: d18("1"),
  couponSupplyChangeDivisor: d18("1"),
  supplyChangeLimit: d18("0.03"),
  couponSupplyChangeLimit: d18("0.06"),
  bootstrappingPrice: d18("1.1"),
  bootstrappingPeriod: 90,
  oraclePoolRatio: 20n,
  treasuryRatio: 250n,
  debtRatioCap: d18("0.15"),
  maxCouponYield: d18("10"),
  maxCouponExpiry: 1_000_000,
};

type Parser<T> = (key: string, raw: string) => T;

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;
const INTEGER_PATTERN = /^\d+$/;

const parseD18: Parser<bigint> = (key, raw) => {
  if (!DECIMAL_PATTERN.test(raw)) {
    throw new ConfigError(key, raw, "expected a non-negative decimal");
  }
  return d18(raw);
};

const parsePositiveD18: Parser<bigint> = (key, raw) => {
  const value = parseD18(key, raw);
  if (value === 0n) {
    throw new ConfigError(key, raw, "must be greater than zero");
  }
  return value;
};

const parseInteger: Parser<bigint> = (key, raw) => {
  if (!INTEGER_PATTERN.test(raw)) {
    throw new ConfigError(key, raw, "expected a non-negative integer");
  }
  return BigInt(raw);
};

// uint32, so epoch + expiry and expiry sums stay exact as numbers
export const MAX_EPOCHS = 2 ** 32 - 1;

const parseEpochs: Parser<number> = (key, raw) => {
  const value = parseInteger(key, raw);
  if (value > BigInt(MAX_EPOCHS)) {
    throw new ConfigError(key, raw, `must be at most ${MAX_EPOCHS}`);
  }
  return Number(value);
};

const parsePercent: Parser<bigint> = (key, raw) => {
  const value = parseInteger(key, raw);
  if (value > 100n) {
    throw new ConfigError(key, raw, "must be at most 100");
  }
  return value;
};

const parseBips: Parser<bigint> = (key, raw) => {
  const value = parseInteger(key, raw);
  if (value > 10000n) {
    throw new ConfigError(key, raw, "must be at most 10000");
  }
  return value;
};

const ENV_KEYS: { [K in keyof RegulatorConstants]: [string, Parser<RegulatorConstants[K]>] } = {
  supplyChangeDivisor: ["REGULATOR_SUPPLY_CHANGE_DIVISOR", parsePositiveD18],
  couponSupplyChangeDivisor: ["REGULATOR_COUPON_SUPPLY_CHANGE_DIVISOR", parsePositiveD18],
  supplyChangeLimit: ["REGULATOR_SUPPLY_CHANGE_LIMIT", parseD18],
  couponSupplyChangeLimit: ["REGULATOR_COUPON_SUPPLY_CHANGE_LIMIT", parseD18],
  bootstrappingPrice: ["REGULATOR_BOOTSTRAPPING_PRICE", parseD18],
  bootstrappingPeriod: ["REGULATOR_BOOTSTRAPPING_PERIOD", parseEpochs],
  oraclePoolRatio: ["REGULATOR_ORACLE_POOL_RATIO", parsePercent],
  treasuryRatio: ["REGULATOR_TREASURY_RATIO", parseBips],
  debtRatioCap: ["REGULATOR_DEBT_RATIO_CAP", parseD18],
  maxCouponYield: ["REGULATOR_MAX_COUPON_YIELD", parsePositiveD18],
  maxCouponExpiry: ["REGULATOR_MAX_COUPON_EXPIRY", parseEpochs],
};

const read = <K extends keyof RegulatorConstants>(
  env: NodeJS.ProcessEnv,
  name: K,
  debug?: boolean,
): RegulatorConstants[K] => {
  const [key, parse] = ENV_KEYS[name];
  const raw = env[key]?.trim();
  if (raw === undefined || raw === "") {
    return DEFAULT_CONSTANTS[name];
  }

  if (debug) {
    console.log("loadConstants", key, raw);
  }
  return parse(key, raw);
};

/**
 * Load the regulator constants from the environment
 *
 * Reads `.env` through dotenv when no environment is passed in. Unset variables take
 * DEFAULT_CONSTANTS. Decimal variables are written in whole units, e.g.
 * REGULATOR_SUPPLY_CHANGE_LIMIT=0.03
 *
 * @param env Variables to read instead of process.env
 */
export const loadConstants = (env?: NodeJS.ProcessEnv, debug?: boolean): RegulatorConstants => {
  if (env === undefined) {
    dotenv.config();
  }
  const source = env ?? process.env;

  const constants: RegulatorConstants = {
    supplyChangeDivisor: read(source, "supplyChangeDivisor", debug),
    couponSupplyChangeDivisor: read(source, "couponSupplyChangeDivisor", debug),
    supplyChangeLimit: read(source, "supplyChangeLimit", debug),
    couponSupplyChangeLimit: read(source, "couponSupplyChangeLimit", debug),
    bootstrappingPrice: read(source, "bootstrappingPrice", debug),
    bootstrappingPeriod: read(source, "bootstrappingPeriod", debug),
    oraclePoolRatio: read(source, "oraclePoolRatio", debug),
    treasuryRatio: read(source, "treasuryRatio", debug),
    debtRatioCap: read(source, "debtRatioCap", debug),
    maxCouponYield: read(source, "maxCouponYield", debug),
    maxCouponExpiry: read(source, "maxCouponExpiry", debug),
  };

  if (constants.oraclePoolRatio * 100n + constants.treasuryRatio > 10000n) {
    throw new ConfigError(
      "REGULATOR_TREASURY_RATIO",
      constants.treasuryRatio.toString(),
      "pool and treasury rewards exceed new supply",
    );
  }

  if (debug) {
    console.log("loadConstants", constants);
  }

  return constants;
};

/**
 * Fill in whatever `overrides` leaves out with DEFAULT_CONSTANTS
 */
export const withDefaults = (overrides: Partial<RegulatorConstants> = {}): RegulatorConstants => {
  return { ...DEFAULT_CONSTANTS, ...overrides };
};
