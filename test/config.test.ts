import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import { DEFAULT_CONSTANTS, MAX_EPOCHS, loadConstants, withDefaults } from "../src/config";
import { ConfigError } from "../src/errors";

describe("loadConstants", () => {
  it("falls back to defaults for unset and blank variables", () => {
    assert.deepEqual(loadConstants({}), DEFAULT_CONSTANTS);
    assert.deepEqual(loadConstants({ REGULATOR_SUPPLY_CHANGE_LIMIT: "  " }), DEFAULT_CONSTANTS);
  });

  it("has the expected defaults", () => {
    assert.equal(DEFAULT_CONSTANTS.supplyChangeLimit, 30000000000000000n);
    assert.equal(DEFAULT_CONSTANTS.couponSupplyChangeLimit, 60000000000000000n);
    assert.equal(DEFAULT_CONSTANTS.bootstrappingPrice, 1100000000000000000n);
    assert.equal(DEFAULT_CONSTANTS.debtRatioCap, 150000000000000000n);
  });

  it("parses decimal and integer variables", () => {
    const constants = loadConstants({
      REGULATOR_SUPPLY_CHANGE_LIMIT: "0.05",
      REGULATOR_COUPON_SUPPLY_CHANGE_DIVISOR: "2",
      REGULATOR_BOOTSTRAPPING_PRICE: "1.25",
      REGULATOR_BOOTSTRAPPING_PERIOD: "5",
      REGULATOR_TREASURY_RATIO: "100",
    });

    assert.equal(constants.supplyChangeLimit, 50000000000000000n);
    assert.equal(constants.couponSupplyChangeDivisor, 2000000000000000000n);
    assert.equal(constants.bootstrappingPrice, 1250000000000000000n);
    assert.equal(constants.bootstrappingPeriod, 5);
    assert.equal(constants.treasuryRatio, 100n);
    assert.equal(constants.supplyChangeDivisor, DEFAULT_CONSTANTS.supplyChangeDivisor);
  });

  it("rejects malformed values", () => {
    assert.throws(() => loadConstants({ REGULATOR_SUPPLY_CHANGE_LIMIT: "3%" }), ConfigError);
    assert.throws(() => loadConstants({ REGULATOR_SUPPLY_CHANGE_LIMIT: "-0.1" }), ConfigError);
    assert.throws(() => loadConstants({ REGULATOR_BOOTSTRAPPING_PERIOD: "1.5" }), ConfigError);
    assert.throws(() => loadConstants({ REGULATOR_ORACLE_POOL_RATIO: "101" }), ConfigError);
  });

  it("keeps epoch counts within uint32", () => {
    assert.equal(loadConstants({ REGULATOR_MAX_COUPON_EXPIRY: "4294967295" }).maxCouponExpiry, MAX_EPOCHS);
    assert.throws(
      () => loadConstants({ REGULATOR_MAX_COUPON_EXPIRY: "4294967296" }),
      (e: unknown) => e instanceof ConfigError && e.details.key === "REGULATOR_MAX_COUPON_EXPIRY",
    );
  });

  it("rejects a zero divisor", () => {
    assert.throws(
      () => loadConstants({ REGULATOR_SUPPLY_CHANGE_DIVISOR: "0" }),
      (e: unknown) => e instanceof ConfigError && e.details.key === "REGULATOR_SUPPLY_CHANGE_DIVISOR",
    );
  });

  it("rejects rewards larger than the new supply", () => {
    assert.throws(
      () => loadConstants({ REGULATOR_ORACLE_POOL_RATIO: "99", REGULATOR_TREASURY_RATIO: "200" }),
      ConfigError,
    );
  });
});

describe("withDefaults", () => {
  it("overrides only what is given", () => {
    const constants = withDefaults({ bootstrappingPeriod: 5 });
    assert.equal(constants.bootstrappingPeriod, 5);
    assert.equal(constants.supplyChangeLimit, DEFAULT_CONSTANTS.supplyChangeLimit);
  });
});
