import { describe, it, beforeEach } from "node:test";
import { strict as assert } from "node:assert";

import { d18 } from "../src/numbers";
import { InMemoryLedger } from "../src/ledger";
import { LedgerError } from "../src/errors";

describe("InMemoryLedger", () => {
  let ledger: InMemoryLedger;

  beforeEach(() => {
    ledger = new InMemoryLedger({ oraclePoolRatio: 20n, treasuryRatio: 250n, debtRatioCap: d18("0.15") });
  });

  describe("increaseSupply", () => {
    beforeEach(() => {
      ledger.incrementTotalBonded(1_000_000n);
    });

    it("pays rewards then bonded holders", () => {
      assert.deepEqual(ledger.increaseSupply(30_000n), { newRedeemable: 0n, newBonded: 30_000n });

      assert.equal(ledger.balanceOf("pool"), 6_000n);
      assert.equal(ledger.balanceOf("treasury"), 750n);
      assert.equal(ledger.balanceOf("dao"), 1_023_250n);
      assert.equal(ledger.totalBonded(), 1_023_250n);
      assert.equal(ledger.totalSupply(), 1_030_000n);
    });

    it("fills the redeemable pool up to the outstanding coupons", () => {
      ledger.incrementBalanceOfCoupons("holder", 20, 2_000n);

      assert.deepEqual(ledger.increaseSupply(10_000n), { newRedeemable: 2_000n, newBonded: 8_000n });
      assert.equal(ledger.totalRedeemable(), 2_000n);
    });

    it("sends everything past the rewards to redemption when coupons exceed it", () => {
      ledger.incrementBalanceOfCoupons("holder", 20, 100_000n);

      assert.deepEqual(ledger.increaseSupply(50_000n), { newRedeemable: 38_750n, newBonded: 11_250n });
      assert.equal(ledger.totalBonded(), 1_000_000n);
    });
  });

  it("mints only rewards when nothing is bonded", () => {
    ledger.mint("holder", 1_000n);

    assert.deepEqual(ledger.increaseSupply(1_000n), { newRedeemable: 0n, newBonded: 225n });
    assert.equal(ledger.totalSupply(), 1_225n);
  });

  it("caps debt at the debt ratio of total supply", () => {
    ledger.mint("holder", 100_000n);

    assert.equal(ledger.increaseDebt(20_000n), 15_000n);
    assert.equal(ledger.increaseDebt(1n), 0n);
    assert.equal(ledger.totalDebt(), 15_000n);
  });

  it("burns against balance and debt", () => {
    ledger.mint("holder", 100_000n);
    ledger.increaseDebt(15_000n);

    assert.throws(
      () => ledger.burnFromAccount("holder", 200_000n),
      (e: unknown) =>
        e instanceof LedgerError &&
        e.code === "E-LEDGER" &&
        e.details.account === "holder" &&
        e.message === "burn amount exceeds balance of holder",
    );
    assert.throws(
      () => ledger.burnFromAccount("holder", 16_000n),
      (e: unknown) => e instanceof LedgerError && e.message === "not enough outstanding debt",
    );

    ledger.burnFromAccount("holder", 5_000n);
    assert.equal(ledger.balanceOf("holder"), 95_000n);
    assert.equal(ledger.totalSupply(), 95_000n);
    assert.equal(ledger.totalDebt(), 10_000n);
    assert.equal(ledger.totalNet(), 85_000n);
  });

  it("erases all debt at once", () => {
    ledger.mint("holder", 100_000n);
    ledger.increaseDebt(10_000n);

    assert.equal(ledger.setDebtToZero(), 10_000n);
    assert.equal(ledger.totalDebt(), 0n);
  });

  it("keys coupons by expiry epoch", () => {
    ledger.incrementBalanceOfCoupons("holder", 18, 52n);
    ledger.incrementBalanceOfCoupons("holder", 18, 8n);
    ledger.incrementBalanceOfCoupons("holder", 58, 110n);

    assert.equal(ledger.balanceOfCoupons("holder", 18), 60n);
    assert.equal(ledger.balanceOfCoupons("holder", 58), 110n);
    assert.equal(ledger.balanceOfCoupons("holder", 19), 0n);
    assert.equal(ledger.totalCoupons(), 170n);
  });

  describe("atomically", () => {
    it("returns the work's result", () => {
      assert.equal(
        ledger.atomically(() => {
          ledger.mint("holder", 5n);
          return "done";
        }),
        "done",
      );
      assert.equal(ledger.balanceOf("holder"), 5n);
    });

    it("undoes every change when the work throws", () => {
      ledger.mint("holder", 1_000n);
      ledger.increaseDebt(100n);

      assert.throws(
        () =>
          ledger.atomically(() => {
            ledger.burnFromAccount("holder", 100n);
            ledger.incrementBalanceOfCoupons("holder", 18, 120n);
            throw new Error("boom");
          }),
        /boom/,
      );

      assert.equal(ledger.balanceOf("holder"), 1_000n);
      assert.equal(ledger.totalSupply(), 1_000n);
      assert.equal(ledger.totalDebt(), 100n);
      assert.equal(ledger.balanceOfCoupons("holder", 18), 0n);
      assert.equal(ledger.totalCoupons(), 0n);
    });

    it("drops a new account and coupon epoch on rollback", () => {
      assert.throws(() =>
        ledger.atomically(() => {
          ledger.mint("newcomer", 10n);
          ledger.incrementBalanceOfCoupons("newcomer", 30, 5n);
          throw new Error("boom");
        }),
      );

      assert.equal(ledger.balanceOf("newcomer"), 0n);
      assert.equal(ledger.balanceOfCoupons("newcomer", 30), 0n);
      assert.equal(ledger.totalSupply(), 0n);
    });

    it("undoes only the inner work when a nested call fails", () => {
      ledger.atomically(() => {
        ledger.mint("holder", 100n);
        assert.throws(() =>
          ledger.atomically(() => {
            ledger.mint("holder", 50n);
            ledger.incrementTotalBonded(7n);
            throw new Error("inner");
          }),
        );
        assert.equal(ledger.balanceOf("holder"), 100n);
        ledger.mint("holder", 1n);
      });

      assert.equal(ledger.balanceOf("holder"), 101n);
      assert.equal(ledger.totalBonded(), 0n);
      assert.equal(ledger.totalSupply(), 101n);
    });

    it("keeps writes made outside any atomic block", () => {
      ledger.mint("holder", 3n);
      assert.throws(() =>
        ledger.atomically(() => {
          throw new Error("boom");
        }),
      );
      assert.equal(ledger.balanceOf("holder"), 3n);
    });
  });
});
