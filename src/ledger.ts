import { mul } from "./fixed-point";
import { LedgerError } from "./errors";
import { Ledger, SupplyIncrease } from "./types";

export interface LedgerConfig {
  oraclePoolRatio: bigint; // {%}
  treasuryRatio: bigint; // {bps}
  debtRatioCap: bigint; // D18{1}
  poolAccount?: string;
  treasuryAccount?: string;
  daoAccount?: string;
}

interface LedgerTotals {
  supply: bigint;
  bonded: bigint;
  redeemable: bigint;
  debt: bigint;
  coupons: bigint;
}

/**
 * Dollar and coupon accounting kept in memory
 *
 * New supply goes, in order: pool and treasury rewards, then the redeemable pool up to the
 * outstanding coupons, then bonded holders. All amounts are {dollar}, D18 token units.
 *
 * Inside atomically() every write records its inverse, so a rollback touches only what the
 * work changed.
 */
export class InMemoryLedger implements Ledger {
  readonly poolAccount: string;
  readonly treasuryAccount: string;
  readonly daoAccount: string;

  private readonly balances = new Map<string, bigint>();
  private readonly coupons = new Map<string, Map<number, bigint>>();
  private readonly totals: LedgerTotals = { supply: 0n, bonded: 0n, redeemable: 0n, debt: 0n, coupons: 0n };

  private journal: (() => void)[] | undefined;

  constructor(private readonly config: LedgerConfig) {
    this.poolAccount = config.poolAccount ?? "pool";
    this.treasuryAccount = config.treasuryAccount ?? "treasury";
    this.daoAccount = config.daoAccount ?? "dao";
  }

  // === balances ===

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  balanceOfCoupons(account: string, epoch: number): bigint {
    return this.coupons.get(account)?.get(epoch) ?? 0n;
  }

  mint(account: string, amount: bigint): void {
    this.setBalance(account, this.balanceOf(account) + amount);
    this.setTotal("supply", this.totals.supply + amount);
  }

  burnFromAccount(account: string, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new LedgerError("burn amount exceeds balance", account);
    }
    if (this.totals.debt < amount) {
      throw new LedgerError("not enough outstanding debt");
    }

    this.setBalance(account, balance - amount);
    this.setTotal("supply", this.totals.supply - amount);
    this.setTotal("debt", this.totals.debt - amount);
  }

  incrementBalanceOfCoupons(account: string, epoch: number, amount: bigint): void {
    this.setCoupons(account, epoch, this.balanceOfCoupons(account, epoch) + amount);
    this.setTotal("coupons", this.totals.coupons + amount);
  }

  /**
   * Mint `amount` to the DAO and count it as bonded
   */
  incrementTotalBonded(amount: bigint): void {
    this.mint(this.daoAccount, amount);
    this.setTotal("bonded", this.totals.bonded + amount);
  }

  // === totals ===

  totalSupply(): bigint {
    return this.totals.supply;
  }

  totalBonded(): bigint {
    return this.totals.bonded;
  }

  totalDebt(): bigint {
    return this.totals.debt;
  }

  totalRedeemable(): bigint {
    return this.totals.redeemable;
  }

  totalCoupons(): bigint {
    return this.totals.coupons;
  }

  totalNet(): bigint {
    return this.totals.supply - this.totals.debt;
  }

  // === supply ===

  increaseSupply(amount: bigint): SupplyIncrease {
    // 0-a. pool reward
    const poolReward = (amount * this.config.oraclePoolRatio) / 100n;
    this.mint(this.poolAccount, poolReward);

    // 0-b. treasury reward
    const treasuryReward = (amount * this.config.treasuryRatio) / 10000n;
    this.mint(this.treasuryAccount, treasuryReward);

    const rewards = poolReward + treasuryReward;
    let newSupply = amount > rewards ? amount - rewards : 0n;

    // 1. true up the redeemable pool
    let newRedeemable = 0n;
    if (this.totals.redeemable < this.totals.coupons) {
      newRedeemable = this.totals.coupons - this.totals.redeemable;
      newRedeemable = newRedeemable > newSupply ? newSupply : newRedeemable;
      this.mint(this.daoAccount, newRedeemable);
      this.setTotal("redeemable", this.totals.redeemable + newRedeemable);
      newSupply -= newRedeemable;
    }

    // 2. the rest to bonded holders, if there are any
    if (this.totals.bonded === 0n) {
      newSupply = 0n;
    }
    if (newSupply > 0n) {
      this.incrementTotalBonded(newSupply);
    }

    return { newRedeemable, newBonded: newSupply + rewards };
  }

  increaseDebt(amount: bigint): bigint {
    const cap = mul(this.totals.supply, this.config.debtRatioCap);
    const room = cap > this.totals.debt ? cap - this.totals.debt : 0n;
    const added = amount > room ? room : amount;

    this.setTotal("debt", this.totals.debt + added);
    return added;
  }

  setDebtToZero(): bigint {
    const lessDebt = this.totals.debt;
    this.setTotal("debt", 0n);
    return lessDebt;
  }

  /**
   * Run `work`, undoing its writes in reverse order if it throws
   *
   * Nested calls share the outer journal and undo only their own writes.
   */
  atomically<T>(work: () => T): T {
    const outer = this.journal;
    const journal = outer ?? [];
    const mark = journal.length;

    this.journal = journal;
    try {
      return work();
    } catch (e) {
      for (const undo of journal.splice(mark).reverse()) {
        undo();
      }
      throw e;
    } finally {
      this.journal = outer;
    }
  }

  // === writes ===

  private setBalance(account: string, value: bigint): void {
    const previous = this.balances.get(account);
    this.journal?.push(() => {
      if (previous === undefined) {
        this.balances.delete(account);
      } else {
        this.balances.set(account, previous);
      }
    });
    this.balances.set(account, value);
  }

  private setCoupons(account: string, epoch: number, value: bigint): void {
    const byEpoch = this.coupons.get(account) ?? new Map<number, bigint>();
    const previous = byEpoch.get(epoch);
    this.journal?.push(() => {
      if (previous === undefined) {
        byEpoch.delete(epoch);
      } else {
        byEpoch.set(epoch, previous);
      }
    });
    byEpoch.set(epoch, value);
    this.coupons.set(account, byEpoch);
  }

  private setTotal(key: keyof LedgerTotals, value: bigint): void {
    const previous = this.totals[key];
    this.journal?.push(() => {
      this.totals[key] = previous;
    });
    this.totals[key] = value;
  }
}
