// === CONSTANTS ===

export interface RegulatorConstants {
  supplyChangeDivisor: bigint; // D18{1}
  couponSupplyChangeDivisor: bigint; // D18{1}
  supplyChangeLimit: bigint; // D18{1} max fraction of net supply changed per epoch
  couponSupplyChangeLimit: bigint; // D18{1}
  bootstrappingPrice: bigint; // D18{USD/dollar}
  bootstrappingPeriod: number; // {epoch}
  oraclePoolRatio: bigint; // {%} of new supply paid to the pool
  treasuryRatio: bigint; // {bps} of new supply paid to the treasury
  debtRatioCap: bigint; // D18{1} max debt as a fraction of total supply
  maxCouponYield: bigint; // D18{coupon/dollar}
  maxCouponExpiry: number; // {epoch} offset
}

// === COLLABORATORS ===

export interface OracleCapture {
  price: bigint; // D18{USD/dollar}
  valid: boolean;
}

export interface Oracle {
  capture(): OracleCapture;
}

export interface SupplyIncrease {
  newRedeemable: bigint; // {dollar}
  newBonded: bigint; // {dollar} including pool and treasury rewards
}

export interface Ledger {
  balanceOf(account: string): bigint;
  burnFromAccount(account: string, amount: bigint): void;
  incrementBalanceOfCoupons(account: string, epoch: number, amount: bigint): void;

  totalDebt(): bigint;
  totalRedeemable(): bigint;
  totalCoupons(): bigint;
  totalNet(): bigint;

  increaseSupply(amount: bigint): SupplyIncrease;
  /** @returns {dollar} The debt actually added, after any cap */
  increaseDebt(amount: bigint): bigint;
  /** @returns {dollar} The debt that was erased */
  setDebtToZero(): bigint;

  /** Run `work`; if it throws, every mutation made inside it is undone */
  atomically<T>(work: () => T): T;
}

export interface Epochs {
  epoch(): number;
  bootstrappingAt(epoch: number): boolean;
}

// === AUCTION ===

export interface CouponBidInput {
  bidder: string;
  couponExpiryEpoch: number; // {epoch} offset from settlement
  dollarAmount: bigint; // {dollar}
  couponAmount: bigint; // {coupon}
}

export interface CouponBid extends CouponBidInput {
  index: number; // submission order
  distance: bigint; // D18{1}
  selected: boolean;
  rejected: boolean;
}

/**
 * Aggregates written once when an auction settles
 *
 * @param totalBids Bids pending at settlement
 * @param totalFilled Bids accepted
 * @param totalAuctionFilled {dollar} Dollars burned
 * @param totalBurnFilled {dollar} Dollars burned plus coupons granted
 * @param sumYieldFilled D18{coupon/dollar} Sum over accepted bids
 * @param sumExpiryFilled {epoch} Sum over accepted bids
 * @param avgYieldFilled D18{coupon/dollar}
 * @param avgExpiryFilled D18{epoch}
 * @param bidToCover D18{%} totalBids / totalFilled * 100
 */
export interface AuctionStats {
  totalBids: number;
  totalFilled: number;
  totalAuctionFilled: bigint;
  totalBurnFilled: bigint;
  sumYieldFilled: bigint;
  sumExpiryFilled: bigint;
  avgYieldFilled: bigint;
  avgExpiryFilled: bigint;
  minYieldFilled: bigint;
  maxYieldFilled: bigint;
  minExpiryFilled: number;
  maxExpiryFilled: number;
  bidToCover: bigint;
}

export interface CouponAuction {
  epoch: number;
  isInit: boolean;
  isCanceled: boolean;
  isFinished: boolean;
  bids: CouponBid[];

  // bounds over the pending bids, kept up to date as bids arrive
  minDollarAmount: bigint;
  maxDollarAmount: bigint;
  minExpiry: number;
  maxExpiry: number;
  minYield: bigint; // D18{coupon/dollar}
  maxYield: bigint; // D18{coupon/dollar}

  stats: AuctionStats;
}

// === EVENTS ===

export interface SupplyIncreaseEvent {
  epoch: number;
  price: bigint;
  newRedeemable: bigint;
  lessDebt: bigint;
  newBonded: bigint;
}

export interface SupplyDecreaseEvent {
  epoch: number;
  price: bigint;
  newDebt: bigint;
}

export interface SupplyNeutralEvent {
  epoch: number;
}

export interface CouponBidPlacedEvent {
  epoch: number;
  bidder: string;
  couponExpiryEpoch: number;
  dollarAmount: bigint;
  couponAmount: bigint;
}

export interface CouponAuctionSettledEvent {
  epoch: number;
  stats: AuctionStats;
}

export interface RegulatorEvents {
  SupplyIncrease: [SupplyIncreaseEvent];
  SupplyDecrease: [SupplyDecreaseEvent];
  SupplyNeutral: [SupplyNeutralEvent];
  CouponBidPlaced: [CouponBidPlacedEvent];
  CouponAuctionSettled: [CouponAuctionSettledEvent];
}

// === STEP ===

export enum SupplyDirection {
  NEUTRAL = 0,
  INCREASE = 1,
  DECREASE = 2,
}

export type StepResult =
  | ({ direction: SupplyDirection.INCREASE; canceledAuction: boolean } & SupplyIncreaseEvent)
  | ({ direction: SupplyDirection.DECREASE; settledAuction: boolean } & SupplyDecreaseEvent)
  | ({ direction: SupplyDirection.NEUTRAL; price: bigint } & SupplyNeutralEvent);
