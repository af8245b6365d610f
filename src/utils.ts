import { Decimal, D18d } from "./numbers";
import { DivisionByZeroError } from "./errors";
import { CouponAuction } from "./types";

/**
 * Useful metrics to use to visualize a settled auction
 *
 * @param totalBids Bids pending at settlement
 * @param totalFilled Bids accepted
 * @param fillRate {1} totalFilled / totalBids
 * @param dollarsBurned {USD} Whole dollars burned
 * @param couponsIssued {USD} Whole coupons granted
 * @param avgYield {1} Average coupons per dollar of the accepted bids
 * @param avgExpiry {epoch} Average expiry offset of the accepted bids
 * @param bidToCover {%} Pending bids per accepted bid, times 100
 */
export interface AuctionMetrics {
  epoch: number;
  totalBids: number;
  totalFilled: number;
  fillRate: number;
  dollarsBurned: number;
  couponsIssued: number;
  avgYield: number;
  avgExpiry: number;
  bidToCover: number;
}

/**
 * @param auction A finished auction
 * @param decimals Decimals of the dollar token
 */
export const getAuctionMetrics = (auction: CouponAuction, decimals = 18, debug?: boolean): AuctionMetrics => {
  if (debug) {
    console.log("getAuctionMetrics", auction.epoch, auction.stats);
  }

  const { stats } = auction;
  const decimalScale = new Decimal(`1e${decimals}`);

  // {USD} = {tok} / {tok/USD}
  const dollarsBurned = new Decimal(stats.totalAuctionFilled.toString()).div(decimalScale);
  const couponsIssued = new Decimal((stats.totalBurnFilled - stats.totalAuctionFilled).toString()).div(decimalScale);

  return {
    epoch: auction.epoch,
    totalBids: stats.totalBids,
    totalFilled: stats.totalFilled,
    fillRate: stats.totalBids === 0 ? 0 : new Decimal(stats.totalFilled).div(stats.totalBids).toNumber(),
    dollarsBurned: dollarsBurned.toNumber(),
    couponsIssued: couponsIssued.toNumber(),
    // {1} = D18{1} / D18
    avgYield: new Decimal(stats.avgYieldFilled.toString()).div(D18d).toNumber(),
    avgExpiry: new Decimal(stats.avgExpiryFilled.toString()).div(D18d).toNumber(),
    bidToCover: new Decimal(stats.bidToCover.toString()).div(D18d).toNumber(),
  };
};

/**
 * Fraction of net supply a step moved
 *
 * @param amount {tok} newDebt or new supply from a step
 * @param totalNet {tok} Net supply before the step
 * @returns {1}
 */
export const getSupplyChange = (amount: bigint, totalNet: bigint): number => {
  if (totalNet === 0n) {
    throw new DivisionByZeroError("zero net supply");
  }
  return new Decimal(amount.toString()).div(totalNet.toString()).toNumber();
};
