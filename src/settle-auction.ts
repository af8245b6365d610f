import { D256_MAXn } from "./numbers";
import { absDiff, add, cappedRatio, from, mul, pow, ratio, sqrt, sub } from "./fixed-point";
import { bidYield, emptyStats } from "./auction-book";
import { AuctionStats, CouponAuction, CouponBid, Ledger } from "./types";

/**
 * What an axis whose bids are all equal contributes to the distance
 *
 * - "ignore-axis": nothing, so a single-bid auction settles with distance 0
 * - "throw": DivisionByZeroError, like the unguarded normalization
 */
export type ZeroRangePolicy = "ignore-axis" | "throw";

export interface SettleOptions {
  zeroRange?: ZeroRangePolicy;
  debug?: boolean;
}

export interface NormalizationRanges {
  yieldRelNorm: bigint; // D18{coupon/dollar}
  expiryRelNorm: bigint; // {epoch}
  dollarRelNorm: bigint; // {dollar}
}

export interface SettlementResult {
  settled: boolean;
  stats: AuctionStats;
  ranked: CouponBid[]; // copies, in the order they were evaluated
}

export const getNormalizationRanges = (auction: CouponAuction): NormalizationRanges => ({
  yieldRelNorm: sub(auction.maxYield, auction.minYield),
  expiryRelNorm: BigInt(auction.maxExpiry - auction.minExpiry),
  dollarRelNorm: sub(auction.maxDollarAmount, auction.minDollarAmount),
});

const TWO = from(2);

/**
 * D18{1} Largest value a normalized axis takes
 *
 * Three squared axes at this value, scaled for sqrt, stay under 2^256.
 */
export const MAX_AXIS_DISTANCE = 10n ** 38n;

/**
 * Distance of a bid from the ideal bid, D18{1}
 *
 * sqrt(yieldRel² + expiryRel² + dollarRel²) where
 *   yieldRel  = yield / yieldRelNorm
 *   expiryRel = expiry / expiryRelNorm
 *   dollarRel = |2 - dollarAmount / dollarRelNorm|
 *
 * Each axis is held at MAX_AXIS_DISTANCE, so bids spread over a range of a few wei still
 * rank. Lower is better.
 */
export const getBidDistance = (
  bid: CouponBid,
  ranges: NormalizationRanges,
  zeroRange: ZeroRangePolicy = "ignore-axis",
): bigint => {
  const normalize = (value: bigint, range: bigint): bigint | undefined => {
    if (range === 0n && zeroRange === "ignore-axis") {
      return undefined;
    }
    return cappedRatio(value, range, MAX_AXIS_DISTANCE);
  };

  const yieldRel = normalize(bidYield(bid), ranges.yieldRelNorm) ?? 0n;
  const expiryRel = normalize(BigInt(bid.couponExpiryEpoch), ranges.expiryRelNorm) ?? 0n;

  const dollarRelMax = normalize(bid.dollarAmount, ranges.dollarRelNorm);
  // |2 - x| squares the same as 2 - x and never underflows
  const dollarRel = dollarRelMax === undefined ? 0n : absDiff(TWO, dollarRelMax);

  const sumOfSquared = add(add(pow(yieldRel, 2), pow(expiryRel, 2)), pow(dollarRel, 2));
  return sumOfSquared > 0n ? sqrt(sumOfSquared) : 0n;
};

/**
 * Rank bids by ascending distance
 *
 * Works on fresh copies. Array.prototype.sort is stable, so equal distances keep
 * submission order.
 */
export const rankBids = (auction: CouponAuction, zeroRange: ZeroRangePolicy = "ignore-axis"): CouponBid[] => {
  const ranges = getNormalizationRanges(auction);

  return auction.bids
    .map((bid) => ({ ...bid, distance: getBidDistance(bid, ranges, zeroRange) }))
    .sort((a, b) => (a.distance < b.distance ? -1 : a.distance > b.distance ? 1 : a.index - b.index));
};

/**
 * Settle a coupon auction against the outstanding debt
 *
 * Bids are filled in ranked order while total debt covers the next bid's dollar amount. The
 * first bid that does not fit is rejected and ends the fill: no partial fills and no looking
 * further down for smaller bids. A bidder whose balance no longer covers their bid is
 * rejected and skipped.
 *
 * Each fill burns the bid's dollars (which pays down debt) and grants its coupons, expiring
 * at `epoch + couponExpiryEpoch`.
 *
 * The auction record itself is left alone; pass the stats to AuctionBook.finish().
 *
 * @param epoch {epoch} Current epoch
 * @return SettlementResult, `settled` is false for a finished or canceled auction
 */
export const settleCouponAuction = (
  auction: CouponAuction,
  ledger: Ledger,
  epoch: number,
  options: SettleOptions = {},
): SettlementResult => {
  const { zeroRange = "ignore-axis", debug } = options;

  if (auction.isFinished || auction.isCanceled) {
    if (debug) {
      console.log("settleCouponAuction: skipping", auction.epoch);
    }
    return { settled: false, stats: auction.stats, ranked: [] };
  }

  // rank before touching the ledger so a bad range aborts cleanly
  const ranked = rankBids(auction, zeroRange);

  let totalFilled = 0;
  let totalAuctionFilled = 0n;
  let totalBurnFilled = 0n;
  let sumYieldFilled = 0n;
  let sumExpiryFilled = 0n;
  let minYieldFilled = D256_MAXn;
  let maxYieldFilled = 0n;
  let minExpiryFilled = Number.MAX_SAFE_INTEGER;
  let maxExpiryFilled = 0;

  for (const bid of ranked) {
    if (ledger.totalDebt() < bid.dollarAmount) {
      bid.rejected = true;
      break;
    }

    if (ledger.balanceOf(bid.bidder) < bid.dollarAmount) {
      if (debug) {
        console.log("settleCouponAuction: bidder cannot cover bid", bid.bidder, bid.dollarAmount);
      }
      bid.rejected = true;
      continue;
    }

    const yieldD18 = bidYield(bid);

    ledger.burnFromAccount(bid.bidder, bid.dollarAmount);
    ledger.incrementBalanceOfCoupons(bid.bidder, epoch + bid.couponExpiryEpoch, bid.couponAmount);
    bid.selected = true;

    totalFilled++;
    totalAuctionFilled = add(totalAuctionFilled, bid.dollarAmount);
    totalBurnFilled = add(totalBurnFilled, add(bid.dollarAmount, bid.couponAmount));
    sumYieldFilled = add(sumYieldFilled, yieldD18);
    sumExpiryFilled += BigInt(bid.couponExpiryEpoch);
    if (yieldD18 < minYieldFilled) minYieldFilled = yieldD18;
    if (yieldD18 > maxYieldFilled) maxYieldFilled = yieldD18;
    if (bid.couponExpiryEpoch < minExpiryFilled) minExpiryFilled = bid.couponExpiryEpoch;
    if (bid.couponExpiryEpoch > maxExpiryFilled) maxExpiryFilled = bid.couponExpiryEpoch;
  }

  const stats: AuctionStats = { ...emptyStats(), totalBids: ranked.length };

  if (totalFilled > 0) {
    const filled = BigInt(totalFilled);

    stats.totalFilled = totalFilled;
    stats.totalAuctionFilled = totalAuctionFilled;
    stats.totalBurnFilled = totalBurnFilled;
    stats.sumYieldFilled = sumYieldFilled;
    stats.sumExpiryFilled = sumExpiryFilled;
    stats.minYieldFilled = minYieldFilled;
    stats.maxYieldFilled = maxYieldFilled;
    stats.minExpiryFilled = minExpiryFilled;
    stats.maxExpiryFilled = maxExpiryFilled;

    // D18{coupon/dollar} = D18{coupon/dollar} / {1}
    stats.avgYieldFilled = sumYieldFilled / filled;
    stats.avgExpiryFilled = ratio(sumExpiryFilled, filled);
    // D18{%} = D18{1} * D18{%/1} / D18
    stats.bidToCover = mul(ratio(BigInt(ranked.length), filled), from(100));
  }

  if (debug) {
    console.log("settleCouponAuction", auction.epoch, stats);
  }

  return { settled: true, stats, ranked };
};
