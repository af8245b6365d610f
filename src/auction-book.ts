import { ratio } from "./fixed-point";
import { AuctionError, ConfigError } from "./errors";
import { MAX_EPOCHS } from "./config";
import { AuctionStats, CouponAuction, CouponBid, CouponBidInput } from "./types";

export interface AuctionBookLimits {
  maxCouponYield: bigint; // D18{coupon/dollar}
  maxCouponExpiry: number; // {epoch}
}

export const emptyStats = (): AuctionStats => ({
  totalBids: 0,
  totalFilled: 0,
  totalAuctionFilled: 0n,
  totalBurnFilled: 0n,
  sumYieldFilled: 0n,
  sumExpiryFilled: 0n,
  avgYieldFilled: 0n,
  avgExpiryFilled: 0n,
  minYieldFilled: 0n,
  maxYieldFilled: 0n,
  minExpiryFilled: 0,
  maxExpiryFilled: 0,
  bidToCover: 0n,
});

/**
 * D18{coupon/dollar} = {coupon} * D18 / {dollar}
 */
export const bidYield = (bid: Pick<CouponBidInput, "couponAmount" | "dollarAmount">): bigint =>
  ratio(bid.couponAmount, bid.dollarAmount);

/**
 * Open auctions as they stood, and how many auctions existed
 *
 * Canceled and finished auctions never change again, so they are left out.
 */
export interface AuctionBookSnapshot {
  size: number;
  open: CouponAuction[];
}

/**
 * Coupon auctions keyed by the epoch that opened them
 *
 * The book only keeps records; deciding when to open, cancel and settle is the regulator's job.
 */
export class AuctionBook {
  private readonly auctions = new Map<number, CouponAuction>();

  constructor(private readonly limits: AuctionBookLimits) {
    if (!Number.isSafeInteger(limits.maxCouponExpiry) || limits.maxCouponExpiry > MAX_EPOCHS) {
      throw new ConfigError(
        "maxCouponExpiry",
        String(limits.maxCouponExpiry),
        `must be a whole number up to ${MAX_EPOCHS}`,
      );
    }
  }

  get(epoch: number): CouponAuction | undefined {
    return this.auctions.get(epoch);
  }

  isOpen(epoch: number): boolean {
    const auction = this.auctions.get(epoch);
    return auction !== undefined && auction.isInit && !auction.isCanceled && !auction.isFinished;
  }

  /**
   * @returns Every auction that is neither canceled nor finished, oldest first
   */
  openAuctions(): CouponAuction[] {
    return [...this.auctions.values()]
      .filter((a) => this.isOpen(a.epoch))
      .sort((a, b) => a.epoch - b.epoch);
  }

  initAuction(epoch: number): CouponAuction {
    if (this.auctions.has(epoch)) {
      throw new AuctionError(epoch, "already exists");
    }

    const auction: CouponAuction = {
      epoch,
      isInit: true,
      isCanceled: false,
      isFinished: false,
      bids: [],
      minDollarAmount: 0n,
      maxDollarAmount: 0n,
      minExpiry: 0,
      maxExpiry: 0,
      minYield: 0n,
      maxYield: 0n,
      stats: emptyStats(),
    };
    this.auctions.set(epoch, auction);
    return auction;
  }

  placeBid(epoch: number, input: CouponBidInput): CouponBid {
    const auction = this.auctions.get(epoch);
    if (auction === undefined || !this.isOpen(epoch)) {
      throw new AuctionError(epoch, "not open for bids");
    }

    if (!Number.isSafeInteger(input.couponExpiryEpoch) || input.couponExpiryEpoch <= 0) {
      throw new AuctionError(epoch, "must have a positive whole expiry");
    }
    if (input.couponExpiryEpoch > this.limits.maxCouponExpiry) {
      throw new AuctionError(epoch, `expiry over ${this.limits.maxCouponExpiry} epochs`);
    }
    if (input.dollarAmount <= 0n) {
      throw new AuctionError(epoch, "must bid a non-zero dollar amount");
    }
    if (input.couponAmount <= 0n) {
      throw new AuctionError(epoch, "must bid on a non-zero coupon amount");
    }
    if (auction.bids.some((b) => b.bidder === input.bidder)) {
      throw new AuctionError(epoch, `${input.bidder} already bid`);
    }

    const yieldD18 = bidYield(input);
    if (yieldD18 > this.limits.maxCouponYield) {
      throw new AuctionError(epoch, "yield over max coupon yield");
    }

    const bid: CouponBid = {
      ...input,
      index: auction.bids.length,
      distance: 0n,
      selected: false,
      rejected: false,
    };

    if (auction.bids.length === 0) {
      auction.minDollarAmount = auction.maxDollarAmount = bid.dollarAmount;
      auction.minExpiry = auction.maxExpiry = bid.couponExpiryEpoch;
      auction.minYield = auction.maxYield = yieldD18;
    } else {
      if (bid.dollarAmount < auction.minDollarAmount) auction.minDollarAmount = bid.dollarAmount;
      if (bid.dollarAmount > auction.maxDollarAmount) auction.maxDollarAmount = bid.dollarAmount;
      if (bid.couponExpiryEpoch < auction.minExpiry) auction.minExpiry = bid.couponExpiryEpoch;
      if (bid.couponExpiryEpoch > auction.maxExpiry) auction.maxExpiry = bid.couponExpiryEpoch;
      if (yieldD18 < auction.minYield) auction.minYield = yieldD18;
      if (yieldD18 > auction.maxYield) auction.maxYield = yieldD18;
    }

    auction.bids.push(bid);
    return bid;
  }

  cancel(epoch: number): void {
    const auction = this.auctions.get(epoch);
    if (auction === undefined || !this.isOpen(epoch)) {
      throw new AuctionError(epoch, "cannot cancel, not open");
    }
    auction.isCanceled = true;
  }

  /**
   * Record settlement results and drop the bid list
   */
  finish(epoch: number, stats: AuctionStats): void {
    const auction = this.auctions.get(epoch);
    if (auction === undefined || !this.isOpen(epoch)) {
      throw new AuctionError(epoch, "cannot finish, not open");
    }
    auction.isFinished = true;
    auction.stats = stats;
    auction.bids = [];
  }

  snapshot(): AuctionBookSnapshot {
    return { size: this.auctions.size, open: structuredClone(this.openAuctions()) };
  }

  /**
   * Drop auctions created since the snapshot and put the open ones back
   */
  restore(snapshot: AuctionBookSnapshot): void {
    // Map keeps insertion order and nothing is ever deleted outside restore
    const created = [...this.auctions.keys()].slice(snapshot.size);
    for (const epoch of created) {
      this.auctions.delete(epoch);
    }
    for (const auction of structuredClone(snapshot.open)) {
      this.auctions.set(auction.epoch, auction);
    }
  }
}
