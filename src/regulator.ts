import { EventEmitter } from "node:events";

import { div, greaterThan, lessThan, min, mul, one, sub } from "./fixed-point";
import { AuctionBook } from "./auction-book";
import { settleCouponAuction, ZeroRangePolicy } from "./settle-auction";
import { AuctionError, ReentrancyError } from "./errors";
import {
  CouponBid,
  CouponBidInput,
  Epochs,
  Ledger,
  Oracle,
  RegulatorConstants,
  RegulatorEvents,
  StepResult,
  SupplyDecreaseEvent,
  SupplyDirection,
  SupplyIncreaseEvent,
} from "./types";

type PendingEvent = { [K in keyof RegulatorEvents]: { name: K; args: RegulatorEvents[K] } }[keyof RegulatorEvents];

export interface RegulatorOptions {
  constants: RegulatorConstants;
  oracle: Oracle;
  ledger: Ledger;
  epochs: Epochs;
  auctions?: AuctionBook;
  zeroRange?: ZeroRangePolicy;
  debug?: boolean;
}

/**
 * Epoch-by-epoch supply control
 *
 * Above peg it erases debt, cancels the open coupon auction and mints new supply. Below peg
 * it settles the open auction, opens one for the current epoch and adds debt. At peg it does
 * nothing.
 *
 * Each step is all-or-nothing: a throw rolls back the ledger and the auction book, and no
 * events are emitted. Events go out after the step commits; a listener that throws does not
 * undo the step, and its error reaches the caller once every event has been emitted.
 */
export class Regulator {
  readonly constants: RegulatorConstants;
  readonly auctions: AuctionBook;

  private readonly oracle: Oracle;
  private readonly ledger: Ledger;
  private readonly epochs: Epochs;
  private readonly zeroRange: ZeroRangePolicy;
  private readonly debug: boolean;

  private readonly emitter = new EventEmitter();
  private running: string | undefined;

  constructor(options: RegulatorOptions) {
    this.constants = options.constants;
    this.oracle = options.oracle;
    this.ledger = options.ledger;
    this.epochs = options.epochs;
    this.auctions = options.auctions ?? new AuctionBook(options.constants);
    this.zeroRange = options.zeroRange ?? "ignore-axis";
    this.debug = options.debug ?? false;
  }

  on<K extends keyof RegulatorEvents>(event: K, listener: (...args: RegulatorEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends keyof RegulatorEvents>(event: K, listener: (...args: RegulatorEvents[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  // === public operations ===

  step(): StepResult {
    const [result, pending] = this.exclusive("step", (events) => this.runStep(events));
    this.flush(pending);
    return result;
  }

  /**
   * Settle and finish the auction opened at `epoch`
   *
   * @returns false if there is no such auction or it is already finished or canceled
   */
  settleCouponAuction(epoch: number): boolean {
    const [settled, pending] = this.exclusive("settleCouponAuction", (events) => this.settle(epoch, events));
    this.flush(pending);
    return settled;
  }

  /**
   * Bid into the auction of the current epoch
   *
   * @param input.couponExpiryEpoch {epoch} Coupons expire this many epochs after settlement
   */
  placeCouponAuctionBid(input: CouponBidInput): CouponBid {
    const [bid, pending] = this.exclusive("placeCouponAuctionBid", (events) => {
      const epoch = this.epochs.epoch();

      if (this.ledger.balanceOf(input.bidder) < input.dollarAmount) {
        throw new AuctionError(epoch, `${input.bidder} cannot cover ${input.dollarAmount}`);
      }

      const placed = this.auctions.placeBid(epoch, input);
      events.push({ name: "CouponBidPlaced", args: [{ epoch, ...input }] });
      return placed;
    });
    this.flush(pending);
    return bid;
  }

  // === step ===

  private runStep(events: PendingEvent[]): StepResult {
    const epoch = this.epochs.epoch();
    const price = this.oracleCapture(epoch);

    // the epoch may already have advanced by the time the regulator runs
    const auctionEpoch = epoch - 1;

    if (this.debug) {
      console.log("step", epoch, price);
    }

    if (greaterThan(price, one())) {
      const canceledAuction = this.auctions.isOpen(auctionEpoch);
      for (const auction of this.auctions.openAuctions()) {
        this.auctions.cancel(auction.epoch);
      }

      const event = this.growSupply(epoch, price);
      events.push({ name: "SupplyIncrease", args: [event] });
      return { direction: SupplyDirection.INCREASE, canceledAuction, ...event };
    }

    if (lessThan(price, one())) {
      const settledAuction = this.settle(auctionEpoch, events);

      for (const auction of this.auctions.openAuctions()) {
        if (auction.epoch !== epoch) {
          this.auctions.cancel(auction.epoch);
        }
      }
      if (this.auctions.get(epoch) === undefined) {
        this.auctions.initAuction(epoch);
      }

      const event = this.shrinkSupply(epoch, price);
      events.push({ name: "SupplyDecrease", args: [event] });
      return { direction: SupplyDirection.DECREASE, settledAuction, ...event };
    }

    events.push({ name: "SupplyNeutral", args: [{ epoch }] });
    return { direction: SupplyDirection.NEUTRAL, epoch, price };
  }

  private settle(auctionEpoch: number, events: PendingEvent[]): boolean {
    const auction = this.auctions.get(auctionEpoch);
    if (auction === undefined || !this.auctions.isOpen(auctionEpoch)) {
      return false;
    }

    const { settled, stats } = settleCouponAuction(auction, this.ledger, this.epochs.epoch(), {
      zeroRange: this.zeroRange,
      debug: this.debug,
    });
    if (!settled) {
      return false;
    }

    this.auctions.finish(auctionEpoch, stats);
    events.push({ name: "CouponAuctionSettled", args: [{ epoch: auctionEpoch, stats }] });
    return true;
  }

  /**
   * D18{USD/dollar} The price to act on
   *
   * The oracle is captured on every step, even when its answer is not used.
   */
  private oracleCapture(epoch: number): bigint {
    const { price, valid } = this.oracle.capture();

    if (this.epochs.bootstrappingAt(epoch - 1)) {
      return this.constants.bootstrappingPrice;
    }
    if (!valid) {
      return one();
    }
    return price;
  }

  private growSupply(epoch: number, price: bigint): SupplyIncreaseEvent {
    const lessDebt = this.ledger.setDebtToZero();

    // {dollar} = D18{1} * {dollar} / D18
    const delta = this.limit(sub(price, one()));
    const newSupply = mul(delta, this.ledger.totalNet());
    const { newRedeemable, newBonded } = this.ledger.increaseSupply(newSupply);

    if (this.debug) {
      console.log("growSupply", { delta, newSupply, newRedeemable, lessDebt, newBonded });
    }

    return { epoch, price, newRedeemable, lessDebt, newBonded };
  }

  private shrinkSupply(epoch: number, price: bigint): SupplyDecreaseEvent {
    // {dollar} = D18{1} * {dollar} / D18
    const delta = this.limit(sub(one(), price));
    const newDebt = this.ledger.increaseDebt(mul(delta, this.ledger.totalNet()));

    if (this.debug) {
      console.log("shrinkSupply", { delta, newDebt });
    }

    return { epoch, price, newDebt };
  }

  /**
   * D18{1} = min(deviation / divisor, limit)
   *
   * Switches to the coupon divisor and limit while redeemable supply is short of the coupons
   * outstanding.
   */
  limit(deviation: bigint): bigint {
    const couponMode = this.ledger.totalRedeemable() < this.ledger.totalCoupons();

    const divisor = couponMode ? this.constants.couponSupplyChangeDivisor : this.constants.supplyChangeDivisor;
    const supplyChangeLimit = couponMode ? this.constants.couponSupplyChangeLimit : this.constants.supplyChangeLimit;

    return min(div(deviation, divisor), supplyChangeLimit);
  }

  // === plumbing ===

  private exclusive<T>(operation: string, work: (events: PendingEvent[]) => T): [T, PendingEvent[]] {
    if (this.running !== undefined) {
      throw new ReentrancyError(operation);
    }
    this.running = operation;

    const snapshot = this.auctions.snapshot();
    const events: PendingEvent[] = [];
    try {
      const result = this.ledger.atomically(() => work(events));
      return [result, events];
    } catch (e) {
      this.auctions.restore(snapshot);
      throw e;
    } finally {
      this.running = undefined;
    }
  }

  /**
   * Emit every queued event, then rethrow what listeners threw
   *
   * The operation has already committed by now. A throwing listener stops the listeners after
   * it for that event, as with any EventEmitter, but later events are still emitted.
   */
  private flush(events: PendingEvent[]): void {
    const failures: unknown[] = [];
    for (const event of events) {
      try {
        this.emitter.emit(event.name, ...event.args);
      } catch (e) {
        failures.push(e);
      }
    }

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `${failures.length} event listeners threw`);
    }
  }
}
