import { ratio } from "../src/fixed-point";
import { AuctionBook } from "../src/auction-book";
import { InMemoryLedger } from "../src/ledger";
import { CouponBidInput, Oracle, OracleCapture } from "../src/types";

/**
 * Oracle whose answer the test sets, counting captures
 */
export class SettableOracle implements Oracle {
  captures = 0;
  private next: OracleCapture = { price: 10n ** 18n, valid: true };

  set(numerator: bigint, denominator: bigint, valid: boolean): void {
    this.next = { price: ratio(numerator, denominator), valid };
  }

  capture(): OracleCapture {
    this.captures++;
    return this.next;
  }
}

export const E18 = 10n ** 18n;

// A(100, 110, 50), B(50, 52, 10), C(200, 230, 100) in whole dollars
export const SCENARIO_BIDS: CouponBidInput[] = [
  { bidder: "A", dollarAmount: 100n * E18, couponAmount: 110n * E18, couponExpiryEpoch: 50 },
  { bidder: "B", dollarAmount: 50n * E18, couponAmount: 52n * E18, couponExpiryEpoch: 10 },
  { bidder: "C", dollarAmount: 200n * E18, couponAmount: 230n * E18, couponExpiryEpoch: 100 },
];

export const newBook = (): AuctionBook => new AuctionBook({ maxCouponYield: 10n * E18, maxCouponExpiry: 1000 });

/**
 * Ledger where debt may reach the whole supply, with every bidder funded and `debt` outstanding
 */
export const fundedLedger = (bids: CouponBidInput[], debt: bigint): InMemoryLedger => {
  const ledger = new InMemoryLedger({ oraclePoolRatio: 20n, treasuryRatio: 250n, debtRatioCap: E18 });
  for (const bid of bids) {
    ledger.mint(bid.bidder, bid.dollarAmount);
  }
  ledger.mint("whale", debt);
  ledger.increaseDebt(debt);
  return ledger;
};

export const openAuctionWith = (book: AuctionBook, epoch: number, bids: CouponBidInput[]) => {
  book.initAuction(epoch);
  for (const bid of bids) {
    book.placeBid(epoch, bid);
  }
  const auction = book.get(epoch);
  if (auction === undefined) {
    throw new Error(`auction ${epoch} missing`);
  }
  return auction;
};
