export * from "./types";
export * from "./errors";
export * as fixedPoint from "./fixed-point";
export { bn, d18, D18n, D256_MAXn } from "./numbers";
export { DEFAULT_CONSTANTS, MAX_EPOCHS, loadConstants, withDefaults } from "./config";
export { AuctionBook, bidYield, emptyStats } from "./auction-book";
export type { AuctionBookLimits, AuctionBookSnapshot } from "./auction-book";
export {
  getBidDistance,
  getNormalizationRanges,
  MAX_AXIS_DISTANCE,
  rankBids,
  settleCouponAuction,
} from "./settle-auction";
export type { NormalizationRanges, SettleOptions, SettlementResult, ZeroRangePolicy } from "./settle-auction";
export { InMemoryLedger } from "./ledger";
export type { LedgerConfig } from "./ledger";
export { EpochCounter } from "./epochs";
export { Regulator } from "./regulator";
export type { RegulatorOptions } from "./regulator";
export { createRegulator } from "./create-regulator";
export type { CreateRegulatorOptions } from "./create-regulator";
export { getAuctionMetrics, getSupplyChange } from "./utils";
export type { AuctionMetrics } from "./utils";
