import { withDefaults } from "./config";
import { AuctionBook } from "./auction-book";
import { EpochCounter } from "./epochs";
import { InMemoryLedger } from "./ledger";
import { Regulator } from "./regulator";
import { ZeroRangePolicy } from "./settle-auction";
import { Oracle, RegulatorConstants } from "./types";

export interface CreateRegulatorOptions {
  oracle: Oracle;
  constants?: Partial<RegulatorConstants>;
  startEpoch?: number;
  zeroRange?: ZeroRangePolicy;
  debug?: boolean;
}

/**
 * Build a regulator with an in-memory ledger, an epoch counter and an empty auction book
 *
 * @return The regulator and the collaborators it was wired to
 */
export const createRegulator = (
  options: CreateRegulatorOptions,
): { regulator: Regulator; ledger: InMemoryLedger; epochs: EpochCounter; auctions: AuctionBook } => {
  const constants = withDefaults(options.constants);

  const ledger = new InMemoryLedger(constants);
  const epochs = new EpochCounter(constants.bootstrappingPeriod, options.startEpoch ?? 0);
  const auctions = new AuctionBook(constants);

  const regulator = new Regulator({
    constants,
    oracle: options.oracle,
    ledger,
    epochs,
    auctions,
    zeroRange: options.zeroRange,
    debug: options.debug,
  });

  return { regulator, ledger, epochs, auctions };
};
