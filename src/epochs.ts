import { Epochs } from "./types";

/**
 * Manually advanced epoch counter
 *
 * Epochs up to and including `bootstrappingPeriod` are bootstrapping.
 */
export class EpochCounter implements Epochs {
  private current: number;

  constructor(
    private readonly bootstrappingPeriod: number,
    start = 0,
  ) {
    this.current = start;
  }

  epoch(): number {
    return this.current;
  }

  advance(): number {
    this.current += 1;
    return this.current;
  }

  bootstrappingAt(epoch: number): boolean {
    return epoch <= this.bootstrappingPeriod;
  }
}
