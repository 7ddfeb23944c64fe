/**
 * Source of the external logical clock. The ledger reads it but never advances it;
 * interest accrues per elapsed time unit.
 */
export interface LogicalClock {
  now(): number;
}

/** Time units elapsed since a fixed genesis instant, one unit per `unitMs`. */
export class WallClock implements LogicalClock {
  private readonly genesisMs: number;
  private readonly unitMs: number;

  constructor(genesis: Date, unitMs: number) {
    this.genesisMs = genesis.getTime();
    this.unitMs = unitMs;
  }

  now(): number {
    return Math.max(0, Math.floor((Date.now() - this.genesisMs) / this.unitMs));
  }
}

/** Clock advanced explicitly by its owner. */
export class ManualClock implements LogicalClock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(units: number): void {
    if (!Number.isInteger(units) || units < 0) {
      throw new RangeError(`Clock can only move forward by whole units, got ${units}`);
    }
    this.current += units;
  }
}
