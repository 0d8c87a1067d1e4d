/**
 * Monotonic height source. The oracle only ever reads it.
 */
export interface HeightClock {
  currentHeight(): number;
}

/**
 * Height that only moves when told to. Used by tests and by embedders that
 * drive the oracle from their own block stream.
 */
export class ManualHeightClock implements HeightClock {
  private height: number;

  constructor(initialHeight = 0) {
    if (!Number.isSafeInteger(initialHeight) || initialHeight < 0) {
      throw new RangeError(`Initial height must be a non-negative integer, got ${initialHeight}`);
    }
    this.height = initialHeight;
  }

  currentHeight(): number {
    return this.height;
  }

  advance(blocks = 1): number {
    if (!Number.isSafeInteger(blocks) || blocks < 0) {
      throw new RangeError(`Cannot advance by ${blocks} blocks`);
    }
    this.height += blocks;
    return this.height;
  }

  setHeight(height: number): void {
    if (!Number.isSafeInteger(height) || height < this.height) {
      throw new RangeError(`Height must not decrease (current ${this.height}, requested ${height})`);
    }
    this.height = height;
  }
}

/**
 * Derives height from wall-clock time: one block per interval since genesis.
 * Never reports a lower height than it has already reported, even if the
 * system clock steps backwards.
 */
export class WallClockHeightClock implements HeightClock {
  private lastHeight = 0;

  constructor(
    private readonly genesisMs: number,
    private readonly blockIntervalMs: number,
    private readonly now: () => number = Date.now
  ) {
    if (blockIntervalMs <= 0) {
      throw new RangeError(`Block interval must be positive, got ${blockIntervalMs}`);
    }
  }

  currentHeight(): number {
    const elapsed = this.now() - this.genesisMs;
    const height = elapsed > 0 ? Math.floor(elapsed / this.blockIntervalMs) : 0;
    this.lastHeight = Math.max(this.lastHeight, height);
    return this.lastHeight;
  }
}
