export const DEFAULT_SPEED_SAMPLES = 5;

/**
 * Keeps the byte counts of the last few completed seconds and averages them
 * into a speed estimate.
 */
export class ThroughputSampler {
  // Newest first
  private readonly window: number[] = [];
  private pending = 0;

  constructor(
    private readonly capacity: number = DEFAULT_SPEED_SAMPLES,
    private readonly contentLength?: number
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Sample capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Count bytes towards the second in progress. */
  record(bytes: number): void {
    this.pending += bytes;
  }

  /** Close the second in progress and start a new one. */
  commit(): void {
    if (this.window.length === this.capacity) {
      this.window.pop();
    }
    this.window.unshift(this.pending);
    this.pending = 0;
  }

  /**
   * Average bytes per second over the window. With no samples yet this falls
   * back to the advertised length, since a body that arrives before the first
   * tick took under a second.
   */
  speed(): number {
    if (this.window.length === 0) {
      return this.contentLength ?? 0;
    }
    const sum = this.window.reduce((acc, sample) => acc + sample, 0);
    return Math.floor(sum / this.window.length);
  }

  get pendingBytes(): number {
    return this.pending;
  }

  samples(): readonly number[] {
    return [...this.window];
  }
}
