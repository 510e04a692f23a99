const HISTORY_SIZE = 20;
const MIN_SENDS = 3;

export const DEFAULT_GCD_MS = 1500;

/** Median interval between recent successful sends. */
export class GcdEstimator {
  private sends: number[] = [];

  constructor(private readonly fallbackMs = DEFAULT_GCD_MS) {}

  recordSend(timestampMs: number): void {
    this.sends.push(timestampMs);
    if (this.sends.length > HISTORY_SIZE) {
      this.sends = this.sends.slice(this.sends.length - HISTORY_SIZE);
    }
  }

  /** Null until at least three sends are known. */
  estimateMs(): number | null {
    if (this.sends.length < MIN_SENDS) {
      return null;
    }
    const intervals: number[] = [];
    for (let index = 1; index < this.sends.length; index += 1) {
      intervals.push(this.sends[index] - this.sends[index - 1]);
    }
    intervals.sort((left, right) => left - right);
    const middle = Math.floor(intervals.length / 2);
    return intervals.length % 2 === 1 ? intervals[middle] : (intervals[middle - 1] + intervals[middle]) / 2;
  }

  estimateOrDefaultMs(): number {
    return this.estimateMs() ?? this.fallbackMs;
  }

  reset(): void {
    this.sends = [];
  }
}
