import type { BaselineKind, ThresholdPolicy } from '@skyfuse/shared';

/** Long-horizon statistics of counts-per-window for one event category. */
export interface RateBaseline {
  observe(count: number): void;
  readonly samples: number;
  readonly mean: number;
  readonly stddev: number;
}

/** Population mean / stddev over the last `capacity` window counts. */
export class SlidingWindowBaseline implements RateBaseline {
  private counts: number[] = [];

  constructor(private capacity: number) {}

  observe(count: number): void {
    this.counts.push(count);
    if (this.counts.length > this.capacity) this.counts.shift();
  }

  get samples(): number {
    return this.counts.length;
  }

  get mean(): number {
    if (!this.counts.length) return 0;
    return this.counts.reduce((s, c) => s + c, 0) / this.counts.length;
  }

  get stddev(): number {
    if (!this.counts.length) return 0;
    const m = this.mean;
    const variance = this.counts.reduce((s, c) => s + (c - m) ** 2, 0) / this.counts.length;
    return Math.sqrt(variance);
  }
}

/** Exponentially-weighted mean and variance; `alpha` is the weight of the newest count. */
export class EwmaBaseline implements RateBaseline {
  private n = 0;
  private m = 0;
  private variance = 0;

  constructor(private alpha: number) {}

  observe(count: number): void {
    if (this.n === 0) {
      this.m = count;
      this.variance = 0;
    } else {
      const diff = count - this.m;
      const incr = this.alpha * diff;
      this.m += incr;
      this.variance = (1 - this.alpha) * (this.variance + diff * incr);
    }
    this.n++;
  }

  get samples(): number {
    return this.n;
  }

  get mean(): number {
    return this.m;
  }

  get stddev(): number {
    return Math.sqrt(this.variance);
  }
}

export type BaselineFactory = () => RateBaseline;

export function baselineFactory(kind: BaselineKind, policy: ThresholdPolicy): BaselineFactory {
  switch (kind) {
    case 'ewma':
      return () => new EwmaBaseline(policy.rateEwmaAlpha);
    case 'window':
      return () => new SlidingWindowBaseline(policy.rateHistoryWindows);
  }
}
