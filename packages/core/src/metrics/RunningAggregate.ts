import type { AggregateSummary } from '@runprof/shared';

export class RunningAggregate {
  private min: number = Infinity;
  private max: number = -Infinity;
  private sum: number = 0;
  private count: number = 0;

  update(value: number): void {
    this.min = Math.min(this.min, value);
    this.max = Math.max(this.max, value);
    this.sum += value;
    this.count++;
  }

  getCount(): number {
    return this.count;
  }

  /** `null` until at least one value has been recorded. */
  finalize(): AggregateSummary | null {
    if (this.count === 0) return null;

    return {
      min: this.min,
      max: this.max,
      range: this.max - this.min,
      avg: this.sum / this.count,
      count: this.count,
    };
  }
}
