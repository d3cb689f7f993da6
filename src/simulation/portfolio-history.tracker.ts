// ============================================
// VALLEY ECONOMY - Portfolio History Tracker
// ============================================
// Samples total wealth on a fixed tick interval for graphing.

import type { HistoryConfig, HistorySample } from '../models/types.js';

export class PortfolioHistoryTracker {
  private samples: HistorySample[] = [];

  constructor(private config: HistoryConfig) {}

  /**
   * Record a sample when the tick lands on the interval. Oldest samples
   * are dropped past maxDataPoints.
   */
  record(tick: number, totalWealth: number, startingBalance: number): boolean {
    if (tick % this.config.snapshotIntervalTicks !== 0) return false;

    this.samples.push({ tick, totalWealth, netGain: totalWealth - startingBalance });
    if (this.samples.length > this.config.maxDataPoints) {
      this.samples.splice(0, this.samples.length - this.config.maxDataPoints);
    }
    return true;
  }

  getSamples(): HistorySample[] {
    return this.samples.map(s => ({ ...s }));
  }

  reset(): void {
    this.samples = [];
  }
}
