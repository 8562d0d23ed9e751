/**
 * ImpactSensitiveTrader: a Shaver that leans on multi-level order-flow imbalance.
 *
 * - Tracks MLOFI over its own rolling window of book snapshots.
 * - When the depth-normalised signal is significant, shifts the baseline
 *   quote by shiftCoefficient * signal (up under buy pressure, down under sell
 *   pressure), never past its limit.
 * - With the evaluation filter on (ISHV-F) the shift also needs the weighted
 *   bid/ask depth ratio to clear ratioThreshold.
 */

import { MarketView, OrderAction } from "./Trader";
import { Shaver } from "./Shaver";
import { ImbalanceTracker, isImbalanceSignificant } from "../signal/ImbalanceSignal";
import { StrategyComputationError } from "../util/errors";
import type { Trade } from "../util/types";
import { RNG } from "../util/rng";

export type ImpactParams = {
  depth: number; // m
  threshold: number; // significance threshold on the signal
  shiftCoefficient: number; // ticks per unit of signal
  levelDecay: number;
  window: number; // snapshots kept
  filter: boolean;
  ratioThreshold: number;
};

export const DEFAULT_IMPACT: ImpactParams = {
  depth: 3,
  threshold: 0.5,
  shiftCoefficient: 5,
  levelDecay: 0.8,
  window: 10,
  filter: false,
  ratioThreshold: 0.6,
};

export class ImpactSensitiveTrader extends Shaver {
  readonly params: ImpactParams;
  private tracker: ImbalanceTracker;

  lastSignal = 0;
  lastShift = 0;

  constructor(id: string, rng: RNG, params: Partial<ImpactParams> = {}) {
    const p = { ...DEFAULT_IMPACT, ...params };
    super(id, rng, p.filter ? "ISHV-F" : "ISHV");
    this.params = p;
    this.tracker = new ImbalanceTracker(p.depth, p.window);
  }

  get imbalance(): ImbalanceTracker {
    return this.tracker;
  }

  respond(view: MarketView, _trades: readonly Trade[]) {
    this.tracker.observe(view.snapshot, view.time);
  }

  /** significance gate, plus the depth-ratio evaluation when the filter is on */
  shouldShift(signal: number): boolean {
    if (!isImbalanceSignificant(signal, this.params.threshold)) return false;
    if (!this.params.filter) return true;
    return Math.abs(this.tracker.ratio()) > this.params.ratioThreshold;
  }

  decide(view: MarketView): OrderAction | null {
    const job = this.job;
    if (!job) return null;

    const base = this.basePrice(view, job);
    const signal = this.tracker.signal(this.params.levelDecay);
    if (!Number.isFinite(signal)) {
      throw new StrategyComputationError(this.id, `imbalance signal is not finite (${signal})`);
    }
    this.lastSignal = signal;

    if (!this.shouldShift(signal)) {
      this.lastShift = 0;
      return this.quote(view, base);
    }

    const shifted = base + Math.round(this.params.shiftCoefficient * signal);
    const capped = job.side === "BUY" ? Math.min(shifted, job.limit) : Math.max(shifted, job.limit);
    this.lastShift = capped - base;
    return this.quote(view, capped);
  }
}
