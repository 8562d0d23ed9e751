/**
 * IZIP: ZIP with the MLOFI overlay.
 *
 * The margin-derived ZIP price is moved by shiftCoefficient * signal on every
 * quote (no significance gate), never past the limit. The shifted price is
 * what the ZIP learning rule sees afterwards.
 */

import { MarketView, OrderAction } from "./Trader";
import { ZipTrader } from "./ZipTrader";
import { DEFAULT_IMPACT, ImpactParams } from "./ImpactSensitiveTrader";
import { ImbalanceTracker } from "../signal/ImbalanceSignal";
import { StrategyComputationError } from "../util/errors";
import type { Trade } from "../util/types";
import { RNG } from "../util/rng";

export class ImpactZipTrader extends ZipTrader {
  readonly params: ImpactParams;
  private tracker: ImbalanceTracker;

  lastSignal = 0;
  lastShift = 0;

  constructor(id: string, rng: RNG, params: Partial<ImpactParams> = {}) {
    super(id, rng, "IZIP");
    this.params = { ...DEFAULT_IMPACT, ...params };
    this.tracker = new ImbalanceTracker(this.params.depth, this.params.window);
  }

  get imbalance(): ImbalanceTracker {
    return this.tracker;
  }

  respond(view: MarketView, trades: readonly Trade[]) {
    super.respond(view, trades);
    this.tracker.observe(view.snapshot, view.time);
  }

  decide(view: MarketView): OrderAction | null {
    const base = super.decide(view);
    const job = this.job;
    if (!base || !job) return base;

    const signal = this.tracker.signal(this.params.levelDecay);
    if (!Number.isFinite(signal)) {
      throw new StrategyComputationError(this.id, `imbalance signal is not finite (${signal})`);
    }
    this.lastSignal = signal;

    const shifted = base.price + Math.round(this.params.shiftCoefficient * signal);
    const capped = job.side === "BUY" ? Math.min(shifted, job.limit) : Math.max(shifted, job.limit);
    const action = this.quote(view, capped);
    if (action) {
      this.lastShift = action.price - base.price;
      this.price = action.price;
    }
    return action;
  }
}
