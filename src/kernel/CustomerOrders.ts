/**
 * Customer-order feed: hands each buyer and seller a private limit price on a
 * supply/demand schedule, replenished every `interval` ticks.
 *
 * Step modes spread limits over [min, max]:
 * - fixed:    evenly spaced by trader index
 * - jittered: evenly spaced ± half a step
 * - random:   uniform on the range
 *
 * Time modes place issue times inside the interval:
 * - periodic:     everyone at the end of the interval
 * - drip-fixed:   evenly spaced
 * - drip-jitter:  evenly spaced plus up to one step
 * - drip-poisson: exponential inter-arrivals rescaled to end on the interval
 */

import type { Assignment } from "../agents/Trader";
import type { OrderSchedule, PriceRange } from "../config/scenario";
import type { Side } from "../util/types";
import { PriorityQueue } from "./PriorityQueue";
import { RNG } from "../util/rng";

export type PriceBounds = { minPrice: number; maxPrice: number };

function clip(price: number, sys: PriceBounds) {
  return Math.min(sys.maxPrice, Math.max(sys.minPrice, price));
}

export function orderPrice(i: number, n: number, range: PriceRange, rng: RNG, sys: PriceBounds): number {
  const pmin = clip(range.min, sys);
  const pmax = clip(range.max, sys);
  const step = n > 1 ? (pmax - pmin) / (n - 1) : 0;
  const half = Math.round(step / 2);

  switch (range.stepMode) {
    case "fixed":
      return clip(pmin + Math.floor(i * step), sys);
    case "jittered":
      return clip(pmin + Math.floor(i * step) + rng.int(-half, half), sys);
    case "random":
      return rng.int(pmin, pmax);
  }
}

export function issueTimes(n: number, mode: OrderSchedule["timeMode"], interval: number, rng: RNG, shuffle = true): number[] {
  if (n < 1) return [];
  const tstep = n === 1 ? interval : interval / (n - 1);
  const out: number[] = [];
  let arr = 0;

  for (let t = 0; t < n; t++) {
    switch (mode) {
      case "periodic":
        arr = interval;
        break;
      case "drip-fixed":
        arr = t * tstep;
        break;
      case "drip-jitter":
        arr = t * tstep + tstep * rng.uniform();
        break;
      case "drip-poisson":
        arr += rng.expovariate(n / interval);
        break;
    }
    out.push(arr);
  }

  // last arrival lands exactly on the interval
  if (arr > 0 && arr !== interval) {
    for (let t = 0; t < n; t++) out[t] = interval * ((out[t] ?? 0) / arr);
  }
  return shuffle ? rng.shuffle(out) : out;
}

export class CustomerOrderFeed {
  private pending = new PriorityQueue<Assignment>();

  constructor(
    private schedule: OrderSchedule,
    private buyers: readonly string[],
    private sellers: readonly string[],
    private rng: RNG,
    private sys: PriceBounds
  ) {}

  get pendingCount() {
    return this.pending.length;
  }

  /**
   * Assignments whose issue time has passed. An empty queue is refilled first
   * with one full cycle starting at `time`.
   */
  due(time: number): Assignment[] {
    if (this.pending.length === 0) this.replenish(time);
    return this.pending.drainBefore(time);
  }

  private replenish(time: number) {
    this.enqueue(time, "BUY", this.buyers, this.schedule.demand);
    this.enqueue(time, "SELL", this.sellers, this.schedule.supply);
  }

  private enqueue(time: number, side: Side, ids: readonly string[], range: PriceRange) {
    const times = issueTimes(ids.length, this.schedule.timeMode, this.schedule.interval, this.rng);
    ids.forEach((trader, i) => {
      this.pending.push({
        trader,
        side,
        limit: orderPrice(i, ids.length, range, this.rng, this.sys),
        qty: this.schedule.qty,
        at: time + (times[i] ?? 0),
      });
    });
  }
}
