import { Assignment, MarketView, OrderAction, Trader, TraderKind } from "./Trader";
import { RNG } from "../util/rng";

/**
 * Improves the best same-side price by `shave` ticks, never past its limit.
 * With that side empty it posts a stub quote at the system extreme.
 */
export class Shaver extends Trader {
  constructor(id: string, rng: RNG, kind: TraderKind = "SHVR") {
    super(id, kind, rng);
  }

  decide(view: MarketView): OrderAction | null {
    const job = this.job;
    if (!job) return null;
    return this.quote(view, this.basePrice(view, job));
  }

  protected basePrice(view: MarketView, job: Readonly<Assignment>, shave = 1): number {
    if (job.side === "BUY") {
      return view.bestBid ? Math.min(view.bestBid.price + shave, job.limit) : view.minPrice;
    }
    return view.bestAsk ? Math.max(view.bestAsk.price - shave, job.limit) : view.maxPrice;
  }
}
