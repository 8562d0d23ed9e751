import { MarketView, OrderAction, Trader } from "./Trader";
import { RNG } from "../util/rng";

/**
 * Zero-intelligence constrained (Gode & Sunder):
 * uniform random price between the system extreme and the limit.
 */
export class ZeroIntelligence extends Trader {
  constructor(id: string, rng: RNG) {
    super(id, "ZIC", rng);
  }

  decide(view: MarketView): OrderAction | null {
    const job = this.job;
    if (!job) return null;
    const price = job.side === "BUY" ? this.rng.int(view.minPrice, job.limit) : this.rng.int(job.limit, view.maxPrice);
    return this.quote(view, price);
  }
}
