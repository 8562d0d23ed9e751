import { MarketView, OrderAction, Trader } from "./Trader";
import { RNG } from "../util/rng";

/** Quotes at its limit: gives the whole surplus away, never trades at a loss. */
export class Giveaway extends Trader {
  constructor(id: string, rng: RNG) {
    super(id, "GVWY", rng);
  }

  decide(view: MarketView): OrderAction | null {
    if (!this.job) return null;
    return this.quote(view, this.job.limit);
  }
}
