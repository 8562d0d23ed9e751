import { MarketView, OrderAction } from "./Trader";
import { Shaver } from "./Shaver";
import { RNG } from "../util/rng";

/**
 * Shaver that lurks until the last `lurkThreshold` of the session, then shaves
 * harder as time runs out.
 */
export class Sniper extends Shaver {
  lurkThreshold = 0.2;
  shaveGrowthRate = 3;

  constructor(id: string, rng: RNG) {
    super(id, rng, "SNPR");
  }

  shave(countdown: number): number {
    return Math.floor(1 / (0.01 + countdown / (this.shaveGrowthRate * this.lurkThreshold)));
  }

  decide(view: MarketView): OrderAction | null {
    const job = this.job;
    if (!job || view.countdown > this.lurkThreshold) return null;
    return this.quote(view, this.basePrice(view, job, this.shave(view.countdown)));
  }
}
