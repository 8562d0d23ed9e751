import { Trader, TraderKind } from "./Trader";
import { Giveaway } from "./Giveaway";
import { ZeroIntelligence } from "./ZeroIntelligence";
import { Shaver } from "./Shaver";
import { Sniper } from "./Sniper";
import { ZipTrader } from "./ZipTrader";
import { ImpactParams, ImpactSensitiveTrader } from "./ImpactSensitiveTrader";
import { ImpactZipTrader } from "./ImpactZipTrader";
import { RNG } from "../util/rng";

export function createTrader(kind: TraderKind, id: string, rng: RNG, impact: Partial<ImpactParams> = {}): Trader {
  switch (kind) {
    case "GVWY":
      return new Giveaway(id, rng);
    case "ZIC":
      return new ZeroIntelligence(id, rng);
    case "SHVR":
      return new Shaver(id, rng);
    case "SNPR":
      return new Sniper(id, rng);
    case "ZIP":
      return new ZipTrader(id, rng);
    case "ISHV":
      return new ImpactSensitiveTrader(id, rng, { ...impact, filter: false });
    case "ISHV-F":
      return new ImpactSensitiveTrader(id, rng, { ...impact, filter: true });
    case "IZIP":
      return new ImpactZipTrader(id, rng, impact);
  }
}

export { Trader, TRADER_KINDS } from "./Trader";
export type { TraderKind, Assignment, MarketView, OrderAction, TradingStrategy } from "./Trader";
export { Giveaway, ZeroIntelligence, Shaver, Sniper, ZipTrader, ImpactSensitiveTrader, ImpactZipTrader };
export type { ImpactParams };
