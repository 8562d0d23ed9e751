import type { MarketView } from "../src/agents";
import { parseScenario, Scenario, ScenarioInput } from "../src/config/scenario";
import type { LimitOrder, Side } from "../src/util/types";

export function order(id: string, side: Side, price: number, qty: number, ts = 0, trader = id): LimitOrder {
  return { id, trader, side, price, qty, ts };
}

export function makeView(over: Partial<MarketView> = {}): MarketView {
  return {
    time: 0,
    countdown: 1,
    bestBid: null,
    bestAsk: null,
    snapshot: { revision: 0, bids: [], asks: [] },
    last: null,
    minPrice: 1,
    maxPrice: 200,
    ...over,
  };
}

export function makeScenario(over: Partial<ScenarioInput> = {}): Scenario {
  return parseScenario({
    name: "t",
    seed: "test-seed",
    ticks: 50,
    population: {
      buyers: [{ kind: "GVWY", count: 2 }],
      sellers: [{ kind: "GVWY", count: 2 }],
    },
    logging: { enabled: false },
    ...over,
  });
}
