import { describe, it, expect } from "vitest";
import { CustomerOrderFeed, issueTimes, orderPrice } from "../src/kernel/CustomerOrders";
import { PriorityQueue } from "../src/kernel/PriorityQueue";
import type { OrderSchedule } from "../src/config/scenario";
import { RNG } from "../src/util/rng";

const sys = { minPrice: 1, maxPrice: 200 };

describe("orderPrice", () => {
  it("spreads fixed limits evenly over the range", () => {
    const range = { min: 50, max: 150, stepMode: "fixed" as const };
    const prices = [0, 1, 2, 3, 4].map((i) => orderPrice(i, 5, range, new RNG("test"), sys));
    expect(prices).toEqual([50, 75, 100, 125, 150]);
  });

  it("gives a lone trader the range minimum", () => {
    expect(orderPrice(0, 1, { min: 60, max: 140, stepMode: "fixed" }, new RNG("test"), sys)).toBe(60);
  });

  it("clips the range to the system price bounds", () => {
    const range = { min: 150, max: 300, stepMode: "fixed" as const };
    expect(orderPrice(1, 2, range, new RNG("test"), sys)).toBe(200);
  });

  it("jitters within half a step of the fixed grid", () => {
    const rng = new RNG("test");
    const range = { min: 50, max: 150, stepMode: "jittered" as const };
    for (let i = 0; i < 5; i++) {
      const p = orderPrice(i, 5, range, rng, sys);
      expect(Math.abs(p - (50 + 25 * i))).toBeLessThanOrEqual(13);
    }
  });

  it("draws random limits inside the range", () => {
    const rng = new RNG("test");
    const range = { min: 90, max: 110, stepMode: "random" as const };
    for (let i = 0; i < 100; i++) {
      const p = orderPrice(i, 100, range, rng, sys);
      expect(p).toBeGreaterThanOrEqual(90);
      expect(p).toBeLessThanOrEqual(110);
    }
  });
});

describe("issueTimes", () => {
  it("issues everything at the end of a periodic interval", () => {
    expect(issueTimes(3, "periodic", 30, new RNG("test"))).toEqual([30, 30, 30]);
  });

  it("spaces drip-fixed arrivals evenly", () => {
    expect(issueTimes(4, "drip-fixed", 30, new RNG("test"), false)).toEqual([0, 10, 20, 30]);
  });

  it("rescales poisson arrivals so the last lands on the interval", () => {
    const times = issueTimes(6, "drip-poisson", 40, new RNG("test"), false);
    expect(times).toHaveLength(6);
    expect(times[5]).toBe(40);
    for (let i = 1; i < times.length; i++) expect(times[i] ?? 0).toBeGreaterThanOrEqual(times[i - 1] ?? 0);
  });

  it("returns nothing for an empty population", () => {
    expect(issueTimes(0, "drip-jitter", 30, new RNG("test"))).toEqual([]);
  });
});

describe("CustomerOrderFeed", () => {
  const schedule: OrderSchedule = {
    supply: { min: 80, max: 80, stepMode: "fixed" },
    demand: { min: 50, max: 150, stepMode: "fixed" },
    timeMode: "periodic",
    interval: 10,
    qty: 2,
  };

  it("holds assignments until their issue time has passed", () => {
    const feed = new CustomerOrderFeed(schedule, ["B00", "B01"], ["S00"], new RNG("test"), sys);

    expect(feed.due(0)).toEqual([]);
    expect(feed.pendingCount).toBe(3);
    expect(feed.due(10)).toEqual([]);
    expect(feed.due(11)).toEqual([
      { trader: "B00", side: "BUY", limit: 50, qty: 2, at: 10 },
      { trader: "B01", side: "BUY", limit: 150, qty: 2, at: 10 },
      { trader: "S00", side: "SELL", limit: 80, qty: 2, at: 10 },
    ]);
  });

  it("starts the next cycle once the queue is empty", () => {
    const feed = new CustomerOrderFeed(schedule, ["B00"], ["S00"], new RNG("test"), sys);
    feed.due(0);
    feed.due(11);
    expect(feed.due(12)).toEqual([]);
    expect(feed.due(23).map((a) => a.at)).toEqual([22, 22]);
  });
});

describe("PriorityQueue", () => {
  it("pops by time and keeps push order on ties", () => {
    const q = new PriorityQueue<{ at: number; id: string }>();
    q.push({ at: 5, id: "a" });
    q.push({ at: 1, id: "b" });
    q.push({ at: 5, id: "c" });
    q.push({ at: 3, id: "d" });
    q.push({ at: 5, id: "e" });

    const out: string[] = [];
    for (let x = q.pop(); x; x = q.pop()) out.push(x.id);
    expect(out).toEqual(["b", "d", "a", "c", "e"]);
  });

  it("drains entries strictly before a bound", () => {
    const q = new PriorityQueue<{ at: number }>();
    [4, 2, 6, 2].forEach((at) => q.push({ at }));

    expect(q.drainBefore(4).map((x) => x.at)).toEqual([2, 2]);
    expect(q.peek()?.at).toBe(4);
    expect(q.length).toBe(2);
    q.clear();
    expect(q.pop()).toBeUndefined();
  });
});
