/**
 * Property-based tests for the matching engine using fast-check.
 * Random place/cancel sequences must keep the book uncrossed and conserve quantity.
 */

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { OrderBook } from "../src/orderbook/OrderBook";
import { MatchingEngine } from "../src/orderbook/MatchingEngine";
import type { Side } from "../src/util/types";

type Command = { type: "PLACE"; side: Side; price: number; qty: number } | { type: "CANCEL"; pick: number };

const sideArbitrary: fc.Arbitrary<Side> = fc.constantFrom("BUY", "SELL");

const placeArbitrary: fc.Arbitrary<Command> = fc.record({
  type: fc.constant("PLACE" as const),
  side: sideArbitrary,
  price: fc.integer({ min: 90, max: 110 }),
  qty: fc.integer({ min: 1, max: 20 }),
});

const cancelArbitrary: fc.Arbitrary<Command> = fc.record({
  type: fc.constant("CANCEL" as const),
  pick: fc.nat(),
});

const commandsArbitrary = fc.array(fc.oneof({ weight: 4, arbitrary: placeArbitrary }, { weight: 1, arbitrary: cancelArbitrary }), {
  maxLength: 80,
});

function restingQty(book: OrderBook) {
  return book.openOrders().reduce((s, o) => s + o.qty, 0);
}

describe("MatchingEngine properties", () => {
  it("never leaves the book crossed", () => {
    fc.assert(
      fc.property(commandsArbitrary, (cmds) => {
        const book = new OrderBook("SIM");
        const engine = new MatchingEngine(book);
        cmds.forEach((c, i) => {
          if (c.type === "PLACE") engine.submit({ id: `o${i}`, trader: "t", side: c.side, price: c.price, qty: c.qty, ts: i });
          else {
            const open = book.openOrders();
            const victim = open[c.pick % Math.max(1, open.length)];
            if (victim) engine.cancel(victim.id);
          }
          const bid = book.bestBid();
          const ask = book.bestAsk();
          if (bid && ask) expect(bid.price).toBeLessThan(ask.price);
        });
      })
    );
  });

  it("conserves quantity across trades, rests and cancels", () => {
    fc.assert(
      fc.property(commandsArbitrary, (cmds) => {
        const book = new OrderBook("SIM");
        const engine = new MatchingEngine(book);
        let submitted = 0;
        let traded = 0;
        let cancelled = 0;

        cmds.forEach((c, i) => {
          if (c.type === "PLACE") {
            const res = engine.submit({ id: `o${i}`, trader: "t", side: c.side, price: c.price, qty: c.qty, ts: i });
            submitted += c.qty;
            if (res.status !== "accepted") return;
            const filled = res.trades.reduce((s, t) => s + t.qty, 0);
            expect(filled + (res.resting?.qty ?? 0)).toBe(c.qty);
            traded += filled;
          } else {
            const open = book.openOrders();
            const victim = open[c.pick % Math.max(1, open.length)];
            if (!victim) return;
            const res = engine.cancel(victim.id);
            if (res.ok) cancelled += res.order.qty;
          }
        });

        // each unit traded leaves both the aggressor and the resting order
        expect(restingQty(book) + 2 * traded + cancelled).toBe(submitted);
      })
    );
  });

  it("never trades outside either limit", () => {
    fc.assert(
      fc.property(commandsArbitrary, (cmds) => {
        const book = new OrderBook("SIM");
        const engine = new MatchingEngine(book);
        const limits = new Map<string, number>();

        cmds.forEach((c, i) => {
          if (c.type !== "PLACE") return;
          const id = `o${i}`;
          limits.set(id, c.price);
          const res = engine.submit({ id, trader: "t", side: c.side, price: c.price, qty: c.qty, ts: i });
          if (res.status !== "accepted") return;
          for (const t of res.trades) {
            expect(t.qty).toBeGreaterThan(0);
            expect(t.price).toBeLessThanOrEqual(limits.get(t.buyOrderId) ?? Number.NaN);
            expect(t.price).toBeGreaterThanOrEqual(limits.get(t.sellOrderId) ?? Number.NaN);
          }
        });
      })
    );
  });
});
