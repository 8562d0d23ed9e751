import { describe, it, expect, beforeEach } from "vitest";
import { OrderBook } from "../src/orderbook/OrderBook";
import { NotFoundError, ValidationError } from "../src/util/errors";
import { order } from "./fixtures";

describe("OrderBook", () => {
  let book: OrderBook;

  beforeEach(() => {
    book = new OrderBook("SIM");
  });

  describe("priority", () => {
    it("sorts bids by price desc then time", () => {
      book.insert(order("A", "BUY", 100, 10, 1));
      book.insert(order("B", "BUY", 100, 10, 2));
      book.insert(order("C", "BUY", 101, 5, 3));

      expect(book.peek("BUY")?.id).toBe("C");
      expect(book.openOrders().map((o) => o.id)).toEqual(["C", "A", "B"]);
    });

    it("sorts asks by price asc then time", () => {
      book.insert(order("A", "SELL", 102, 1, 1));
      book.insert(order("B", "SELL", 101, 1, 2));
      book.insert(order("C", "SELL", 101, 1, 3));

      expect(book.openOrders().map((o) => o.id)).toEqual(["B", "C", "A"]);
    });

    it("keeps arrival order for equal price and time", () => {
      book.insert(order("A", "SELL", 100, 1, 5));
      book.insert(order("B", "SELL", 100, 1, 5));
      book.insert(order("C", "SELL", 100, 1, 5));

      expect(book.openOrders().map((o) => o.id)).toEqual(["A", "B", "C"]);
    });
  });

  describe("top of book and levels", () => {
    beforeEach(() => {
      book.insert(order("b1", "BUY", 100, 3));
      book.insert(order("b2", "BUY", 100, 4));
      book.insert(order("b3", "BUY", 98, 2));
      book.insert(order("a1", "SELL", 103, 1));
      book.insert(order("a2", "SELL", 105, 6));
    });

    it("aggregates quantity at the best price", () => {
      expect(book.bestBid()).toEqual({ price: 100, qty: 7 });
      expect(book.bestAsk()).toEqual({ price: 103, qty: 1 });
    });

    it("returns null for an empty side", () => {
      const empty = new OrderBook("SIM");
      expect(empty.bestBid()).toBeNull();
      expect(empty.bestAsk()).toBeNull();
    });

    it("builds aggregated level snapshots to the requested depth", () => {
      expect(book.levels(1)).toEqual({ revision: 5, bids: [[100, 7]], asks: [[103, 1]] });
      expect(book.levels(5)).toEqual({
        revision: 5,
        bids: [
          [100, 7],
          [98, 2],
        ],
        asks: [
          [103, 1],
          [105, 6],
        ],
      });
    });

    it("counts distinct levels per side", () => {
      expect(book.depth("BUY")).toBe(2);
      expect(book.depth("SELL")).toBe(2);
      expect(book.size).toBe(5);
    });

    it("lists a trader's orders", () => {
      const other = new OrderBook("SIM");
      other.insert(order("x1", "BUY", 100, 1, 0, "B00"));
      other.insert(order("x2", "SELL", 110, 1, 0, "S00"));
      expect(other.ordersOf("B00").map((o) => o.id)).toEqual(["x1"]);
    });
  });

  describe("validation", () => {
    it.each([
      ["zero price", order("o", "BUY", 0, 1)],
      ["negative price", order("o", "BUY", -5, 1)],
      ["fractional price", order("o", "BUY", 100.5, 1)],
      ["zero qty", order("o", "SELL", 100, 0)],
      ["fractional qty", order("o", "SELL", 100, 1.5)],
      ["empty id", order("", "SELL", 100, 1)],
    ])("rejects %s", (_name, o) => {
      expect(() => book.insert(o)).toThrow(ValidationError);
      expect(book.size).toBe(0);
      expect(book.revision).toBe(0);
    });

    it("refuses an order that would cross the opposite head", () => {
      book.insert(order("b1", "BUY", 110, 1));
      expect(() => book.insert(order("a1", "SELL", 100, 1))).toThrow(ValidationError);
      expect(() => book.insert(order("a2", "SELL", 110, 1))).toThrow("Order a2 at 110 crosses resting BUY 110; submit it for matching");
      book.insert(order("a3", "SELL", 111, 1));

      expect(book.bestBid()).toEqual({ price: 110, qty: 1 });
      expect(book.bestAsk()).toEqual({ price: 111, qty: 1 });
      expect(book.revision).toBe(2);
    });

    it("rejects a duplicate resting id", () => {
      book.insert(order("o", "BUY", 100, 1));
      expect(() => book.insert(order("o", "BUY", 101, 1))).toThrow("Duplicate order id o");
    });
  });

  describe("cancel", () => {
    it("removes a resting order and returns it", () => {
      book.insert(order("A", "BUY", 100, 10));
      const res = book.cancel("A");

      expect(res).toEqual({ ok: true, order: order("A", "BUY", 100, 10) });
      expect(book.size).toBe(0);
      expect(book.bestBid()).toBeNull();
    });

    it("reports an unknown id without touching state", () => {
      book.insert(order("A", "BUY", 100, 10));
      const rev = book.revision;
      const res = book.cancel("missing");

      expect(res.ok).toBe(false);
      if (!res.ok) {
        expect(res.error).toBeInstanceOf(NotFoundError);
        expect(res.error.message).toBe("Order missing not found");
      }
      expect(book.revision).toBe(rev);
      expect(book.size).toBe(1);
    });
  });

  describe("revision and fills", () => {
    it("bumps revision on insert, fill and cancel", () => {
      book.insert(order("A", "SELL", 100, 5));
      expect(book.revision).toBe(1);
      book.fillHead("SELL", 2);
      expect(book.revision).toBe(2);
      book.cancel("A");
      expect(book.revision).toBe(3);
    });

    it("decrements the head and drops it when exhausted", () => {
      book.insert(order("A", "SELL", 100, 5));
      expect(book.fillHead("SELL", 2).qty).toBe(5);
      expect(book.get("A")?.qty).toBe(3);
      book.fillHead("SELL", 3);
      expect(book.get("A")).toBeUndefined();
    });

    it("refuses fills on an empty side or beyond the head", () => {
      expect(() => book.fillHead("BUY", 1)).toThrow(ValidationError);
      book.insert(order("A", "BUY", 100, 1));
      expect(() => book.fillHead("BUY", 2)).toThrow(ValidationError);
    });

    it("hands out copies", () => {
      book.insert(order("A", "BUY", 100, 1));
      const copy = book.get("A");
      if (copy) copy.qty = 99;
      expect(book.get("A")?.qty).toBe(1);
    });
  });
});
