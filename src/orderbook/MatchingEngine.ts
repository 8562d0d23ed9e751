import { OrderBook, CancelResult, validateOrder } from "./OrderBook";
import { LimitOrder, Trade, opposite } from "../util/types";
import { ValidationError } from "../util/errors";

export type SubmitResult =
  | { status: "accepted"; trades: Trade[]; resting: LimitOrder | null }
  | { status: "rejected"; error: ValidationError };

/**
 * Price-time priority matching with execution at the resting order's price.
 * An incoming order walks the opposite side while it crosses; the remainder rests.
 */
export class MatchingEngine {
  readonly book: OrderBook;
  last: number | null = null;
  private tradeSeq = 0;

  constructor(book: OrderBook) {
    this.book = book;
  }

  submit(o: LimitOrder): SubmitResult {
    try {
      validateOrder(o);
      if (this.book.get(o.id)) throw new ValidationError(`Duplicate order id ${o.id}`);
    } catch (e) {
      if (e instanceof ValidationError) return { status: "rejected", error: e };
      throw e;
    }

    const trades: Trade[] = [];
    const other = opposite(o.side);
    let remain = o.qty;

    while (remain > 0) {
      const top = this.book.peek(other);
      if (!top) break;
      const crosses = o.side === "BUY" ? o.price >= top.price : o.price <= top.price;
      if (!crosses) break;

      const qty = Math.min(remain, top.qty);
      const maker = this.book.fillHead(other, qty);
      remain -= qty;
      this.last = maker.price;

      const buy = o.side === "BUY" ? o : maker;
      const sell = o.side === "BUY" ? maker : o;
      trades.push({
        id: `T${++this.tradeSeq}`,
        ts: o.ts,
        price: maker.price,
        qty,
        buyOrderId: buy.id,
        sellOrderId: sell.id,
        buyer: buy.trader,
        seller: sell.trader,
        aggressor: o.side,
      });
    }

    let resting: LimitOrder | null = null;
    if (remain > 0) {
      resting = { ...o, qty: remain };
      this.book.insert(resting);
    }
    return { status: "accepted", trades, resting };
  }

  cancel(orderId: string): CancelResult {
    return this.book.cancel(orderId);
  }
}
