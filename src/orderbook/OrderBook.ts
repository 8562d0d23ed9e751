import { L2Level, LevelSnapshot, LimitOrder, Side, TopOfBook, opposite } from "../util/types";
import { NotFoundError, ValidationError } from "../util/errors";
import type { Logger } from "../util/logger";

export type CancelResult = { ok: true; order: LimitOrder } | { ok: false; error: NotFoundError };

/** Throws ValidationError for anything the book must not hold. */
export function validateOrder(o: LimitOrder) {
  if (!o.id) throw new ValidationError("Missing order id");
  if (o.side !== "BUY" && o.side !== "SELL") throw new ValidationError(`Invalid side ${String(o.side)}`);
  if (!Number.isInteger(o.price) || o.price <= 0) throw new ValidationError(`Non-positive or fractional price ${o.price}`);
  if (!Number.isInteger(o.qty) || o.qty <= 0) throw new ValidationError(`Non-positive or fractional qty ${o.qty}`);
  if (!Number.isFinite(o.ts)) throw new ValidationError(`Invalid timestamp ${o.ts}`);
}

// a ranks strictly ahead of b on the same side
function ahead(side: Side, a: LimitOrder, b: LimitOrder): boolean {
  if (a.price !== b.price) return side === "BUY" ? a.price > b.price : a.price < b.price;
  return a.ts < b.ts;
}

export class OrderBook {
  readonly symbol: string;
  private bids: LimitOrder[] = [];
  private asks: LimitOrder[] = [];
  private index = new Map<string, LimitOrder>();
  private rev = 0;
  private log: Logger | undefined;

  constructor(symbol: string, log?: Logger) {
    this.symbol = symbol;
    this.log = log;
  }

  /** bumped on every insert, cancel and fill */
  get revision() {
    return this.rev;
  }

  get size() {
    return this.index.size;
  }

  private sideOf(side: Side) {
    return side === "BUY" ? this.bids : this.asks;
  }

  insert(o: LimitOrder) {
    validateOrder(o);
    if (this.index.has(o.id)) throw new ValidationError(`Duplicate order id ${o.id}`);
    const head = this.peek(opposite(o.side));
    if (head && (o.side === "BUY" ? o.price >= head.price : o.price <= head.price)) {
      throw new ValidationError(`Order ${o.id} at ${o.price} crosses resting ${head.side} ${head.price}; submit it for matching`);
    }

    const arr = this.sideOf(o.side);
    // first position whose order the new one ranks ahead of; equal priority keeps arrival order
    let lo = 0;
    let hi = arr.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const cur = arr[mid];
      if (cur && !ahead(o.side, o, cur)) lo = mid + 1;
      else hi = mid;
    }
    const stored = { ...o };
    arr.splice(lo, 0, stored);
    this.index.set(stored.id, stored);
    this.rev++;
  }

  cancel(orderId: string): CancelResult {
    const o = this.index.get(orderId);
    if (!o) {
      this.log?.debug("cancel of unknown order", { symbol: this.symbol, orderId });
      return { ok: false, error: new NotFoundError(orderId) };
    }
    const arr = this.sideOf(o.side);
    arr.splice(arr.indexOf(o), 1);
    this.index.delete(orderId);
    this.rev++;
    return { ok: true, order: { ...o } };
  }

  get(orderId: string): LimitOrder | undefined {
    const o = this.index.get(orderId);
    return o ? { ...o } : undefined;
  }

  /** highest-priority resting order on a side */
  peek(side: Side): Readonly<LimitOrder> | undefined {
    return this.sideOf(side)[0];
  }

  /**
   * Decrement the head order of `side` by qty and drop it when exhausted.
   * Returns the head as it was before the fill.
   */
  fillHead(side: Side, qty: number): LimitOrder {
    const arr = this.sideOf(side);
    const head = arr[0];
    if (!head) throw new ValidationError(`No resting ${side} order to fill`);
    if (qty <= 0 || qty > head.qty) throw new ValidationError(`Fill qty ${qty} outside (0, ${head.qty}]`);

    const before = { ...head };
    head.qty -= qty;
    if (head.qty === 0) {
      arr.shift();
      this.index.delete(head.id);
    }
    this.rev++;
    return before;
  }

  bestBid(): TopOfBook | null {
    return this.top(this.bids);
  }

  bestAsk(): TopOfBook | null {
    return this.top(this.asks);
  }

  private top(arr: LimitOrder[]): TopOfBook | null {
    const head = arr[0];
    if (!head) return null;
    let qty = 0;
    for (const o of arr) {
      if (o.price !== head.price) break;
      qty += o.qty;
    }
    return { price: head.price, qty };
  }

  /** number of distinct price levels on a side */
  depth(side: Side): number {
    return this.aggregate(this.sideOf(side), Number.POSITIVE_INFINITY).length;
  }

  levels(depth = 5): LevelSnapshot {
    return { revision: this.rev, bids: this.aggregate(this.bids, depth), asks: this.aggregate(this.asks, depth) };
  }

  // sides are already priority-sorted, so levels come out in order
  private aggregate(arr: LimitOrder[], depth: number): L2Level[] {
    const out: L2Level[] = [];
    for (const o of arr) {
      const last = out[out.length - 1];
      if (last && last[0] === o.price) last[1] += o.qty;
      else if (out.length >= depth) break;
      else out.push([o.price, o.qty]);
    }
    return out;
  }

  ordersOf(trader: string): LimitOrder[] {
    return this.openOrders().filter((o) => o.trader === trader);
  }

  openOrders(): LimitOrder[] {
    return [...this.bids, ...this.asks].map((o) => ({ ...o }));
  }
}
