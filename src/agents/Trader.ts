import type { LevelSnapshot, Side, TopOfBook, Trade } from "../util/types";
import type { SimError } from "../util/errors";
import { RNG } from "../util/rng";

export type TraderKind = "GVWY" | "ZIC" | "SHVR" | "SNPR" | "ZIP" | "ISHV" | "ISHV-F" | "IZIP";

export const TRADER_KINDS: readonly TraderKind[] = ["GVWY", "ZIC", "SHVR", "SNPR", "ZIP", "ISHV", "ISHV-F", "IZIP"];

/** customer order: the private limit a trader works towards */
export type Assignment = {
  trader: string;
  side: Side;
  limit: number;
  qty: number;
  at: number; // issue tick
};

export type OrderAction = { side: Side; price: number; qty: number };

/** what a trader may look at when deciding */
export type MarketView = {
  time: number;
  countdown: number; // fraction of the session left, 1 → 0
  bestBid: TopOfBook | null;
  bestAsk: TopOfBook | null;
  snapshot: LevelSnapshot;
  last: number | null;
  minPrice: number;
  maxPrice: number;
};

export interface TradingStrategy {
  decide(view: MarketView): OrderAction | null;
}

export abstract class Trader implements TradingStrategy {
  readonly id: string;
  readonly kind: TraderKind;

  balance = 0; // realised profit against assignment limits
  cash = 0;
  inventory = 0;
  rejections = 0;
  lastError: SimError | null = null;
  lastQuote: OrderAction | null = null;
  readonly blotter: Trade[] = [];

  protected job: Assignment | null = null;
  protected rng: RNG;

  constructor(id: string, kind: TraderKind, rng: RNG) {
    this.id = id;
    this.kind = kind;
    this.rng = rng;
  }

  get assignment(): Readonly<Assignment> | null {
    return this.job;
  }

  /** replaces whatever job the trader was working */
  assign(a: Assignment) {
    this.job = { ...a };
  }

  abstract decide(view: MarketView): OrderAction | null;

  /** called after every processed order with the post-trade view */
  respond(_view: MarketView, _trades: readonly Trade[]) {}

  bookkeep(trade: Trade) {
    const side: Side = trade.buyer === this.id ? "BUY" : "SELL";
    this.blotter.push(trade);

    const notional = trade.price * trade.qty;
    if (side === "BUY") {
      this.inventory += trade.qty;
      this.cash -= notional;
    } else {
      this.inventory -= trade.qty;
      this.cash += notional;
    }

    const job = this.job;
    if (!job || job.side !== side) return;
    this.balance += side === "BUY" ? (job.limit - trade.price) * trade.qty : (trade.price - job.limit) * trade.qty;
    job.qty -= trade.qty;
    if (job.qty <= 0) this.job = null;
  }

  onRejected(error: SimError) {
    this.rejections++;
    this.lastError = error;
  }

  protected quote(view: MarketView, price: number): OrderAction | null {
    const job = this.job;
    if (!job) return null;
    const px = Math.min(view.maxPrice, Math.max(view.minPrice, Math.round(price)));
    this.lastQuote = { side: job.side, price: px, qty: job.qty };
    return this.lastQuote;
  }
}
