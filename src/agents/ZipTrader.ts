/**
 * ZIP, Zero-Intelligence-Plus (Cliff 1997).
 *
 * Keeps separate buy and sell margins so one trader can work either side.
 * After every processed order it inspects the top of book and the last trade
 * and nudges its margin towards a perturbed target price (Widrow-Hoff with momentum).
 */

import { MarketView, OrderAction, Trader, TraderKind } from "./Trader";
import type { TopOfBook, Trade } from "../util/types";
import { RNG } from "../util/rng";

export class ZipTrader extends Trader {
  // learning
  private beta: number;
  private momentum: number;
  ca = 0.05; // absolute perturbation
  cr = 0.05; // relative perturbation
  private prevChange = 0;

  // margins
  marginBuy: number;
  marginSell: number;

  protected price: number | null = null;
  private active = false;

  private prevBid: TopOfBook | null = null;
  private prevAsk: TopOfBook | null = null;

  constructor(id: string, rng: RNG, kind: TraderKind = "ZIP") {
    super(id, kind, rng);
    this.beta = 0.1 + 0.4 * rng.uniform();
    this.momentum = 0.1 * rng.uniform();
    this.marginBuy = -1 * (0.05 + 0.3 * rng.uniform());
    this.marginSell = 0.05 + 0.3 * rng.uniform();
  }

  get currentPrice() {
    return this.price;
  }

  private margin(): number {
    return this.job?.side === "BUY" ? this.marginBuy : this.marginSell;
  }

  decide(view: MarketView): OrderAction | null {
    const job = this.job;
    if (!job) {
      this.active = false;
      return null;
    }
    this.active = true;
    this.price = Math.floor(job.limit * (1 + this.margin()));
    return this.quote(view, this.price);
  }

  private targetUp(price: number) {
    const abs = this.ca * this.rng.uniform();
    const rel = price * (1 + this.cr * this.rng.uniform());
    return Math.round(rel + abs);
  }

  private targetDown(price: number) {
    const abs = this.ca * this.rng.uniform();
    const rel = price * (1 - this.cr * this.rng.uniform());
    return Math.round(rel - abs);
  }

  private willingToTrade(price: number) {
    const job = this.job;
    if (!job || !this.active || this.price === null) return false;
    return job.side === "BUY" ? this.price >= price : this.price <= price;
  }

  private profitAlter(target: number) {
    const job = this.job;
    if (!job || this.price === null) return;

    const diff = target - this.price;
    const change = (1 - this.momentum) * (this.beta * diff) + this.momentum * this.prevChange;
    this.prevChange = change;
    const newMargin = (this.price + change) / job.limit - 1;

    if (job.side === "BUY") {
      if (newMargin < 0) this.marginBuy = newMargin;
    } else if (newMargin > 0) {
      this.marginSell = newMargin;
    }
    this.price = Math.round(job.limit * (1 + this.margin()));
  }

  respond(view: MarketView, trades: readonly Trade[]) {
    const trade = trades[trades.length - 1] ?? null;
    const bid = view.bestBid;
    const ask = view.bestAsk;

    let bidImproved = false;
    let bidHit = false;
    if (bid) {
      if (!this.prevBid || this.prevBid.price < bid.price) bidImproved = true;
      else if (trade && (this.prevBid.price > bid.price || (this.prevBid.price === bid.price && this.prevBid.qty > bid.qty))) bidHit = true;
    } else if (this.prevBid) {
      bidHit = true;
    }

    let askImproved = false;
    let askLifted = false;
    if (ask) {
      if (!this.prevAsk || this.prevAsk.price > ask.price) askImproved = true;
      else if (trade && (this.prevAsk.price < ask.price || (this.prevAsk.price === ask.price && this.prevAsk.qty > ask.qty))) askLifted = true;
    } else if (this.prevAsk) {
      askLifted = true;
    }

    const deal = bidHit || askLifted;
    const job = this.job;

    if (job && this.price !== null) {
      if (job.side === "SELL") {
        if (deal && trade) {
          if (this.price <= trade.price) this.profitAlter(this.targetUp(trade.price));
          else if (askLifted && this.active && !this.willingToTrade(trade.price)) this.profitAlter(this.targetDown(trade.price));
        } else if (!deal && askImproved && ask && this.price > ask.price) {
          this.profitAlter(bid ? this.targetUp(bid.price) : view.maxPrice);
        }
      } else {
        if (deal && trade) {
          if (this.price >= trade.price) this.profitAlter(this.targetDown(trade.price));
          else if (bidHit && this.active && !this.willingToTrade(trade.price)) this.profitAlter(this.targetUp(trade.price));
        } else if (!deal && bidImproved && bid && this.price < bid.price) {
          this.profitAlter(ask ? this.targetDown(ask.price) : view.minPrice);
        }
      }
    }

    this.prevBid = bid;
    this.prevAsk = ask;
  }
}
