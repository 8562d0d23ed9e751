import { OrderBook, validateOrder } from "../orderbook/OrderBook";
import { MatchingEngine, SubmitResult } from "../orderbook/MatchingEngine";
import { ImbalanceSample, ImbalanceTracker } from "../signal/ImbalanceSignal";
import { createTrader, Assignment, MarketView, OrderAction, Trader, TraderKind } from "../agents";
import type { Scenario, TraderDecl } from "../config/scenario";
import { CustomerOrderFeed } from "./CustomerOrders";
import { CancelRecord, QuoteRecord, Tape, TradeRecord } from "./Tape";
import { ConfigError, SessionStateError, StrategyComputationError, ValidationError, errorMessage } from "../util/errors";
import { Logger, silentLogger } from "../util/logger";
import { RNG } from "../util/rng";
import type { LimitOrder, Trade } from "../util/types";

export type SessionState = "Open" | "Trading" | "Closed";

export type SessionSubmitResult = SubmitResult | { status: "rejected"; error: SessionStateError };

export type TickReport = {
  time: number;
  trader: string;
  action: OrderAction | null;
  status: "idle" | "accepted" | "rejected" | "failed";
  trades: Trade[];
  error?: string;
};

export type BalanceSummary = { kind: TraderKind; n: number; balanceSum: number; balanceAvg: number };

export type SessionSummary = {
  id: string;
  state: SessionState;
  ticks: number;
  trades: number;
  volume: number;
  balances: BalanceSummary[];
  bestBid: number | null;
  bestAsk: number | null;
};

export type SessionEvents = {
  quote: QuoteRecord;
  trade: TradeRecord;
  cancel: CancelRecord;
  reject: { ts: number; trader: string; reason: string };
  tick: TickReport;
  state: { ts: number; from: SessionState; to: SessionState };
};

type ListenerMap = { [K in keyof SessionEvents]: Set<(ev: SessionEvents[K]) => void> };

export type SessionOpts = {
  id?: string;
  seed?: string;
  logger?: Logger;
};

function traderName(prefix: "B" | "S", n: number) {
  return `${prefix}${String(n).padStart(2, "0")}`;
}

/**
 * One trading day over an exclusively owned book, tape and trader population.
 *
 * Open → start() → Trading → (ticks elapsed | requestStop) → Closed.
 * Each tick: issue due customer orders, let one uniformly drawn trader decide,
 * match its order to completion, then let every trader respond. Nothing inside a
 * tick yields, so one order is fully processed before the next trader acts.
 */
export class MarketSession {
  readonly id: string;
  readonly scenario: Scenario;
  readonly book: OrderBook;
  readonly engine: MatchingEngine;
  readonly tape: Tape;

  private log: Logger;
  private rng: RNG;
  private traders: Trader[] = [];
  private byId = new Map<string, Trader>();
  private feed: CustomerOrderFeed;
  private signal: ImbalanceTracker;
  private samples: ImbalanceSample[] = [];

  private st: SessionState = "Open";
  private timeTick = 0;
  private orderSeq = 0;
  private inTick = false;
  private stopRequested = false;
  private listeners: ListenerMap = {
    quote: new Set(),
    trade: new Set(),
    cancel: new Set(),
    reject: new Set(),
    tick: new Set(),
    state: new Set(),
  };

  constructor(scenario: Scenario, opts: SessionOpts = {}) {
    if (!Number.isInteger(scenario.depth) || scenario.depth < 1) throw new ConfigError(`depth must be a positive integer, got ${scenario.depth}`);
    if (!Number.isInteger(scenario.ticks) || scenario.ticks < 1) throw new ConfigError(`ticks must be a positive integer, got ${scenario.ticks}`);
    if (scenario.minPrice < 1 || scenario.minPrice >= scenario.maxPrice) throw new ConfigError(`invalid price range [${scenario.minPrice}, ${scenario.maxPrice}]`);

    this.id = opts.id ?? scenario.name;
    this.scenario = scenario;
    this.log = (opts.logger ?? silentLogger()).child({ session: this.id });
    this.rng = new RNG(opts.seed ?? scenario.seed);

    this.book = new OrderBook(scenario.symbol, this.log);
    this.engine = new MatchingEngine(this.book);
    this.tape = new Tape(this.id);
    this.signal = new ImbalanceTracker(scenario.depth, scenario.impact.window);

    const buyers = this.populate("B", scenario.population.buyers);
    const sellers = this.populate("S", scenario.population.sellers);
    if (buyers.length < 1 || sellers.length < 1) throw new ConfigError("population needs at least one buyer and one seller");

    this.feed = new CustomerOrderFeed(scenario.schedule, buyers, sellers, this.rng, scenario);
  }

  private populate(prefix: "B" | "S", decls: TraderDecl[]): string[] {
    const ids: string[] = [];
    const impact = { ...this.scenario.impact, depth: this.scenario.depth, threshold: this.scenario.threshold };
    for (const decl of decls) {
      for (let i = 0; i < decl.count; i++) {
        const t = createTrader(decl.kind, traderName(prefix, ids.length), this.rng, impact);
        ids.push(t.id);
        this.traders.push(t);
        this.byId.set(t.id, t);
      }
    }
    return ids;
  }

  // ---- events ----

  on<K extends keyof SessionEvents>(type: K, fn: (ev: SessionEvents[K]) => void) {
    const set: Set<(ev: SessionEvents[K]) => void> = this.listeners[type];
    set.add(fn);
  }

  off<K extends keyof SessionEvents>(type: K, fn: (ev: SessionEvents[K]) => void) {
    const set: Set<(ev: SessionEvents[K]) => void> = this.listeners[type];
    set.delete(fn);
  }

  private emit<K extends keyof SessionEvents>(type: K, ev: SessionEvents[K]) {
    const set: Set<(ev: SessionEvents[K]) => void> = this.listeners[type];
    set.forEach((fn) => fn(ev));
  }

  // ---- accessors ----

  get state(): SessionState {
    return this.st;
  }

  /** ticks elapsed so far */
  get time() {
    return this.timeTick;
  }

  get population(): readonly Trader[] {
    return this.traders;
  }

  trader(id: string): Trader | undefined {
    return this.byId.get(id);
  }

  imbalance(): readonly ImbalanceSample[] {
    return this.samples;
  }

  view(): MarketView {
    const ticks = this.scenario.ticks;
    return {
      time: this.timeTick,
      countdown: Math.max(0, (ticks - this.timeTick) / ticks),
      bestBid: this.book.bestBid(),
      bestAsk: this.book.bestAsk(),
      snapshot: this.book.levels(this.scenario.depth),
      last: this.engine.last,
      minPrice: this.scenario.minPrice,
      maxPrice: this.scenario.maxPrice,
    };
  }

  // ---- lifecycle ----

  private transition(to: SessionState) {
    const from = this.st;
    this.st = to;
    this.log.info("session state", { from, to, tick: this.timeTick });
    this.emit("state", { ts: this.timeTick, from, to });
  }

  start() {
    if (this.st !== "Open") throw new SessionStateError(`Session ${this.id} cannot start from ${this.st}`);
    this.transition("Trading");
  }

  /** Stop after the tick in progress; immediately when between ticks. */
  requestStop() {
    if (this.st === "Closed") return;
    if (this.inTick) this.stopRequested = true;
    else this.close();
  }

  close() {
    if (this.st === "Closed") return;
    this.transition("Closed");
    this.log.info("session closed", { ticks: this.timeTick, trades: this.tape.trades().length, resting: this.book.size });
  }

  run(): SessionSummary {
    if (this.st === "Open") this.start();
    while (this.st === "Trading") this.step();
    return this.summary();
  }

  step(): TickReport {
    if (this.st !== "Trading") throw new SessionStateError(`Session ${this.id} is ${this.st}`);
    this.inTick = true;
    try {
      return this.tick();
    } finally {
      this.inTick = false;
      this.timeTick++;
      if (this.stopRequested || this.timeTick >= this.scenario.ticks) this.close();
    }
  }

  private tick(): TickReport {
    const time = this.timeTick;
    for (const a of this.feed.due(time)) this.issue(a);

    const trader = this.rng.pick(this.traders);
    if (!trader) throw new ConfigError("empty population");

    let action: OrderAction | null;
    try {
      action = trader.decide(this.view());
    } catch (e) {
      const err = e instanceof StrategyComputationError ? e : new StrategyComputationError(trader.id, errorMessage(e), { cause: e });
      this.log.warn("strategy failed, trader skipped", { trader: trader.id, tick: time, error: err.message });
      const report: TickReport = { time, trader: trader.id, action: null, status: "failed", trades: [], error: err.message };
      this.emit("tick", report);
      return report;
    }

    if (!action) {
      const report: TickReport = { time, trader: trader.id, action: null, status: "idle", trades: [] };
      this.emit("tick", report);
      return report;
    }

    const res = this.submit(trader.id, action);
    const trades = res.status === "accepted" ? res.trades : [];

    const after = this.view();
    const sample = this.signal.observe(after.snapshot, time);
    if (sample) this.samples.push(sample);
    for (const t of this.traders) t.respond(after, trades);

    const report: TickReport =
      res.status === "accepted"
        ? { time, trader: trader.id, action, status: "accepted", trades }
        : { time, trader: trader.id, action, status: "rejected", trades, error: res.error.message };
    this.emit("tick", report);
    return report;
  }

  /** a new customer order replaces the trader's job, so its stale quote goes */
  private issue(a: Assignment) {
    const t = this.byId.get(a.trader);
    if (!t) {
      this.log.warn("assignment for unknown trader", { trader: a.trader });
      return;
    }
    this.cancelQuotes(t.id);
    t.assign(a);
  }

  private cancelQuotes(traderId: string) {
    for (const o of this.book.ordersOf(traderId)) {
      const res = this.engine.cancel(o.id);
      if (!res.ok) continue;
      const rec = this.tape.cancel(this.timeTick, { trader: traderId, orderId: o.id, side: o.side, price: o.price, qty: res.order.qty });
      this.emit("cancel", rec);
    }
  }

  /**
   * Route one order from a trader to the engine. The trader keeps a single live
   * quote: a valid new order first cancels whatever it has resting.
   */
  submit(traderId: string, action: OrderAction): SessionSubmitResult {
    if (this.st !== "Trading") {
      return { status: "rejected", error: new SessionStateError(`Session ${this.id} is ${this.st}`) };
    }
    const trader = this.byId.get(traderId);
    if (!trader) return this.reject(traderId, new ValidationError(`Unknown trader ${traderId}`));

    const order: LimitOrder = {
      id: `${traderId}-${++this.orderSeq}`,
      trader: traderId,
      side: action.side,
      price: action.price,
      qty: action.qty,
      ts: this.timeTick,
    };
    try {
      validateOrder(order);
    } catch (e) {
      if (!(e instanceof ValidationError)) throw e;
      trader.onRejected(e);
      return this.reject(traderId, e);
    }

    this.cancelQuotes(traderId);
    this.emit("quote", this.tape.quote(order.ts, { trader: traderId, orderId: order.id, side: order.side, price: order.price, qty: order.qty }));

    const res = this.engine.submit(order);
    if (res.status === "rejected") {
      trader.onRejected(res.error);
      return this.reject(traderId, res.error);
    }

    const trades: Trade[] = [];
    for (const t of res.trades) {
      const rec = this.tape.trade(t);
      this.emit("trade", rec);
      this.byId.get(rec.trade.buyer)?.bookkeep(rec.trade);
      this.byId.get(rec.trade.seller)?.bookkeep(rec.trade);
      trades.push(rec.trade);
    }
    return { ...res, trades };
  }

  private reject(traderId: string, error: ValidationError): SessionSubmitResult {
    this.log.debug("order rejected", { trader: traderId, reason: error.message });
    this.emit("reject", { ts: this.timeTick, trader: traderId, reason: error.message });
    return { status: "rejected", error };
  }

  // ---- results ----

  balances(): BalanceSummary[] {
    const byKind = new Map<TraderKind, { n: number; sum: number }>();
    for (const t of this.traders) {
      const cur = byKind.get(t.kind) ?? { n: 0, sum: 0 };
      cur.n++;
      cur.sum += t.balance;
      byKind.set(t.kind, cur);
    }
    return [...byKind.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([kind, { n, sum }]) => ({ kind, n, balanceSum: sum, balanceAvg: sum / n }));
  }

  summary(): SessionSummary {
    const trades = this.tape.trades();
    return {
      id: this.id,
      state: this.st,
      ticks: this.timeTick,
      trades: trades.length,
      volume: trades.reduce((s, t) => s + t.qty, 0),
      balances: this.balances(),
      bestBid: this.book.bestBid()?.price ?? null,
      bestAsk: this.book.bestAsk()?.price ?? null,
    };
  }
}
