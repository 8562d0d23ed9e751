import type { Side, Trade } from "../util/types";
import type { Row } from "../util/csvlog";
import { SessionStateError } from "../util/errors";

export type OrderFields = { trader: string; orderId: string; side: Side; price: number; qty: number };

export type QuoteRecord = { kind: "quote"; seq: number; ts: number } & OrderFields;
export type CancelRecord = { kind: "cancel"; seq: number; ts: number } & OrderFields;
export type TradeRecord = { kind: "trade"; seq: number; ts: number; trade: Trade };
export type TapeRecord = QuoteRecord | CancelRecord | TradeRecord;

export const TAPE_HEADER = ["day", "ts", "seq", "kind", "trader", "side", "price", "qty", "orderId", "buyer", "seller", "tradeId"];

/** Append-only market record of one session, ordered by ts then append order. */
export class Tape {
  readonly sessionId: string;
  private records: TapeRecord[] = [];

  constructor(sessionId: string) {
    this.sessionId = sessionId;
  }

  get length() {
    return this.records.length;
  }

  private push<R extends TapeRecord>(rec: R): R {
    const last = this.records[this.records.length - 1];
    if (last && rec.ts < last.ts) {
      throw new SessionStateError(`Tape ${this.sessionId}: ts ${rec.ts} precedes ${last.ts}`);
    }
    Object.freeze(rec);
    this.records.push(rec);
    return rec;
  }

  quote(ts: number, o: OrderFields): QuoteRecord {
    return this.push<QuoteRecord>({ kind: "quote", seq: this.records.length, ts, ...o });
  }

  cancel(ts: number, o: OrderFields): CancelRecord {
    return this.push<CancelRecord>({ kind: "cancel", seq: this.records.length, ts, ...o });
  }

  /** stores a frozen copy; holders of the engine's object cannot rewrite the tape */
  trade(trade: Trade): TradeRecord {
    return this.push<TradeRecord>({ kind: "trade", seq: this.records.length, ts: trade.ts, trade: Object.freeze({ ...trade }) });
  }

  all(): readonly TapeRecord[] {
    return this.records;
  }

  trades(): Trade[] {
    const out: Trade[] = [];
    for (const r of this.records) if (r.kind === "trade") out.push(r.trade);
    return out;
  }

  since(seq: number): readonly TapeRecord[] {
    return this.records.slice(Math.max(0, seq));
  }
}

export function tapeRow(day: number, r: TapeRecord): Row {
  if (r.kind === "trade") {
    const t = r.trade;
    return { day, ts: r.ts, seq: r.seq, kind: r.kind, side: t.aggressor, price: t.price, qty: t.qty, buyer: t.buyer, seller: t.seller, tradeId: t.id };
  }
  return { day, ts: r.ts, seq: r.seq, kind: r.kind, trader: r.trader, side: r.side, price: r.price, qty: r.qty, orderId: r.orderId };
}
