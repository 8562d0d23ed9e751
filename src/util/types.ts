export type Side = "BUY" | "SELL";

export type LimitOrder = {
  id: string;
  trader: string;
  side: Side;
  price: number; // int ticks
  qty: number; // remaining qty
  ts: number; // session tick
};

export type L2Level = [price: number, qty: number];

export type TopOfBook = { price: number; qty: number };

export type LevelSnapshot = {
  revision: number;
  bids: L2Level[];
  asks: L2Level[];
};

export type Trade = {
  id: string;
  ts: number;
  price: number;
  qty: number;
  buyOrderId: string;
  sellOrderId: string;
  buyer: string;
  seller: string;
  aggressor: Side; // side of the incoming order
};

export function opposite(side: Side): Side {
  return side === "BUY" ? "SELL" : "BUY";
}
