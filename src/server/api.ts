import Fastify, { FastifyInstance } from "fastify";
import { WebSocketServer, WebSocket } from "ws";
import { MarketSession } from "../kernel/MarketSession";
import type { Logger } from "../util/logger";

export const CHANNELS = ["trade", "quote", "cancel", "tick"] as const;
export type Channel = (typeof CHANNELS)[number];

type ClientSubscription = {
  ws: WebSocket;
  channels: Set<Channel>;
};

type ClientMessage = { type: "subscribe" | "unsubscribe"; channel: Channel };

function isChannel(x: unknown): x is Channel {
  return CHANNELS.some((c) => c === x);
}

export function parseClientMessage(raw: string): ClientMessage | null {
  let msg: unknown;
  try {
    msg = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof msg !== "object" || msg === null) return null;
  const type = "type" in msg ? msg.type : undefined;
  const channel = "channel" in msg ? msg.channel : undefined;
  if ((type !== "subscribe" && type !== "unsubscribe") || !isChannel(channel)) return null;
  return { type, channel };
}

/**
 * Read-only view of a running session: REST snapshots plus a WebSocket stream
 * of tape events on /ws. There is no order entry.
 */
export function buildApi(session: MarketSession, opts: { logger?: Logger } = {}): { app: FastifyInstance; wss: WebSocketServer } {
  const app = Fastify();
  const log = opts.logger;

  app.get("/status", async () => ({
    id: session.id,
    symbol: session.book.symbol,
    state: session.state,
    tick: session.time,
    ticks: session.scenario.ticks,
    resting: session.book.size,
    last: session.engine.last,
  }));

  app.get<{ Querystring: { depth?: string } }>("/book", async (req, reply) => {
    const depth = req.query.depth === undefined ? 10 : Number(req.query.depth);
    if (!Number.isInteger(depth) || depth < 1) return reply.code(400).send({ error: "depth must be a positive integer" });
    return { symbol: session.book.symbol, ...session.book.levels(depth), last: session.engine.last };
  });

  app.get<{ Querystring: { since?: string } }>("/tape", async (req) => {
    const since = Number(req.query.since ?? 0);
    return session.tape.since(Number.isFinite(since) ? since : 0);
  });

  app.get("/balances", async () => session.balances());

  app.get("/traders", async () =>
    session.population.map((t) => ({ id: t.id, kind: t.kind, balance: t.balance, cash: t.cash, inventory: t.inventory, assignment: t.assignment }))
  );

  app.get("/imbalance", async () => session.imbalance());

  const wss = new WebSocketServer({ noServer: true });
  const server = app.server;
  const clients = new Map<WebSocket, ClientSubscription>();

  server.on("upgrade", (req, socket, head) => {
    if (req.url?.startsWith("/ws")) {
      wss.handleUpgrade(req, socket, head, (ws) => {
        wss.emit("connection", ws, req);
      });
    } else {
      socket.destroy();
    }
  });

  wss.on("connection", (ws) => {
    clients.set(ws, { ws, channels: new Set() });

    ws.on("message", (data) => {
      const msg = parseClientMessage(data.toString());
      const client = clients.get(ws);
      if (!msg || !client) {
        ws.send(JSON.stringify({ error: "invalid message" }));
        return;
      }
      if (msg.type === "subscribe") client.channels.add(msg.channel);
      else client.channels.delete(msg.channel);
      ws.send(JSON.stringify({ type: `${msg.type}d`, channel: msg.channel }));
    });

    ws.on("close", () => {
      clients.delete(ws);
    });

    ws.send(JSON.stringify({ type: "connected", session: session.id }));
  });

  function broadcast(channel: Channel, event: unknown) {
    const data = JSON.stringify({ channel, event });
    clients.forEach((client) => {
      if (client.ws.readyState === WebSocket.OPEN && client.channels.has(channel)) client.ws.send(data);
    });
  }

  session.on("trade", (ev) => broadcast("trade", ev));
  session.on("quote", (ev) => broadcast("quote", ev));
  session.on("cancel", (ev) => broadcast("cancel", ev));
  session.on("tick", (ev) => broadcast("tick", ev));

  app.addHook("onClose", async () => {
    clients.forEach((c) => c.ws.terminate());
    wss.close();
    log?.info("api closed");
  });

  return { app, wss };
}

export async function startApi(session: MarketSession, opts: { port?: number; logger?: Logger } = {}) {
  const api = buildApi(session, opts);
  const port = opts.port ?? 3000;
  await api.app.listen({ port, host: "0.0.0.0" });
  opts.logger?.info("api listening", { url: `http://localhost:${port}`, ws: "/ws" });
  return api;
}
