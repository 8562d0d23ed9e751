import { MarketSession, SessionSummary } from "./MarketSession";
import { TapeRecord } from "./Tape";
import type { Scenario } from "../config/scenario";
import type { Row } from "../util/csvlog";
import { Logger, silentLogger } from "../util/logger";

export type DayResult = {
  day: number;
  summary: SessionSummary;
  tape: readonly TapeRecord[];
};

export type ExperimentResult = {
  name: string;
  days: DayResult[];
};

export const BALANCES_HEADER = ["day", "session", "kind", "n", "balanceSum", "balanceAvg", "bestBid", "bestAsk"];

export type ExperimentOpts = {
  logger?: Logger;
  /** hook to attach listeners (CSV writers, API) before the day starts */
  onSession?: (session: MarketSession, day: number) => void;
  onDay?: (result: DayResult) => void;
};

/**
 * Runs `scenario.days` independent trading days. Each day owns a fresh session
 * (book, tape, traders) seeded from the scenario seed and the day number, so a
 * day is reproducible on its own and days can be farmed out to separate processes.
 */
export function runExperiment(scenario: Scenario, opts: ExperimentOpts = {}): ExperimentResult {
  const log = opts.logger ?? silentLogger();
  const days: DayResult[] = [];

  for (let day = 0; day < scenario.days; day++) {
    const session = new MarketSession(scenario, { id: `${scenario.name}-d${day}`, seed: `${scenario.seed}:${day}`, logger: log });
    opts.onSession?.(session, day);
    const summary = session.run();
    const result = { day, summary, tape: session.tape.all() };
    opts.onDay?.(result);
    days.push(result);
    log.info("day finished", { day, trades: summary.trades, volume: summary.volume });
  }

  return { name: scenario.name, days };
}

export function balanceRows(r: DayResult): Row[] {
  return r.summary.balances.map((b) => ({
    day: r.day,
    session: r.summary.id,
    kind: b.kind,
    n: b.n,
    balanceSum: b.balanceSum,
    balanceAvg: b.balanceAvg,
    bestBid: r.summary.bestBid,
    bestAsk: r.summary.bestAsk,
  }));
}
