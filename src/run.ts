#!/usr/bin/env node
import path from "path";
import { Command } from "commander";

import { applyOverrides, loadScenario, Scenario, ScenarioOverrides } from "./config/scenario";
import { MarketSession } from "./kernel/MarketSession";
import { PacedRunner } from "./kernel/PacedRunner";
import { BALANCES_HEADER, balanceRows, runExperiment } from "./kernel/Experiment";
import { TAPE_HEADER, tapeRow } from "./kernel/Tape";
import { startApi } from "./server/api";
import { CsvLog } from "./util/csvlog";
import { ConfigError, errorMessage } from "./util/errors";
import { createLogger, Logger } from "./util/logger";

/* ============================
 * CLI
 * ============================ */

type CliOpts = {
  config: string;
  days?: string;
  ticks?: string;
  seed?: string;
  out?: string;
  logs: boolean;
  logLevel?: string;
  port?: string;
  tickMs: string;
};

function positiveInt(name: string, v: string): number {
  const n = Number(v);
  if (!Number.isInteger(n) || n < 1) throw new ConfigError(`--${name} must be a positive integer, got "${v}"`);
  return n;
}

function overridesFrom(cli: CliOpts): ScenarioOverrides {
  const level = cli.logLevel;
  return {
    ...(cli.days ? { days: positiveInt("days", cli.days) } : {}),
    ...(cli.ticks ? { ticks: positiveInt("ticks", cli.ticks) } : {}),
    ...(cli.seed ? { seed: cli.seed } : {}),
    ...(cli.out ? { dir: cli.out } : {}),
    ...(cli.logs === false ? { logs: false } : {}),
    ...(level === "error" || level === "warn" || level === "info" || level === "debug" ? { level } : {}),
  };
}

function batch(scenario: Scenario, log: Logger) {
  const { enabled, dir } = scenario.logging;
  const tapeCsv = enabled ? new CsvLog(path.join(dir, "tape.csv"), { truncate: true, header: TAPE_HEADER }) : undefined;
  const balancesCsv = enabled ? new CsvLog(path.join(dir, "balances.csv"), { truncate: true, header: BALANCES_HEADER }) : undefined;

  const res = runExperiment(scenario, {
    logger: log,
    onDay: (r) => {
      tapeCsv?.writeAll(r.tape.map((rec) => tapeRow(r.day, rec)));
      balancesCsv?.writeAll(balanceRows(r));
    },
  });

  for (const d of res.days) {
    const line = d.summary.balances.map((b) => `${b.kind}=${b.balanceAvg.toFixed(2)}`).join(" ");
    console.log(`day ${d.day}: trades=${d.summary.trades} volume=${d.summary.volume} avg balance ${line}`);
  }
  if (enabled) console.log(`logs written to ${dir}`);
}

async function live(scenario: Scenario, port: number, tickMs: number, log: Logger) {
  const session = new MarketSession(scenario, { id: `${scenario.name}-live`, logger: log });
  const { app } = await startApi(session, { port, logger: log });
  const runner = new PacedRunner(session, tickMs);

  const stopAll = () => runner.stop();
  process.on("SIGINT", stopAll);
  process.on("SIGTERM", stopAll);

  const summary = await runner.start();
  console.log(`session ${summary.id} closed after ${summary.ticks} ticks, ${summary.trades} trades`);
  await app.close();
}

async function main(argv: string[]) {
  const program = new Command();
  program
    .name("lobsim")
    .option("-c, --config <file>", "scenario JSON path", "scenarios/default.json")
    .option("--days <n>", "override days")
    .option("--ticks <n>", "override ticks per day")
    .option("--seed <s>", "override seed")
    .option("--out <dir>", "override log dir")
    .option("--no-logs", "disable CSV output")
    .option("--log-level <level>", "error | warn | info | debug")
    .option("--port <n>", "serve one live session on this HTTP port")
    .option("--tick-ms <ms>", "wall-clock ms per tick in live mode", "50");

  program.parse(argv);
  const cli = program.opts<CliOpts>();

  const scenario = applyOverrides(loadScenario(cli.config), overridesFrom(cli));
  const log = createLogger({ level: scenario.logging.level });
  log.info("scenario loaded", { name: scenario.name, days: scenario.days, ticks: scenario.ticks, depth: scenario.depth, seed: scenario.seed });

  if (cli.port) await live(scenario, positiveInt("port", cli.port), positiveInt("tick-ms", cli.tickMs), log);
  else batch(scenario, log);
}

if (require.main === module) {
  main(process.argv).catch((e: unknown) => {
    console.error(e instanceof ConfigError ? e.message : errorMessage(e));
    process.exitCode = 1;
  });
}
