import fs from "fs";
import path from "path";
import { z } from "zod";

import { ConfigError } from "../util/errors";

const TraderKindSchema = z.enum(["GVWY", "ZIC", "SHVR", "SNPR", "ZIP", "ISHV", "ISHV-F", "IZIP"]);

const TraderDeclSchema = z.object({
  kind: TraderKindSchema,
  count: z.number().int().min(0).default(1),
});

const PriceRangeSchema = z
  .object({
    min: z.number().int().positive(),
    max: z.number().int().positive(),
    stepMode: z.enum(["fixed", "jittered", "random"]).default("fixed"),
  })
  .refine((r) => r.min <= r.max, { message: "range min must not exceed max" });

const ScheduleSchema = z.object({
  supply: PriceRangeSchema.default({ min: 50, max: 150 }),
  demand: PriceRangeSchema.default({ min: 50, max: 150 }),
  timeMode: z.enum(["periodic", "drip-fixed", "drip-jitter", "drip-poisson"]).default("drip-poisson"),
  interval: z.number().int().positive().default(30), // ticks per replenishment cycle
  qty: z.number().int().positive().default(1),
});

const ImpactSchema = z.object({
  shiftCoefficient: z.number().finite().default(5),
  levelDecay: z.number().gt(0).max(1).default(0.8),
  window: z.number().int().positive().default(10),
  ratioThreshold: z.number().min(0).max(1).default(0.6),
});

export const ScenarioSchema = z
  .object({
    name: z.string().default("scenario"),
    symbol: z.string().min(1).default("SIM"),
    seed: z.string().default("seed-42"),
    days: z.number().int().positive().default(1),
    ticks: z.number().int().positive().default(1000),
    depth: z.number().int().positive().default(3), // MLOFI levels (m)
    threshold: z.number().min(0).default(0.5),
    minPrice: z.number().int().positive().default(1),
    maxPrice: z.number().int().positive().default(200),
    impact: ImpactSchema.default({}),
    population: z.object({
      buyers: z.array(TraderDeclSchema),
      sellers: z.array(TraderDeclSchema),
    }),
    schedule: ScheduleSchema.default({}),
    logging: z
      .object({
        enabled: z.boolean().default(true),
        dir: z.string().default("./logs"),
        level: z.enum(["error", "warn", "info", "debug"]).default("info"),
      })
      .default({}),
  })
  .superRefine((s, ctx) => {
    if (s.minPrice >= s.maxPrice) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["maxPrice"], message: "maxPrice must exceed minPrice" });
    const total = (decls: { count: number }[]) => decls.reduce((n, d) => n + d.count, 0);
    if (total(s.population.buyers) < 1) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["population", "buyers"], message: "at least one buyer is required" });
    if (total(s.population.sellers) < 1) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["population", "sellers"], message: "at least one seller is required" });
  });

export type Scenario = z.infer<typeof ScenarioSchema>;
export type ScenarioInput = z.input<typeof ScenarioSchema>;
export type TraderDecl = z.infer<typeof TraderDeclSchema>;
export type PriceRange = z.infer<typeof PriceRangeSchema>;
export type OrderSchedule = z.infer<typeof ScheduleSchema>;
export type ImpactConfig = z.infer<typeof ImpactSchema>;

export function parseScenario(raw: unknown): Scenario {
  const res = ScenarioSchema.safeParse(raw);
  if (!res.success) {
    const detail = res.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid scenario: ${detail}`);
  }
  return res.data;
}

export function loadScenario(p: string): Scenario {
  const abs = path.resolve(p);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(abs, "utf8"));
  } catch (e) {
    throw new ConfigError(`Cannot read scenario ${abs}`, { cause: e });
  }
  return parseScenario(raw);
}

export type ScenarioOverrides = {
  days?: number;
  ticks?: number;
  seed?: string;
  dir?: string;
  logs?: boolean;
  level?: Scenario["logging"]["level"];
};

/** command-line values win over the scenario file */
export function applyOverrides(scenario: Scenario, o: ScenarioOverrides): Scenario {
  return parseScenario({
    ...scenario,
    ...(o.days !== undefined ? { days: o.days } : {}),
    ...(o.ticks !== undefined ? { ticks: o.ticks } : {}),
    ...(o.seed !== undefined ? { seed: o.seed } : {}),
    logging: {
      ...scenario.logging,
      ...(o.dir !== undefined ? { dir: o.dir } : {}),
      ...(o.logs !== undefined ? { enabled: o.logs } : {}),
      ...(o.level !== undefined ? { level: o.level } : {}),
    },
  });
}
