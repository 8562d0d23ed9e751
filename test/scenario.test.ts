import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect } from "vitest";
import { applyOverrides, loadScenario, parseScenario } from "../src/config/scenario";
import { ConfigError } from "../src/util/errors";

const population = { buyers: [{ kind: "ZIC" }], sellers: [{ kind: "SHVR", count: 2 }] };

describe("scenario config", () => {
  it("fills defaults", () => {
    const s = parseScenario({ population });

    expect(s.seed).toBe("seed-42");
    expect(s.ticks).toBe(1000);
    expect(s.depth).toBe(3);
    expect(s.threshold).toBe(0.5);
    expect(s.impact).toEqual({ shiftCoefficient: 5, levelDecay: 0.8, window: 10, ratioThreshold: 0.6 });
    expect(s.schedule.timeMode).toBe("drip-poisson");
    expect(s.schedule.demand).toEqual({ min: 50, max: 150, stepMode: "fixed" });
    expect(s.population.buyers).toEqual([{ kind: "ZIC", count: 1 }]);
    expect(s.logging).toEqual({ enabled: true, dir: "./logs", level: "info" });
  });

  it("rejects an inverted price range", () => {
    expect(() => parseScenario({ population, minPrice: 100, maxPrice: 100 })).toThrow(
      "Invalid scenario: maxPrice: maxPrice must exceed minPrice"
    );
  });

  it("rejects a side without traders", () => {
    expect(() => parseScenario({ population: { buyers: [{ kind: "ZIC", count: 0 }], sellers: population.sellers } })).toThrow(
      "Invalid scenario: population.buyers: at least one buyer is required"
    );
  });

  it.each([
    ["unknown trader kind", { population: { buyers: [{ kind: "HODL" }], sellers: [] } }],
    ["non-positive depth", { population, depth: 0 }],
    ["missing population", {}],
    ["level decay above one", { population, impact: { levelDecay: 1.5 } }],
    ["not an object", "nope"],
  ])("rejects %s", (_name, raw) => {
    expect(() => parseScenario(raw)).toThrow(ConfigError);
  });

  it("wraps unreadable files", () => {
    const missing = path.join(os.tmpdir(), "lobsim-missing", "none.json");
    expect(() => loadScenario(missing)).toThrow(`Cannot read scenario ${missing}`);
  });

  it("loads a scenario file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "lobsim-"));
    const file = path.join(dir, "s.json");
    fs.writeFileSync(file, JSON.stringify({ name: "file", days: 2, population }));
    try {
      const s = loadScenario(file);
      expect(s.name).toBe("file");
      expect(s.days).toBe(2);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("loads the bundled default scenario", () => {
    const s = loadScenario(path.resolve("scenarios/default.json"));
    expect(s.name).toBe("ishv-vs-baselines");
    expect(s.population.buyers.map((d) => d.kind)).toContain("ISHV");
  });

  it("applies overrides on top of the file", () => {
    const s = applyOverrides(parseScenario({ population, days: 5 }), { days: 2, seed: "other", logs: false, level: "debug" });

    expect(s.days).toBe(2);
    expect(s.seed).toBe("other");
    expect(s.logging).toEqual({ enabled: false, dir: "./logs", level: "debug" });
  });

  it("validates overrides", () => {
    const s = parseScenario({ population });
    expect(() => applyOverrides(s, { ticks: 0 })).toThrow(ConfigError);
  });
});
