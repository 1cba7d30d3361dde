import { describe, expect, it } from "vitest";
import { DEFAULT_LADDER_SETTINGS } from "@ladder-lottery/core-config";
import { LadderError } from "@ladder-lottery/core-errors";
import { NoopMetricsService } from "@ladder-lottery/core-metrics";
import { IRandomSourceFactory } from "@ladder-lottery/core-rng";
import { LadderService } from "../src/ladder.service";
import { InMemoryLogger, sequenceRng } from "../../test-utils/test-helpers";

function fixedFactory(values: number[]): IRandomSourceFactory {
  return {
    create: (seed?: string) => {
      const next = sequenceRng(values);
      return { seed: seed ?? "fixed-seed", source: { next } };
    },
  };
}

function createService(values: number[], logger = new InMemoryLogger()): LadderService {
  return new LadderService({ ...DEFAULT_LADDER_SETTINGS }, fixedFactory(values), logger, new NoopMetricsService());
}

describe("LadderService", () => {
  it("draws from the injected random source", () => {
    const service = createService([0.7, 0.1, 0.2, 0.9]);
    const res = service.draw({ playerCount: 3, levelCount: 2, rungProbability: 0.5, playerNames: "A,B,C", outcomeNames: "X,Y,Z" });

    expect(res.seed).toBe("fixed-seed");
    expect(res.layout).toEqual([
      [false, true],
      [true, false],
    ]);
    expect(res.mapping).toEqual([1, 2, 0]);
    expect(res.pairings.map((p) => `${p.player}:${p.outcome}`)).toEqual(["A:Y", "B:Z", "C:X"]);
  });

  it("keeps no per-request state across differing probabilities", () => {
    const service = createService([0.5]);
    const keys = Object.keys(service).sort();

    expect(service.draw({ playerCount: 2, levelCount: 1, rungProbability: 0 }).layout).toEqual([[false]]);
    expect(service.draw({ playerCount: 2, levelCount: 1, rungProbability: 1 }).layout).toEqual([[true]]);
    for (let i = 1; i <= 50; i++) {
      service.draw({ playerCount: 2, levelCount: 1, rungProbability: i / 100 });
    }
    expect(service.draw({ playerCount: 2, levelCount: 1, rungProbability: 0 }).layout).toEqual([[false]]);
    expect(Object.keys(service).sort()).toEqual(keys);
    expect(keys).toEqual(["logger", "metrics", "rngFactory", "settings"]);
  });

  it("logs the draw with its seed", () => {
    const logger = new InMemoryLogger();
    const service = createService([0.9, 0.9], logger);
    service.draw({ seed: "test-seed", playerCount: 2, levelCount: 2 });
    expect(logger.find("ladder.drawn")?.meta).toEqual({
      seed: "test-seed",
      playerCount: 2,
      levelCount: 2,
      rungProbability: 0.35,
      rungs: 0,
    });
  });

  it("rejects level counts above the configured limit", () => {
    const service = createService([]);
    expect(() => service.draw({ levelCount: 101 })).toThrowError(LadderError);
    expect(() => service.draw({ levelCount: 101 })).toThrowError(/levelCount must be between 1 and 100/);
  });

  it("resolves an empty ladder to the identity", () => {
    const service = createService([]);
    const res = service.resolve({ playerCount: 3, layout: [] });
    expect(res.mapping).toEqual([0, 1, 2]);
    expect(res.playerNames).toEqual(["P1", "P2", "P3"]);
    expect(res.outcomeNames).toEqual(["Prize 1", "Prize 2", "Prize 3"]);
  });
});
