import { invalidConfiguration } from "@ladder-lottery/core-errors";
import { assertLadderConfig, countRungs, generateLayout } from "./generator";
import { simulateLayout } from "./simulator";
import { LadderConfig, LandingStats, RandomDraw } from "./types";

export function collectLandingStats(config: LadderConfig, rounds: number, rng: RandomDraw): LandingStats {
  assertLadderConfig(config);
  if (!Number.isInteger(rounds) || rounds <= 0) {
    throw invalidConfiguration("Ladder: rounds must be a positive integer", { rounds });
  }

  const n = config.playerCount;
  const counts = Array.from({ length: n }, () => new Array<number>(n).fill(0));
  let rungs = 0;

  for (let r = 0; r < rounds; r++) {
    const layout = generateLayout(config, rng);
    rungs += countRungs(layout);
    simulateLayout(layout).forEach((bottom, top) => {
      counts[top][bottom] += 1;
    });
  }

  const uniform = 1 / n;
  let maxDeviation = 0;
  const frequencies = counts.map((row) =>
    row.map((count) => {
      const frequency = count / rounds;
      maxDeviation = Math.max(maxDeviation, Math.abs(frequency - uniform));
      return frequency;
    }),
  );

  return {
    rounds,
    playerCount: n,
    counts,
    frequencies,
    averageRungsPerLevel: rungs / (rounds * config.levelCount),
    maxDeviation,
  };
}
