import { LadderError, LadderErrorCode, invalidConfiguration } from "@ladder-lottery/core-errors";
import { LadderConfig, RandomDraw, RungLayout } from "./types";

export function assertLadderConfig(config: LadderConfig): void {
  if (!Number.isInteger(config.playerCount) || config.playerCount < 2) {
    throw invalidConfiguration("Ladder: playerCount must be an integer >= 2", { playerCount: config.playerCount });
  }
  if (!Number.isInteger(config.levelCount) || config.levelCount < 1) {
    throw invalidConfiguration("Ladder: levelCount must be an integer >= 1", { levelCount: config.levelCount });
  }
  const p = config.rungProbability;
  if (!Number.isFinite(p) || p < 0 || p > 1) {
    throw invalidConfiguration("Ladder: rungProbability must be between 0 and 1", { rungProbability: p });
  }
}

/**
 * Greedy left-to-right scan per level: a placed rung skips the next gap, so rungs in one
 * level are never adjacent. Earlier gaps are favoured; the result is not uniform over all
 * valid levels.
 */
export function generateLayout(config: LadderConfig, rng: RandomDraw): RungLayout {
  assertLadderConfig(config);
  const gaps = config.playerCount - 1;
  const levels: boolean[][] = [];

  for (let c = 0; c < config.levelCount; c++) {
    const level = new Array<boolean>(gaps).fill(false);
    let i = 0;
    while (i < gaps) {
      if (draw(rng) < config.rungProbability) {
        level[i] = true;
        i += 2;
      } else {
        i += 1;
      }
    }
    levels.push(level);
  }

  return { playerCount: config.playerCount, levels };
}

export function countRungs(layout: RungLayout): number {
  let total = 0;
  for (const level of layout.levels) {
    for (const rung of level) {
      if (rung) total += 1;
    }
  }
  return total;
}

function draw(rng: RandomDraw): number {
  const value = rng();
  if (!Number.isFinite(value) || value < 0 || value >= 1) {
    throw new LadderError(LadderErrorCode.RNG_OUT_OF_RANGE, "Ladder: rng() must return value in [0, 1)", { value });
  }
  return value;
}
