import { LadderError, LadderErrorCode } from "@ladder-lottery/core-errors";
import { Permutation, RungLayout } from "./types";

export function assertLayout(layout: RungLayout): void {
  if (!Number.isInteger(layout.playerCount) || layout.playerCount < 2) {
    throw new LadderError(LadderErrorCode.INVALID_LAYOUT, "Ladder: layout playerCount must be an integer >= 2", {
      playerCount: layout.playerCount,
    });
  }
  if (!Array.isArray(layout.levels)) {
    throw new LadderError(LadderErrorCode.INVALID_LAYOUT, "Ladder: layout levels must be an array");
  }
  const gaps = layout.playerCount - 1;
  layout.levels.forEach((level, c) => {
    if (!Array.isArray(level) || level.length !== gaps) {
      throw new LadderError(LadderErrorCode.INVALID_LAYOUT, `Ladder: level ${c} must have ${gaps} gaps`, { level: c });
    }
    for (let i = 0; i < gaps; i++) {
      if (typeof level[i] !== "boolean") {
        throw new LadderError(LadderErrorCode.INVALID_LAYOUT, `Ladder: level ${c} gap ${i} must be a boolean`, { level: c, gap: i });
      }
      if (level[i] && level[i + 1]) {
        throw new LadderError(LadderErrorCode.INVALID_LAYOUT, `Ladder: level ${c} has adjacent rungs at gaps ${i} and ${i + 1}`, {
          level: c,
          gap: i,
        });
      }
    }
  });
}

/** positions[bottom] = top index of the token that ends on that rail. */
export function traceTokens(layout: RungLayout): number[] {
  const positions = identity(layout.playerCount);
  for (const level of layout.levels) {
    for (let i = 0; i < level.length; i++) {
      if (level[i]) {
        const held = positions[i];
        positions[i] = positions[i + 1];
        positions[i + 1] = held;
      }
    }
  }
  return positions;
}

export function invertPermutation(permutation: Permutation): number[] {
  const inverse = new Array<number>(permutation.length).fill(0);
  permutation.forEach((value, index) => {
    inverse[value] = index;
  });
  return inverse;
}

export function simulateLayout(layout: RungLayout): Permutation {
  assertLayout(layout);
  return invertPermutation(traceTokens(layout));
}

/** Rail held by `topIndex` before the first level and after each level. */
export function traceRoute(layout: RungLayout, topIndex: number): number[] {
  if (!Number.isInteger(topIndex) || topIndex < 0 || topIndex >= layout.playerCount) {
    throw new LadderError(LadderErrorCode.INVALID_CONFIGURATION, "Ladder: route index out of range", { topIndex });
  }
  assertLayout(layout);
  let rail = topIndex;
  const route = [rail];
  for (const level of layout.levels) {
    if (rail > 0 && level[rail - 1]) {
      rail -= 1;
    } else if (rail < level.length && level[rail]) {
      rail += 1;
    }
    route.push(rail);
  }
  return route;
}

function identity(size: number): number[] {
  return Array.from({ length: size }, (_, j) => j);
}
