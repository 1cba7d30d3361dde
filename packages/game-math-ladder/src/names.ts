import { LadderError, LadderErrorCode, invalidConfiguration } from "@ladder-lottery/core-errors";
import { Pairing, Permutation } from "./types";

/**
 * First `count` trimmed, non-empty tokens of `raw`; any shortfall is filled with
 * `prefix + position` (1-based).
 */
export function normalizeNames(raw: string, count: number, prefix: string, delimiter = ","): string[] {
  if (!Number.isInteger(count) || count < 0) {
    throw invalidConfiguration("Ladder: name count must be a non-negative integer", { count });
  }
  const parts = raw
    .split(delimiter)
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .slice(0, count);
  for (let i = parts.length; i < count; i++) {
    parts.push(`${prefix}${i + 1}`);
  }
  return parts;
}

export function pairNames(mapping: Permutation, playerNames: readonly string[], outcomeNames: readonly string[]): Pairing[] {
  if (playerNames.length !== mapping.length || outcomeNames.length !== mapping.length) {
    throw new LadderError(LadderErrorCode.INVALID_NAMES, `Ladder: name lists must contain ${mapping.length} entries`, {
      players: playerNames.length,
      outcomes: outcomeNames.length,
    });
  }
  return mapping.map((bottomIndex, topIndex) => ({
    topIndex,
    bottomIndex,
    player: playerNames[topIndex],
    outcome: outcomeNames[bottomIndex],
  }));
}
