import { LadderSettings } from "@ladder-lottery/core-config";
import { HmacRandomSource, IRandomSource, MathRandomSource } from "@ladder-lottery/core-rng";
import { LadderEngine, LadderRound, Pairing, collectLandingStats, normalizeNames } from "@ladder-lottery/game-math-ladder";

export interface DrawOptions {
  players: number;
  levels: number;
  probability: number;
  names: string;
  outcomes: string;
  seed?: string;
  highlight?: number;
}

export interface StatsOptions {
  rounds: number;
  players: number;
  levels: number;
  probability: number;
  seed?: string;
}

export interface DrawReport {
  seed: string | null;
  layout: boolean[][];
  mapping: number[];
  pairings: Pairing[];
}

export interface StatsReport {
  rounds: number;
  players: number;
  levels: number;
  probability: number;
  averageRungsPerLevel: number;
  maxDeviation: number;
  /** frequencies[top][bottom] in percent */
  frequencies: number[][];
}

export function parseArgs(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const key = arg.replace(/^--/, "");
      const value = args[i + 1];
      if (value && !value.startsWith("--")) {
        result[key] = value;
        i++;
      } else {
        result[key] = "true";
      }
    }
  }
  return result;
}

export function drawOptionsFrom(args: Record<string, string>, settings: LadderSettings): DrawOptions {
  return {
    players: Number(args.players ?? settings.defaultPlayers),
    levels: Number(args.levels ?? settings.defaultLevels),
    probability: Number(args.probability ?? settings.defaultProbability),
    names: args.names ?? "",
    outcomes: args.outcomes ?? "",
    seed: args.seed,
    highlight: args.highlight != null ? Number(args.highlight) : undefined,
  };
}

export function statsOptionsFrom(args: Record<string, string>, settings: LadderSettings): StatsOptions {
  return {
    rounds: Number(args.rounds ?? 10_000),
    players: Number(args.players ?? settings.defaultPlayers),
    levels: Number(args.levels ?? settings.defaultLevels),
    probability: Number(args.probability ?? settings.defaultProbability),
    seed: args.seed,
  };
}

export function drawLadder(options: DrawOptions, settings: LadderSettings): LadderRound {
  const engine = new LadderEngine({
    playerCount: options.players,
    levelCount: options.levels,
    rungProbability: options.probability,
  });
  const source = randomSource(options.seed);
  return engine.play({
    rng: () => source.next(),
    playerNames: normalizeNames(options.names, options.players, settings.playerPrefix),
    outcomeNames: normalizeNames(options.outcomes, options.players, settings.outcomePrefix),
    highlight: options.highlight,
  });
}

export function toDrawReport(round: LadderRound, seed?: string): DrawReport {
  return {
    seed: seed ?? null,
    layout: round.layout.levels.map((level) => [...level]),
    mapping: [...round.mapping],
    pairings: round.pairings,
  };
}

export function buildStatsReport(options: StatsOptions): StatsReport {
  const source = randomSource(options.seed);
  const stats = collectLandingStats(
    { playerCount: options.players, levelCount: options.levels, rungProbability: options.probability },
    options.rounds,
    () => source.next(),
  );
  return {
    rounds: stats.rounds,
    players: options.players,
    levels: options.levels,
    probability: options.probability,
    averageRungsPerLevel: round(stats.averageRungsPerLevel, 4),
    maxDeviation: round(stats.maxDeviation, 4),
    frequencies: stats.frequencies.map((row) => row.map((value) => round(value * 100, 2))),
  };
}

function randomSource(seed?: string): IRandomSource {
  return seed ? new HmacRandomSource(seed) : new MathRandomSource();
}

function round(value: number, digits: number): number {
  const scale = Math.pow(10, digits);
  return Math.round(value * scale) / scale;
}
