export type RandomDraw = () => number;

export interface LadderConfig {
  playerCount: number;
  levelCount: number;
  rungProbability: number;
}

export type RungLevel = readonly boolean[];

export interface RungLayout {
  readonly playerCount: number;
  /** levels[c][i] is true when a rung joins rails i and i + 1 at level c. */
  readonly levels: readonly RungLevel[];
}

/** mapping[topIndex] = bottomIndex */
export type Permutation = readonly number[];

export interface Pairing {
  topIndex: number;
  bottomIndex: number;
  player: string;
  outcome: string;
}

export interface RenderOptions {
  columnWidth?: number;
  levelHeight?: number;
  labelBand?: number;
  /** Top index whose route is drawn over the ladder. */
  highlight?: number;
}

export interface LadderDiagram {
  svg: string;
  width: number;
  height: number;
}

export interface LadderRound {
  layout: RungLayout;
  mapping: Permutation;
  pairings: Pairing[];
  diagram: LadderDiagram;
}

export interface LadderPlayInput {
  rng: RandomDraw;
  playerNames: readonly string[];
  outcomeNames: readonly string[];
  highlight?: number;
}

export interface LandingStats {
  rounds: number;
  playerCount: number;
  /** counts[top][bottom] */
  counts: number[][];
  frequencies: number[][];
  averageRungsPerLevel: number;
  maxDeviation: number;
}
