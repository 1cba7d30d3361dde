import { Pairing } from "@ladder-lottery/game-math-ladder";

export interface LadderResolveResponse {
  mapping: number[];
  playerNames: string[];
  outcomeNames: string[];
  pairings: Pairing[];
  svg: string;
}

export interface LadderDrawResponse extends LadderResolveResponse {
  seed: string;
  playerCount: number;
  levelCount: number;
  rungProbability: number;
  layout: boolean[][];
}
