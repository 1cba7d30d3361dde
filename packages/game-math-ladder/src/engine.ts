import { LadderError, LadderErrorCode } from "@ladder-lottery/core-errors";
import { assertLadderConfig, generateLayout } from "./generator";
import { pairNames } from "./names";
import { renderLadder } from "./renderer";
import { simulateLayout } from "./simulator";
import { LadderConfig, LadderPlayInput, LadderRound, RandomDraw, RungLayout } from "./types";

export class LadderEngine {
  private readonly config: LadderConfig;

  constructor(config: LadderConfig) {
    assertLadderConfig(config);
    this.config = { ...config };
  }

  get playerCount(): number {
    return this.config.playerCount;
  }

  draw(rng: RandomDraw): RungLayout {
    return generateLayout(this.config, rng);
  }

  play(input: LadderPlayInput): LadderRound {
    const layout = this.draw(input.rng);
    return this.resolve(layout, input.playerNames, input.outcomeNames, input.highlight);
  }

  /** Derives mapping, pairings and diagram for an already drawn layout. */
  resolve(layout: RungLayout, playerNames: readonly string[], outcomeNames: readonly string[], highlight?: number): LadderRound {
    if (layout.playerCount !== this.config.playerCount) {
      throw new LadderError(LadderErrorCode.INVALID_LAYOUT, `Ladder: layout must have ${this.config.playerCount} players`, {
        playerCount: layout.playerCount,
      });
    }
    const mapping = simulateLayout(layout);
    const pairings = pairNames(mapping, playerNames, outcomeNames);
    const diagram = renderLadder(layout, playerNames, outcomeNames, { highlight });
    return { layout, mapping, pairings, diagram };
  }
}
