import { describe, expect, it } from "vitest";
import { DEFAULT_LADDER_SETTINGS, loadLadderSettings } from "../src";

const reader = (env: Record<string, string>) => (key: string) => env[key];

describe("loadLadderSettings", () => {
  it("falls back to defaults", () => {
    expect(loadLadderSettings(reader({}))).toEqual(DEFAULT_LADDER_SETTINGS);
  });

  it("reads overrides", () => {
    const settings = loadLadderSettings(
      reader({
        LADDER_DEFAULT_PLAYERS: "6",
        LADDER_DEFAULT_LEVELS: "20",
        LADDER_DEFAULT_PROBABILITY: "0.5",
        LADDER_MAX_PLAYERS: "8",
        LADDER_MAX_LEVELS: "30",
        LADDER_PLAYER_PREFIX: "Player ",
        LADDER_OUTCOME_PREFIX: "Gift ",
      }),
    );
    expect(settings).toEqual({
      defaultPlayers: 6,
      defaultLevels: 20,
      defaultProbability: 0.5,
      maxPlayers: 8,
      maxLevels: 30,
      playerPrefix: "Player ",
      outcomePrefix: "Gift ",
    });
  });

  it("treats blank values as unset", () => {
    expect(loadLadderSettings(reader({ LADDER_MAX_LEVELS: " " })).maxLevels).toBe(100);
  });

  it("rejects malformed numbers", () => {
    expect(() => loadLadderSettings(reader({ LADDER_MAX_PLAYERS: "many" }))).toThrowError(/LADDER_MAX_PLAYERS must be an integer/);
    expect(() => loadLadderSettings(reader({ LADDER_DEFAULT_PROBABILITY: "half" }))).toThrowError(/must be a number/);
  });

  it("rejects defaults outside the limits", () => {
    expect(() => loadLadderSettings(reader({ LADDER_MAX_PLAYERS: "3" }))).toThrowError(
      /LADDER_DEFAULT_PLAYERS must be between 2 and 3/,
    );
    expect(() => loadLadderSettings(reader({ LADDER_DEFAULT_PROBABILITY: "1.5" }))).toThrowError(/between 0 and 1/);
  });
});
