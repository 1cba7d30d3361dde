import { invalidConfiguration } from "@ladder-lottery/core-errors";

export interface LadderSettings {
  defaultPlayers: number;
  defaultLevels: number;
  defaultProbability: number;
  maxPlayers: number;
  maxLevels: number;
  playerPrefix: string;
  outcomePrefix: string;
}

export type SettingsReader = (key: string) => string | undefined;

export const LADDER_SETTINGS = Symbol("LADDER_SETTINGS");

export const DEFAULT_LADDER_SETTINGS: Readonly<LadderSettings> = {
  defaultPlayers: 4,
  defaultLevels: 10,
  defaultProbability: 0.35,
  maxPlayers: 26,
  maxLevels: 100,
  playerPrefix: "P",
  outcomePrefix: "Prize ",
};

export function loadLadderSettings(read: SettingsReader): LadderSettings {
  const settings: LadderSettings = {
    maxPlayers: parseInteger(read, "LADDER_MAX_PLAYERS", DEFAULT_LADDER_SETTINGS.maxPlayers),
    maxLevels: parseInteger(read, "LADDER_MAX_LEVELS", DEFAULT_LADDER_SETTINGS.maxLevels),
    defaultPlayers: parseInteger(read, "LADDER_DEFAULT_PLAYERS", DEFAULT_LADDER_SETTINGS.defaultPlayers),
    defaultLevels: parseInteger(read, "LADDER_DEFAULT_LEVELS", DEFAULT_LADDER_SETTINGS.defaultLevels),
    defaultProbability: parseNumber(read, "LADDER_DEFAULT_PROBABILITY", DEFAULT_LADDER_SETTINGS.defaultProbability),
    playerPrefix: read("LADDER_PLAYER_PREFIX") ?? DEFAULT_LADDER_SETTINGS.playerPrefix,
    outcomePrefix: read("LADDER_OUTCOME_PREFIX") ?? DEFAULT_LADDER_SETTINGS.outcomePrefix,
  };

  if (settings.maxPlayers < 2) {
    throw invalidConfiguration("Config: LADDER_MAX_PLAYERS must be at least 2", { maxPlayers: settings.maxPlayers });
  }
  if (settings.maxLevels < 1) {
    throw invalidConfiguration("Config: LADDER_MAX_LEVELS must be at least 1", { maxLevels: settings.maxLevels });
  }
  if (settings.defaultPlayers < 2 || settings.defaultPlayers > settings.maxPlayers) {
    throw invalidConfiguration(`Config: LADDER_DEFAULT_PLAYERS must be between 2 and ${settings.maxPlayers}`, {
      defaultPlayers: settings.defaultPlayers,
    });
  }
  if (settings.defaultLevels < 1 || settings.defaultLevels > settings.maxLevels) {
    throw invalidConfiguration(`Config: LADDER_DEFAULT_LEVELS must be between 1 and ${settings.maxLevels}`, {
      defaultLevels: settings.defaultLevels,
    });
  }
  if (settings.defaultProbability < 0 || settings.defaultProbability > 1) {
    throw invalidConfiguration("Config: LADDER_DEFAULT_PROBABILITY must be between 0 and 1", {
      defaultProbability: settings.defaultProbability,
    });
  }
  return settings;
}

function parseInteger(read: SettingsReader, key: string, fallback: number): number {
  const raw = read(key);
  if (raw == null || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw invalidConfiguration(`Config: ${key} must be an integer`, { [key]: raw });
  }
  return value;
}

function parseNumber(read: SettingsReader, key: string, fallback: number): number {
  const raw = read(key);
  if (raw == null || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw invalidConfiguration(`Config: ${key} must be a number`, { [key]: raw });
  }
  return value;
}
