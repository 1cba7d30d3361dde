import { Inject, Injectable } from "@nestjs/common";
import { LADDER_SETTINGS, LadderSettings } from "@ladder-lottery/core-config";
import { invalidConfiguration } from "@ladder-lottery/core-errors";
import { ILogger, LOGGER } from "@ladder-lottery/core-logging";
import { IMetrics, METRICS } from "@ladder-lottery/core-metrics";
import { IRandomSourceFactory, RANDOM_SOURCE_FACTORY } from "@ladder-lottery/core-rng";
import {
  LadderConfig,
  LadderEngine,
  RungLayout,
  countRungs,
  normalizeNames,
  pairNames,
  renderLadder,
  simulateLayout,
} from "@ladder-lottery/game-math-ladder";
import { LadderDrawDto } from "./dto/ladder-draw.dto";
import { LadderResolveDto } from "./dto/ladder-resolve.dto";
import { LadderDrawResponse, LadderResolveResponse } from "./dto/ladder-response.dto";

@Injectable()
export class LadderService {
  constructor(
    @Inject(LADDER_SETTINGS) private readonly settings: LadderSettings,
    @Inject(RANDOM_SOURCE_FACTORY) private readonly rngFactory: IRandomSourceFactory,
    @Inject(LOGGER) private readonly logger: ILogger,
    @Inject(METRICS) private readonly metrics: IMetrics,
  ) {}

  draw(dto: LadderDrawDto): LadderDrawResponse {
    const config = this.buildConfig(dto);
    const engine = new LadderEngine(config);
    const { seed, source } = this.rngFactory.create(dto.seed);
    const { playerNames, outcomeNames } = this.normalize(dto, config.playerCount);

    const round = engine.play({ rng: () => source.next(), playerNames, outcomeNames, highlight: dto.highlight });
    const rungs = countRungs(round.layout);

    const labels = { players: String(config.playerCount) };
    this.metrics.increment("ladder_draws_total", labels);
    this.metrics.observe("ladder_rungs", rungs, labels);
    this.logger.info("ladder.drawn", { seed, ...config, rungs });

    return {
      seed,
      ...config,
      layout: round.layout.levels.map((level) => [...level]),
      mapping: [...round.mapping],
      playerNames,
      outcomeNames,
      pairings: round.pairings,
      svg: round.diagram.svg,
    };
  }

  resolve(dto: LadderResolveDto): LadderResolveResponse {
    this.assertPlayerCount(dto.playerCount);
    this.assertLevelCount(dto.layout.length, 0);
    const layout: RungLayout = { playerCount: dto.playerCount, levels: dto.layout };
    const { playerNames, outcomeNames } = this.normalize(dto, dto.playerCount);

    const mapping = simulateLayout(layout);
    const pairings = pairNames(mapping, playerNames, outcomeNames);
    const diagram = renderLadder(layout, playerNames, outcomeNames, { highlight: dto.highlight });

    this.metrics.increment("ladder_resolves_total", { players: String(dto.playerCount) });
    this.logger.info("ladder.resolved", {
      playerCount: dto.playerCount,
      levelCount: dto.layout.length,
      rungs: countRungs(layout),
    });

    return { mapping: [...mapping], playerNames, outcomeNames, pairings, svg: diagram.svg };
  }

  private buildConfig(dto: LadderDrawDto): LadderConfig {
    const playerCount = dto.playerCount ?? this.settings.defaultPlayers;
    const levelCount = dto.levelCount ?? this.settings.defaultLevels;
    this.assertPlayerCount(playerCount);
    this.assertLevelCount(levelCount, 1);
    return {
      playerCount,
      levelCount,
      rungProbability: dto.rungProbability ?? this.settings.defaultProbability,
    };
  }

  private normalize(dto: { playerNames?: string; outcomeNames?: string }, count: number) {
    return {
      playerNames: normalizeNames(dto.playerNames ?? "", count, this.settings.playerPrefix),
      outcomeNames: normalizeNames(dto.outcomeNames ?? "", count, this.settings.outcomePrefix),
    };
  }

  private assertPlayerCount(playerCount: number): void {
    if (playerCount < 2 || playerCount > this.settings.maxPlayers) {
      throw invalidConfiguration(`Ladder: playerCount must be between 2 and ${this.settings.maxPlayers}`, { playerCount });
    }
  }

  private assertLevelCount(levelCount: number, min: number): void {
    if (levelCount < min || levelCount > this.settings.maxLevels) {
      throw invalidConfiguration(`Ladder: levelCount must be between ${min} and ${this.settings.maxLevels}`, { levelCount });
    }
  }
}
