import { DynamicModule, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { APP_FILTER, APP_INTERCEPTOR } from "@nestjs/core";
import { LADDER_SETTINGS, LadderSettings, loadLadderSettings } from "@ladder-lottery/core-config";
import { LoggingModule, CorrelationIdInterceptor } from "@ladder-lottery/core-logging";
import { MetricsModule } from "@ladder-lottery/core-metrics";
import { HmacRandomSourceFactory, RANDOM_SOURCE_FACTORY } from "@ladder-lottery/core-rng";
import { LadderErrorFilter } from "./ladder-error.filter";

export { LadderErrorFilter } from "./ladder-error.filter";

export interface GameCoreModuleOptions {
  /** Applied over the values read from the environment. */
  settings?: Partial<LadderSettings>;
  /** Client seed mixed into every seeded draw. */
  clientSeed?: string;
}

@Module({})
export class GameCoreModule {
  static register(options: GameCoreModuleOptions = {}): DynamicModule {
    return {
      module: GameCoreModule,
      imports: [ConfigModule.forRoot({ isGlobal: true }), LoggingModule, MetricsModule],
      providers: [
        { provide: APP_INTERCEPTOR, useClass: CorrelationIdInterceptor },
        { provide: APP_FILTER, useClass: LadderErrorFilter },
        {
          provide: LADDER_SETTINGS,
          inject: [ConfigService],
          useFactory: (config: ConfigService): LadderSettings => {
            const loaded = loadLadderSettings((key) => config.get<string>(key));
            return { ...loaded, ...options.settings };
          },
        },
        {
          provide: RANDOM_SOURCE_FACTORY,
          useFactory: () => new HmacRandomSourceFactory(options.clientSeed),
        },
      ],
      exports: [LADDER_SETTINGS, RANDOM_SOURCE_FACTORY],
    };
  }
}
