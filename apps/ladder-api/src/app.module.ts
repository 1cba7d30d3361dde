import { Module } from "@nestjs/common";
import { GameCoreModule } from "@ladder-lottery/game-core";
import { LadderController } from "./ladder.controller";
import { MetricsController } from "./metrics.controller";
import { LadderService } from "./ladder.service";
import { HealthController } from "./health.controller";

@Module({
  imports: [GameCoreModule.register()],
  controllers: [LadderController, HealthController, MetricsController],
  providers: [LadderService],
})
export class AppModule {}
