import { Body, Controller, Inject, Post, Type, ValidationPipe } from "@nestjs/common";
import { LadderService } from "./ladder.service";
import { LadderDrawDto } from "./dto/ladder-draw.dto";
import { LadderResolveDto } from "./dto/ladder-resolve.dto";
import { LadderDrawResponse, LadderResolveResponse } from "./dto/ladder-response.dto";

// expectedType keeps validation independent of emitted parameter metadata.
const validated = (expectedType: Type<unknown>) => new ValidationPipe({ expectedType, whitelist: true, transform: true });

@Controller("ladder")
export class LadderController {
  constructor(@Inject(LadderService) private readonly ladderService: LadderService) {}

  @Post("draw")
  draw(@Body(validated(LadderDrawDto)) dto: LadderDrawDto): LadderDrawResponse {
    return this.ladderService.draw(dto);
  }

  @Post("resolve")
  resolve(@Body(validated(LadderResolveDto)) dto: LadderResolveDto): LadderResolveResponse {
    return this.ladderService.resolve(dto);
  }
}
