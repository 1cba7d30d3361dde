import { Controller, Get } from "@nestjs/common";

@Controller()
export class HealthController {
  @Get("ladder/health")
  health() {
    return { status: "ok" };
  }
}
