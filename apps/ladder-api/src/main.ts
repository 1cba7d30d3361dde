import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";

export async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(new Logger());
  app.enableShutdownHooks();
  const port = process.env.LADDER_API_PORT ? Number(process.env.LADDER_API_PORT) : process.env.PORT ? Number(process.env.PORT) : 3010;
  await app.listen(port);
  Logger.log(`Ladder API is running on port ${port}`);
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack ?? err.message : String(err), "Bootstrap");
  process.exit(1);
});
