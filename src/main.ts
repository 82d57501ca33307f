import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const port = Number(process.env.PORT) || 3000;
  await app.listen(port);
  Logger.log(`labflow listening on :${port}`, "Bootstrap");
}

bootstrap().catch((e: unknown) => {
  Logger.error(e instanceof Error ? e.stack ?? e.message : String(e), "Bootstrap");
  process.exitCode = 1;
});
