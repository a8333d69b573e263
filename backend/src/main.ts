// src/main.ts
// Boots the NestJS API. CORS is opened for the Next.js dashboard origins.

import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";

import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";
import { corsOrigins } from "./config/configuration";
import { EnvironmentVariables } from "./config/env.validation";

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get<ConfigService<EnvironmentVariables, true>>(ConfigService);

  configureApp(app, corsOrigins(config));

  const port = config.get("PORT", { infer: true });
  await app.listen(port);

  const logger = new Logger("Bootstrap");
  logger.log(`API listening on http://localhost:${port}`);
  logger.log(`Cricket API host: ${config.get("RAPIDAPI_HOST", { infer: true })}`);
}

bootstrap().catch((err: unknown) => {
  new Logger("Bootstrap").error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
