// src/app.setup.ts
// Global HTTP behaviour shared by main.ts and the e2e tests.

import { INestApplication, ValidationPipe } from "@nestjs/common";

export function configureApp(app: INestApplication, corsOrigins: string[] = []) {
  // Allow calls from the dashboard dev server
  if (corsOrigins.length > 0) {
    app.enableCors({ origin: corsOrigins, credentials: true });
  }

  // Strip unknown fields, turn payloads into DTO instances (defaults apply)
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    })
  );

  app.enableShutdownHooks();
}
