// src/config/env.validation.ts
// Validates process.env once at boot (ConfigModule.forRoot({ validate })).
// A bad or missing variable stops the app before any module starts.

import "reflect-metadata";
import { plainToInstance } from "class-transformer";
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
  validateSync,
} from "class-validator";

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  PORT: number = 3000;

  @IsOptional()
  @IsString()
  CORS_ORIGINS: string = "http://localhost:3001,http://127.0.0.1:3001";

  // ----------------------------
  // Cricket API (RapidAPI)
  // ----------------------------

  @IsString()
  @IsNotEmpty({ message: "Missing RAPIDAPI_KEY in backend/.env (your RapidAPI key for the Cricbuzz API)" })
  RAPIDAPI_KEY!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  RAPIDAPI_HOST: string = "cricbuzz-cricket.p.rapidapi.com";

  @IsOptional()
  @IsInt()
  @Min(1)
  CRICBUZZ_TIMEOUT_MS: number = 10_000;

  @IsOptional()
  @IsInt()
  @Min(0)
  CRICBUZZ_RATE_LIMIT_RETRIES: number = 1;

  @IsOptional()
  @IsInt()
  @Min(1)
  CRICBUZZ_RETRY_DELAY_MS: number = 10_000;

  @IsOptional()
  @IsInt()
  @Min(1)
  LIVE_MATCHES_TTL_SEC: number = 60;

  @IsOptional()
  @IsInt()
  @Min(1)
  SCORECARD_TTL_SEC: number = 30;

  @IsOptional()
  @IsInt()
  @Min(1)
  PLAYER_TTL_SEC: number = 3600;

  // ----------------------------
  // PostgreSQL
  // ----------------------------

  @IsOptional()
  @IsString()
  DATABASE_URL?: string;

  @IsOptional()
  @IsString()
  DB_HOST?: string;

  @IsOptional()
  @IsString()
  DB_NAME?: string;

  @IsOptional()
  @IsString()
  DB_USER?: string;

  @IsOptional()
  @IsString()
  DB_PASSWORD?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  DB_PORT: number = 5432;
}

export function validateEnv(config: Record<string, unknown>): EnvironmentVariables {
  const env = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const messages = validateSync(env, { skipMissingProperties: false }).flatMap((e) =>
    Object.values(e.constraints ?? {})
  );

  const hasUrl = Boolean(env.DATABASE_URL?.trim());
  const hasParts = Boolean(env.DB_HOST && env.DB_NAME && env.DB_USER);
  if (!hasUrl && !hasParts) {
    messages.push(
      "Missing database settings: set DATABASE_URL or DB_HOST, DB_NAME and DB_USER in backend/.env"
    );
  }

  if (messages.length > 0) {
    throw new Error(`Invalid environment:\n- ${messages.join("\n- ")}`);
  }

  return env;
}
