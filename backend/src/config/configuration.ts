// src/config/configuration.ts
// Typed views over the validated environment, grouped per concern.

import { ConfigService } from "@nestjs/config";
import type { PoolConfig } from "pg";
import { EnvironmentVariables } from "./env.validation";

export type AppConfigService = ConfigService<EnvironmentVariables, true>;

export type CricbuzzSettings = {
  host: string;
  apiKey: string;
  timeoutMs: number;
  rateLimitRetries: number;
  retryDelayMs: number;
  ttlSec: { live: number; scorecard: number; player: number };
};

export function cricbuzzSettings(config: AppConfigService): CricbuzzSettings {
  return {
    host: config.get("RAPIDAPI_HOST", { infer: true }),
    apiKey: config.get("RAPIDAPI_KEY", { infer: true }),
    timeoutMs: config.get("CRICBUZZ_TIMEOUT_MS", { infer: true }),
    rateLimitRetries: config.get("CRICBUZZ_RATE_LIMIT_RETRIES", { infer: true }),
    retryDelayMs: config.get("CRICBUZZ_RETRY_DELAY_MS", { infer: true }),
    ttlSec: {
      live: config.get("LIVE_MATCHES_TTL_SEC", { infer: true }),
      scorecard: config.get("SCORECARD_TTL_SEC", { infer: true }),
      player: config.get("PLAYER_TTL_SEC", { infer: true }),
    },
  };
}

/**
 * DATABASE_URL wins when set; otherwise the discrete DB_* parts are used.
 */
export function poolConfig(config: AppConfigService): PoolConfig {
  const url = config.get("DATABASE_URL", { infer: true });
  if (url && url.trim()) {
    return { connectionString: url.trim() };
  }

  return {
    host: config.get("DB_HOST", { infer: true }),
    database: config.get("DB_NAME", { infer: true }),
    user: config.get("DB_USER", { infer: true }),
    password: config.get("DB_PASSWORD", { infer: true }),
    port: config.get("DB_PORT", { infer: true }),
  };
}

/**
 * Human-readable target for logs. Never includes credentials.
 */
export function describeDatabase(pool: PoolConfig): string {
  if (pool.connectionString) {
    try {
      const u = new URL(pool.connectionString);
      return `${u.hostname}:${u.port || "5432"}${u.pathname}`;
    } catch {
      return "(unparseable DATABASE_URL)";
    }
  }
  return `${pool.host ?? "localhost"}:${pool.port ?? 5432}/${pool.database ?? ""}`;
}

export function corsOrigins(config: AppConfigService): string[] {
  return config
    .get("CORS_ORIGINS", { infer: true })
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);
}
