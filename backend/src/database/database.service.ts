// NestJS lifecycle interfaces
import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";

// Native PostgreSQL connection pool
import { Pool, QueryResultRow } from "pg";

import { describeDatabase, poolConfig } from "../config/configuration";
import { EnvironmentVariables } from "../config/env.validation";
import { toHttpError } from "./database.errors";

export type QueryOutput<T extends QueryResultRow> = {
  rows: T[];
  // Column names in select-list order (present even when rows is empty)
  columns: string[];
  rowCount: number;
};

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;

  constructor(config: ConfigService<EnvironmentVariables, true>) {
    const settings = poolConfig(config);

    /**
     * The pool is created lazily by pg: no connection is opened until the
     * first query, so the API boots even when PostgreSQL is down and the
     * API-only pages keep working.
     */
    this.pool = new Pool(settings);

    // Idle clients can error out (server restart); log instead of crashing
    this.pool.on("error", (err) => {
      this.logger.error(`Idle PostgreSQL client error: ${err.message}`);
    });

    this.logger.log(`PostgreSQL target: ${describeDatabase(settings)}`);
  }

  /**
   * Runs a parameterized statement.
   *
   * @param action - label used in error messages ("Insert", "Query q3", ...)
   */
  async query<T extends QueryResultRow>(
    text: string,
    params: unknown[] = [],
    action = "Query"
  ): Promise<QueryOutput<T>> {
    try {
      const result = await this.pool.query<T>(text, params);
      return {
        rows: result.rows,
        columns: (result.fields ?? []).map((f) => f.name),
        rowCount: result.rowCount ?? result.rows.length,
      };
    } catch (e) {
      const err = toHttpError(e, action);
      this.logger.error(`${action} failed: ${e instanceof Error ? e.message : String(e)}`);
      throw err;
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query("SELECT 1");
      return true;
    } catch (e) {
      this.logger.warn(`Database ping failed: ${e instanceof Error ? e.message : String(e)}`);
      return false;
    }
  }

  /**
   * Called automatically by NestJS during application shutdown.
   */
  async onModuleDestroy() {
    await this.pool.end();
  }
}
