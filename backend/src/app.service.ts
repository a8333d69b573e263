import { Injectable } from "@nestjs/common";

import { DatabaseService } from "./database/database.service";

export type Health = {
  status: "ok" | "degraded";
  database: "up" | "down";
};

@Injectable()
export class AppService {
  constructor(private readonly db: DatabaseService) {}

  /**
   * The API pages work without PostgreSQL, so a down database degrades the
   * service instead of failing the check.
   */
  async health(): Promise<Health> {
    const up = await this.db.ping();
    return { status: up ? "ok" : "degraded", database: up ? "up" : "down" };
  }
}
