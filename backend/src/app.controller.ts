import { Controller, Get } from "@nestjs/common";

import { AppService } from "./app.service";

@Controller()
export class AppController {
  constructor(private readonly app: AppService) {}

  /**
   * GET /health
   *
   * Always 200; `database` tells whether PostgreSQL answered.
   */
  @Get("health")
  health() {
    return this.app.health();
  }
}
