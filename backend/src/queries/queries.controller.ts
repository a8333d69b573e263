import { Controller, Get, HttpCode, Param, Post } from "@nestjs/common";

import { QueriesService } from "./queries.service";

/**
 * SQL practice: a read-only catalogue of analytical queries.
 */
@Controller("queries")
export class QueriesController {
  constructor(private readonly queries: QueriesService) {}

  /**
   * GET /queries
   *
   * Ids and titles, in catalogue order.
   */
  @Get()
  list() {
    return this.queries.list();
  }

  /**
   * POST /queries/:id/run
   *
   * Executes the canned query and returns its columns and rows.
   */
  @Post(":id/run")
  @HttpCode(200)
  run(@Param("id") id: string) {
    return this.queries.run(id);
  }
}
