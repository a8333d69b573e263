import { Controller, Get, Param, ParseIntPipe } from "@nestjs/common";

import { MatchesService } from "./matches.service";

/**
 * Live scores, read straight from the cricket API (cached briefly).
 */
@Controller("matches")
export class MatchesController {
  constructor(private readonly matches: MatchesService) {}

  /**
   * GET /matches/live
   *
   * Every match currently listed as live, flattened across series.
   * May be an empty list between fixtures.
   */
  @Get("live")
  live() {
    return this.matches.getLiveMatches();
  }

  /**
   * GET /matches/:matchId/scorecard
   *
   * Innings summary, batting, bowling and fall of wickets tables.
   */
  @Get(":matchId/scorecard")
  scorecard(@Param("matchId", ParseIntPipe) matchId: number) {
    return this.matches.getScorecard(matchId);
  }
}
