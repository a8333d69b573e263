import { BadRequestException, Injectable, NotFoundException } from "@nestjs/common";

import { CricbuzzClient } from "../cricbuzz/cricbuzz.client";
import { hasScorecard, parseScorecard } from "../cricbuzz/cricbuzz.parsers";
import { LiveMatch, Scorecard } from "../cricbuzz/cricbuzz.types";

@Injectable()
export class MatchesService {
  constructor(private readonly cricbuzz: CricbuzzClient) {}

  getLiveMatches(): Promise<LiveMatch[]> {
    return this.cricbuzz.getLiveMatches();
  }

  /**
   * Scorecards only exist once a match has started; an empty card is a 404,
   * not an upstream failure.
   */
  async getScorecard(matchId: number): Promise<Scorecard> {
    if (matchId < 1) {
      throw new BadRequestException("matchId must be a positive integer");
    }

    const data = await this.cricbuzz.getScorecard(matchId);

    if (!hasScorecard(data)) {
      throw new NotFoundException("Scorecard not available for this match yet.");
    }

    return parseScorecard(data, matchId);
  }
}
