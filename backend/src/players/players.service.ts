import { BadRequestException, Injectable } from "@nestjs/common";

import { CricbuzzClient } from "../cricbuzz/cricbuzz.client";
import { PlayerSearchResult, StatsTable, StatType } from "../cricbuzz/cricbuzz.types";

@Injectable()
export class PlayersService {
  constructor(private readonly cricbuzz: CricbuzzClient) {}

  search(name: string): Promise<PlayerSearchResult[]> {
    return this.cricbuzz.searchPlayers(name);
  }

  getStats(playerId: string, type: StatType): Promise<StatsTable> {
    // Cricbuzz player ids are numeric
    if (!/^\d+$/.test(playerId)) {
      throw new BadRequestException("playerId must be numeric");
    }
    return this.cricbuzz.getPlayerStats(playerId, type);
  }
}
